import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { WeatherEnricher, mentionsWeather, resolveLocation } from '../weather.js'

const SAMPLE_PAYLOAD = {
  current_condition: [{
    temp_C: '24',
    FeelsLikeC: '26',
    humidity: '88',
    weatherDesc: [{ value: 'Light rain' }]
  }]
}

function respondWith(status: number, body: unknown) {
  return vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })
  )
}

function enricherWith(fetchFn: typeof fetch, timeoutMs = 3000) {
  return new WeatherEnricher({
    endpoint: 'https://wttr.in/',
    timeoutMs,
    defaultLocation: 'Taipei',
    fetchFn
  })
}

describe('mentionsWeather', () => {
  it('detects the Chinese keyword', () => {
    expect(mentionsWeather('台北天氣如何')).toBe(true)
  })

  it('detects the English keyword in any case', () => {
    expect(mentionsWeather('What is the WEATHER like?')).toBe(true)
  })

  it('ignores unrelated messages', () => {
    expect(mentionsWeather('你好')).toBe(false)
  })
})

describe('resolveLocation', () => {
  it('maps a known city to its lookup name', () => {
    expect(resolveLocation('台北天氣如何', 'Kaohsiung')).toBe('Taipei')
  })

  it('prefers the longest alias', () => {
    expect(resolveLocation('weather in New Taipei?', 'Kaohsiung')).toBe('New Taipei')
  })

  it('falls back when no city is named', () => {
    expect(resolveLocation('天氣如何', 'Kaohsiung')).toBe('Kaohsiung')
  })
})

describe('WeatherEnricher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('does nothing without a weather keyword', async () => {
    const fetchFn = respondWith(200, SAMPLE_PAYLOAD)

    const outcome = await enricherWith(fetchFn).enrich('你好')

    expect(outcome).toEqual({ status: 'ok', value: '' })
    expect(fetchFn).not.toHaveBeenCalled()
  })

  it('formats an authoritative weather block on success', async () => {
    const fetchFn = respondWith(200, SAMPLE_PAYLOAD)

    const outcome = await enricherWith(fetchFn).enrich('台北天氣如何')

    expect(fetchFn.mock.calls[0][0]).toBe('https://wttr.in/Taipei?format=j1')
    expect(outcome).toEqual({
      status: 'ok',
      value: '【即時天氣（權威資料，請直接引用，勿自行編造數值）】\n地點：Taipei\n天況：Light rain\n氣溫：24°C（體感 26°C）'
    })
  })

  it('encodes multi-word locations', async () => {
    const fetchFn = respondWith(200, SAMPLE_PAYLOAD)

    await enricherWith(fetchFn).enrich('新北天氣')

    expect(fetchFn.mock.calls[0][0]).toBe('https://wttr.in/New%20Taipei?format=j1')
  })

  it('returns an empty block on a non-200 response', async () => {
    const outcome = await enricherWith(respondWith(503, { error: 'busy' })).enrich('台北天氣如何')

    expect(outcome.status).toBe('degraded')
    expect(outcome.value).toBe('')
  })

  it('returns an empty block on a malformed payload', async () => {
    const outcome = await enricherWith(respondWith(200, { current_condition: [] })).enrich('台北天氣如何')

    expect(outcome.status).toBe('degraded')
    expect(outcome.value).toBe('')
  })

  it('gives up when the lookup outlasts its timeout', async () => {
    const hanging = vi.fn((_url: string | URL | Request, init?: RequestInit) => {
      const signal = init?.signal
      return new Promise<Response>((_resolve, reject) => {
        if (!signal) return
        signal.addEventListener('abort', () => reject(signal.reason))
      })
    })

    const outcome = await enricherWith(hanging, 20).enrich('台北天氣如何')

    expect(outcome.status).toBe('degraded')
    expect(outcome.value).toBe('')
    expect(hanging.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal)
  })
})
