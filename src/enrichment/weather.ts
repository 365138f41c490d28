import { z } from 'zod'
import { degraded, ok } from '../butler/outcome.js'
import type { Outcome } from '../butler/outcome.js'
import type { ContextEnricher } from './types.js'

// Aliases are matched against the lowercased message; the longest hit wins
// so that "new taipei" is not read as "taipei".
const LOCATION_ALIASES: Record<string, string> = {
  '台北': 'Taipei',
  '臺北': 'Taipei',
  'taipei': 'Taipei',
  '新北': 'New Taipei',
  'new taipei': 'New Taipei',
  '基隆': 'Keelung',
  'keelung': 'Keelung',
  '桃園': 'Taoyuan',
  'taoyuan': 'Taoyuan',
  '新竹': 'Hsinchu',
  'hsinchu': 'Hsinchu',
  '台中': 'Taichung',
  '臺中': 'Taichung',
  'taichung': 'Taichung',
  '台南': 'Tainan',
  '臺南': 'Tainan',
  'tainan': 'Tainan',
  '高雄': 'Kaohsiung',
  'kaohsiung': 'Kaohsiung',
  '宜蘭': 'Yilan',
  'yilan': 'Yilan',
  '花蓮': 'Hualien',
  'hualien': 'Hualien',
  '台東': 'Taitung',
  '臺東': 'Taitung',
  'taitung': 'Taitung'
}

const weatherPayload = z.object({
  current_condition: z.array(z.object({
    temp_C: z.string(),
    FeelsLikeC: z.string(),
    weatherDesc: z.array(z.object({ value: z.string() })).min(1)
  })).min(1)
})

export interface WeatherReport {
  location: string
  description: string
  temperatureC: string
  feelsLikeC: string
}

export interface WeatherEnricherOptions {
  endpoint: string
  timeoutMs: number
  defaultLocation: string
  fetchFn?: typeof fetch
}

export function mentionsWeather(text: string): boolean {
  return text.includes('天氣') || text.toLowerCase().includes('weather')
}

export function resolveLocation(text: string, fallback: string): string {
  const lower = text.toLowerCase()
  let best: string | null = null
  for (const alias of Object.keys(LOCATION_ALIASES)) {
    if (lower.includes(alias) && (best === null || alias.length > best.length)) {
      best = alias
    }
  }
  return best === null ? fallback : LOCATION_ALIASES[best]
}

export function formatWeather(report: WeatherReport): string {
  return [
    '【即時天氣（權威資料，請直接引用，勿自行編造數值）】',
    `地點：${report.location}`,
    `天況：${report.description}`,
    `氣溫：${report.temperatureC}°C（體感 ${report.feelsLikeC}°C）`
  ].join('\n')
}

export class WeatherEnricher implements ContextEnricher {
  readonly name = 'weather'
  private endpoint: string
  private timeoutMs: number
  private defaultLocation: string
  private fetchFn: typeof fetch

  constructor(options: WeatherEnricherOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs
    this.defaultLocation = options.defaultLocation
    this.fetchFn = options.fetchFn ?? fetch
  }

  async enrich(text: string): Promise<Outcome<string>> {
    if (!mentionsWeather(text)) return ok('')

    const location = resolveLocation(text, this.defaultLocation)
    try {
      const report = await this.lookup(location)
      console.log(`[weather] ${location}: ${report.description}, ${report.temperatureC}°C`)
      return ok(formatWeather(report))
    } catch (e) {
      console.error(`[weather] Lookup for ${location} failed:`, e)
      return degraded('', 'weather_unavailable', e)
    }
  }

  private async lookup(location: string): Promise<WeatherReport> {
    const url = `${this.endpoint}/${encodeURIComponent(location)}?format=j1`
    const response = await this.fetchFn(url, { signal: AbortSignal.timeout(this.timeoutMs) })
    if (response.status !== 200) {
      throw new Error(`Weather service responded ${response.status}`)
    }

    const payload = weatherPayload.parse(await response.json())
    const [current] = payload.current_condition
    return {
      location,
      description: current.weatherDesc[0].value,
      temperatureC: current.temp_C,
      feelsLikeC: current.FeelsLikeC
    }
  }
}
