/**
 * Result of a best-effort step. `degraded` means the step failed and `value`
 * is the fallback the caller should carry on with.
 */
export type Outcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'degraded'; value: T; reason: string; error: unknown }

export function ok<T>(value: T): Outcome<T> {
  return { status: 'ok', value }
}

export function degraded<T>(value: T, reason: string, error: unknown): Outcome<T> {
  return { status: 'degraded', value, reason, error }
}
