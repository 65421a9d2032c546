export type Env = Record<string, string | undefined>

/**
 * Non-negative integer from the environment; anything else yields the fallback.
 */
export function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  const value = Number(raw)
  return Number.isInteger(value) && value >= 0 ? value : fallback
}

export function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = (env[name] || '').trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true
  if (['0', 'false', 'no', 'off'].includes(raw)) return false
  return fallback
}

export function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]
  return raw && raw.trim() ? raw.trim() : fallback
}
