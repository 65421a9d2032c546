import { readInt, readString, type Env } from '../shared/env.js'
import { parseLogLevel, type LogLevel } from '../shared/logger.js'
import type { InterceptMode } from '../shared/types.js'
import { INTERCEPT_MODES } from '../shared/types.js'
import { DEFAULT_MAX_FLOWS } from './flow-store.js'

export interface InspectorConfig {
  port: number
  host: string
  mode: InterceptMode
  /** 0 holds paused flows until they are resumed or the session stops */
  holdTimeoutMs: number
  rulesFile?: string
  maxFlows: number
  logging: {
    level: LogLevel
    colorize: boolean
  }
}

export const DEFAULT_INSPECTOR_PORT = 8765

function parseMode(value: string | undefined): InterceptMode {
  const normalized = (value || '').trim().toLowerCase()
  return INTERCEPT_MODES.find(mode => mode === normalized) ?? 'recording'
}

export function loadInspectorConfig(env: Env = process.env): InspectorConfig {
  const port = readInt(env, 'INSPECTOR_PORT', DEFAULT_INSPECTOR_PORT)
  const maxFlows = readInt(env, 'MAX_FLOWS', DEFAULT_MAX_FLOWS)
  return {
    port: port <= 65535 ? port : DEFAULT_INSPECTOR_PORT,
    host: readString(env, 'INSPECTOR_HOST', '127.0.0.1'),
    mode: parseMode(env.INTERCEPT_MODE),
    holdTimeoutMs: readInt(env, 'HOLD_TIMEOUT_MS', 0),
    rulesFile: env.RULES_FILE?.trim() || undefined,
    maxFlows: maxFlows > 0 ? maxFlows : DEFAULT_MAX_FLOWS,
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
      colorize: env.NODE_ENV !== 'production'
    }
  }
}
