import { readBool, readInt, readString, type Env } from '../shared/env.js'
import { parseLogLevel, type LogLevel } from '../shared/logger.js'

export interface AgentConfig {
  port: number
  /** Base URL of the inspector's control API */
  controlUrl: string
  certsDir: string
  controlTimeoutMs: number
  pingTimeoutMs: number
  /** Ask the inspector for a mock before contacting the upstream */
  queryMockFirst: boolean
  /** Accept upstream TLS certificates that do not verify */
  upstreamInsecure: boolean
  logging: {
    level: LogLevel
    colorize: boolean
  }
}

export const DEFAULT_PROXY_PORT = 8080
export const DEFAULT_CONTROL_URL = 'http://127.0.0.1:8765'

export function loadAgentConfig(env: Env = process.env): AgentConfig {
  const port = readInt(env, 'PROXY_PORT', DEFAULT_PROXY_PORT)
  const controlUrl = readString(env, 'CONTROL_URL', DEFAULT_CONTROL_URL)
  return {
    port: port <= 65535 ? port : DEFAULT_PROXY_PORT,
    controlUrl: URL.canParse(controlUrl) ? controlUrl.replace(/\/+$/, '') : DEFAULT_CONTROL_URL,
    certsDir: readString(env, 'CERTS_DIR', './certs'),
    controlTimeoutMs: readInt(env, 'CONTROL_TIMEOUT_MS', 2000),
    pingTimeoutMs: readInt(env, 'PING_TIMEOUT_MS', 500),
    queryMockFirst: readBool(env, 'QUERY_MOCK_FIRST', false),
    upstreamInsecure: readBool(env, 'UPSTREAM_INSECURE', false),
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
      colorize: env.NODE_ENV !== 'production'
    }
  }
}
