import { describe, it, expect } from 'vitest'
import { DEFAULT_CONTROL_URL, DEFAULT_PROXY_PORT, loadAgentConfig } from './config.js'

describe('loadAgentConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadAgentConfig({})).toEqual({
      port: DEFAULT_PROXY_PORT,
      controlUrl: DEFAULT_CONTROL_URL,
      certsDir: './certs',
      controlTimeoutMs: 2000,
      pingTimeoutMs: 500,
      queryMockFirst: false,
      upstreamInsecure: false,
      logging: { level: 'info', colorize: true }
    })
  })

  it('reads overrides', () => {
    const config = loadAgentConfig({
      PROXY_PORT: '9090',
      CONTROL_URL: 'http://127.0.0.1:9999/',
      CERTS_DIR: '/tmp/certs',
      QUERY_MOCK_FIRST: 'yes',
      UPSTREAM_INSECURE: '1',
      CONTROL_TIMEOUT_MS: '100'
    })

    expect(config).toMatchObject({
      port: 9090,
      controlUrl: 'http://127.0.0.1:9999',
      certsDir: '/tmp/certs',
      queryMockFirst: true,
      upstreamInsecure: true,
      controlTimeoutMs: 100
    })
  })

  it('ignores a control URL that does not parse', () => {
    expect(loadAgentConfig({ CONTROL_URL: 'not a url' }).controlUrl).toBe(DEFAULT_CONTROL_URL)
  })
})
