#!/usr/bin/env node
import { toErrorMessage } from '../shared/errors.js'
import { createLogger } from '../shared/logger.js'
import { CertificateAuthority } from './ca.js'
import { loadAgentConfig } from './config.js'
import { HttpControlChannel } from './http-control-channel.js'
import { ProxyAgent } from './proxy-agent.js'

const config = loadAgentConfig()
const logger = createLogger('agent', config.logging)

const channel = new HttpControlChannel({
  baseUrl: config.controlUrl,
  logger: logger.child('control'),
  timeoutMs: config.controlTimeoutMs,
  pingTimeoutMs: config.pingTimeoutMs
})

const ca = new CertificateAuthority(config.certsDir, logger.child('ca'))
ca.load()

const agent = new ProxyAgent({
  channel,
  logger: logger.child('proxy'),
  ca,
  queryMockFirst: config.queryMockFirst,
  upstreamInsecure: config.upstreamInsecure,
  isReachable: () => channel.isReachable()
})

let stopping = false

function shutdown(signal: string): void {
  if (stopping) return
  stopping = true
  logger.info(`Received ${signal}, shutting down`)
  agent.close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error(`Shutdown failed: ${toErrorMessage(err)}`)
      process.exit(1)
    })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))

agent.listen(config.port)
  .then(() => {
    logger.info(`Reporting to inspector at ${config.controlUrl}`)
    logger.info(`CA certificate: ${ca.certPath} (also served at /ca.crt)`)
  })
  .catch((err: unknown) => {
    logger.error(`Failed to start proxy: ${toErrorMessage(err)}`)
    process.exit(1)
  })
