#!/usr/bin/env node
import { toErrorMessage } from '../shared/errors.js'
import { loadInspectorConfig } from './config.js'
import { InspectorSession } from './session.js'

const config = loadInspectorConfig()
const session = new InspectorSession(config)

let stopping = false

function shutdown(signal: string): void {
  if (stopping) return
  stopping = true
  session.logger.info(`Received ${signal}, shutting down`)
  session.stop()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      session.logger.error(`Shutdown failed: ${toErrorMessage(err)}`)
      process.exit(1)
    })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))

session.start().catch((err: unknown) => {
  session.logger.error(`Failed to start inspector: ${toErrorMessage(err)}`)
  process.exit(1)
})
