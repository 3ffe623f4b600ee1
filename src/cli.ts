#!/usr/bin/env node

/**
 * Two-track demo entry point
 */
import { runDemo } from './demo/twoTrackDemo'
import { isError } from './types/result'
import { getConfig, logConfigFailure } from './utils/config'
import { Logger } from './utils/logger'

const logger = new Logger()

async function main(): Promise<void> {
  const config = getConfig()
  if (!config.ok) {
    logConfigFailure(logger, config)
    process.exit(1)
  }

  logger.info('demo-startup', 'Starting two-track demo', {
    nodeVersion: process.version,
    env: process.env['NODE_ENV'] || 'development',
  })

  await runDemo(config.value)
}

main().catch((error: unknown) => {
  const cause = isError(error) ? error : undefined
  logger.error('demo-startup', 'Fatal error while running demo', cause)
  process.exit(1)
})
