#!/usr/bin/env node
/**
 * tandem - start the gRPC server
 *
 * Usage:
 *   tandem                       # listen on 0.0.0.0:50051
 *   tandem --port 0              # ephemeral port
 *   tandem --queue-depth 64      # larger chat queues
 */

import { CliUsageError, parseCliArgs, USAGE } from './cli-args.js'
import { ConfigError, loadConfig } from './config/loader.js'
import { createServer } from './server/server.js'
import { createLogger } from './utils/logger.js'

const logger = createLogger('cli')

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2))
  if (args.help) {
    process.stdout.write(USAGE)
    return
  }

  const config = loadConfig({ ...process.env, ...args.env })
  const server = createServer(config)
  const address = await server.start()
  logger.info({ address: `${address.host}:${address.port}` }, 'ready')

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'signal received')
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'shutdown failed')
        process.exit(1)
      }
    )
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

main().catch((err: unknown) => {
  if (err instanceof CliUsageError || err instanceof ConfigError) {
    process.stderr.write(`${err.message}\n${err instanceof CliUsageError ? USAGE : ''}`)
    process.exit(2)
  }
  logger.fatal({ err }, 'failed to start')
  process.exit(1)
})
