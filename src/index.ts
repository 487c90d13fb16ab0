import { createServer, type Server } from 'http'
import { validateConfig } from './config.js'
import { createLogger, errorMessage, logger } from './utils/logger.js'
import { createConnection, type Connection } from './bot/connection.js'
import { getState } from './bot/state.js'

let healthServer: Server | null = null
let connection: Connection | null = null

/**
 * Give the QUIT this long to flush before exiting anyway.
 */
const SHUTDOWN_GRACE_MS = 1000

/**
 * Entry point.
 * - Validates configuration (using Result pattern)
 * - Starts the optional health endpoint
 * - Connects to IRC and joins the channel
 */
async function main(): Promise<void> {
  logger.info('Relay bot starting', { version: '1.0.0' })

  const configResult = validateConfig()
  if (!configResult.ok) {
    logger.error('Startup failed', { reason: configResult.error })
    process.exit(1)
  }
  const config = configResult.data
  const rootLogger = createLogger({ level: config.LOG_LEVEL, bindings: { nick: config.IRC_NICK } })

  if (config.HEALTH_PORT !== undefined) {
    const port = config.HEALTH_PORT
    healthServer = createServer((_, res) => {
      const state = getState()
      res.writeHead(200, { 'Content-Type': 'application/json' })
      res.end(
        JSON.stringify({
          status: 'ok',
          connection: state.connectionStatus,
          messagesHandled: state.messagesHandled,
          repliesSent: state.repliesSent,
          uptimeMs: Date.now() - state.startedAt.getTime(),
        })
      )
    })

    healthServer.listen(port, () => {
      rootLogger.info('Health endpoint started', { event: 'health_started', port })
    })
  }

  connection = createConnection(config, { logger: rootLogger })
}

/**
 * Graceful shutdown handler for process managers and manual termination.
 */
function shutdown(signal: string): void {
  logger.info('Shutdown initiated', { signal })

  if (healthServer) {
    healthServer.close(() => {
      logger.info('Health server closed')
    })
  }

  if (connection) {
    connection.transport
      .disconnect(`Shutting down (${signal})`)
      .then(() => logger.info('IRC connection closed'))
      .catch((error: unknown) => logger.warn('IRC disconnect failed', { error: errorMessage(error) }))
  }

  setTimeout(() => {
    logger.info('Shutdown complete')
    process.exit(0)
  }, SHUTDOWN_GRACE_MS)
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack })
  process.exit(1)
})

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: String(reason) })
  process.exit(1)
})

main().catch((error: unknown) => {
  logger.error('Failed to start', { error: errorMessage(error) })
  process.exit(1)
})
