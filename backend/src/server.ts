/**
 * Hotel Storefront API: server entry point
 *
 * Stack: Node.js + Express + SQLite (better-sqlite3)
 */
import { config } from './config'
import { closeDatabase, initDatabase } from './database/sqlite'
import { logger } from './utils/logger'
import { createApp } from './app'

function bootstrap(): void {
  logger.info('Starting hotel storefront API...')

  initDatabase()

  const app = createApp()
  const server = app.listen(config.server.port, () => {
    logger.info(`Server running on http://localhost:${config.server.port}`)
    logger.info(`Notifications: ${config.notifications.enabled ? config.notifications.baseUrl : 'disabled'}`)
    logger.info(`Environment: ${config.server.nodeEnv}`)
  })

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`)
    server.close(() => {
      closeDatabase()
      logger.info('Server closed')
      process.exit(0)
    })
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('uncaughtException', (err) => {
    logger.error('Uncaught exception', { err: err.message, stack: err.stack })
    process.exit(1)
  })
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason })
    process.exit(1)
  })
}

bootstrap()
