/**
 * Mail notifier entry point. Runs as its own process beside the API.
 */
import { config } from '../config'
import { logger } from '../utils/logger'
import { createNotifierApp } from './app'
import { createSmtpMailer } from './mailer'

const app = createNotifierApp(createSmtpMailer())

const server = app.listen(config.notifier.port, () => {
  logger.info(`Notifier running on http://localhost:${config.notifier.port}`)
  if (!config.notifier.smtp.user) logger.warn('SMTP_USER is not set; the SMTP server must accept unauthenticated mail')
})

const shutdown = (signal: string) => {
  logger.info(`${signal} received, stopping notifier`)
  server.close(() => process.exit(0))
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
