/**
 * Express application: middleware stack, API routes and error handling.
 * Built without listening so tests can drive it through supertest.
 */
import 'express-async-errors'
import express from 'express'
import cors from 'cors'
import helmet from 'helmet'
import compression from 'compression'
import morgan from 'morgan'
import rateLimit from 'express-rate-limit'

import { config } from './config'
import { logger } from './utils/logger'
import { AppError, isAppError } from './utils/errors'
import routes from './routes'

export function createApp(): express.Express {
  const app = express()

  // ─── Security Middleware ──────────────────────────────────────────
  app.use(helmet())

  app.use(cors({
    origin: config.server.frontendUrl,
    credentials: true,
    allowedHeaders: ['Origin', 'Content-Type', 'Accept', 'Authorization', 'X-User-ID'],
  }))

  // ─── Body Parsing ─────────────────────────────────────────────────
  app.use(express.json({ limit: '1mb' }))

  // ─── Compression & Logging ────────────────────────────────────────
  app.use(compression())
  app.use(morgan('combined', {
    stream: { write: (msg) => logger.http(msg.trim()) },
    skip: (req) => req.path === '/health',
  }))

  // ─── Rate Limiting ────────────────────────────────────────────────
  app.use('/api', rateLimit({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: { success: false, message: 'Too many requests, please try again later.', code: 'RATE_LIMITED' },
  }))

  // ─── Health Check ─────────────────────────────────────────────────
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', message: 'Hotel storefront API is running', timestamp: new Date().toISOString() })
  })

  // ─── API Routes ───────────────────────────────────────────────────
  app.use('/api', routes)

  // ─── 404 Handler ─────────────────────────────────────────────────
  app.use((_req, res) => {
    res.status(404).json({ success: false, message: 'Route not found', code: 'NOT_FOUND' })
  })

  // ─── Global Error Handler ─────────────────────────────────────────
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // Malformed JSON bodies arrive from express.json() as a 400 SyntaxError
    const known = isAppError(err)
      ? err
      : err instanceof SyntaxError && 'body' in err
        ? AppError.invalidArgument('Malformed JSON body')
        : null

    if (known && known.kind !== 'internal') {
      logger.debug('Request rejected', { method: req.method, path: req.originalUrl, code: known.code, message: known.message })
      res.status(known.status).json({ success: false, message: known.message, code: known.code })
      return
    }

    logger.error('Unhandled error', { method: req.method, path: req.originalUrl, err: err.message, stack: err.stack })
    res.status(500).json({
      success: false,
      message: config.server.isDev ? err.message : 'Internal server error',
      code: 'INTERNAL_ERROR',
    })
  })

  return app
}
