/**
 * Mail notifier: receives order snapshots from the API and e-mails them.
 */
import 'express-async-errors'
import express from 'express'
import helmet from 'helmet'
import morgan from 'morgan'
import { z } from 'zod'

import { config } from '../config'
import { logger } from '../utils/logger'
import { AppError, isAppError } from '../utils/errors'
import { parseInput } from '../utils/validation'
import type { OrderNotificationPayload } from '../services/notification.service'
import type { Mailer } from './mailer'
import { renderAdminNotification, renderOrderConfirmation } from './templates'

const NotificationLineSchema = z.object({
  item_type: z.enum(['room', 'product']),
  item_id: z.number().int(),
  item_name: z.string(),
  quantity: z.number().int(),
  unit_price: z.number(),
  total_price: z.number(),
  check_in_date: z.string().optional(),
  check_out_date: z.string().optional(),
  nights: z.number().int().optional(),
})

const OrderPayloadSchema = z.object({
  order_number: z.string({ required_error: 'Order number is required' }).min(1, 'Order number is required'),
  customer_name: z.string().default(''),
  customer_phone: z.string().default(''),
  customer_email: z.string().nullable().default(null),
  total_amount: z.number().default(0),
  status: z.string().default('pending'),
  notes: z.string().nullable().default(null),
  items: z.array(NotificationLineSchema).default([]),
})

export function createNotifierApp(mailer: Mailer): express.Express {
  const app = express()

  app.use(helmet())
  app.use(express.json({ limit: '1mb' }))
  app.use(morgan('tiny', {
    stream: { write: (msg) => logger.http(msg.trim()) },
    skip: (req) => req.path === '/health',
  }))

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', message: 'Notifier is running' })
  })

  app.post('/send-order-confirmation', async (req, res) => {
    const order: OrderNotificationPayload = parseInput(OrderPayloadSchema, req.body)
    if (!order.customer_email) throw AppError.invalidArgument('Customer email is required')

    await mailer.send({ to: order.customer_email, ...renderOrderConfirmation(order) })
    logger.info('Order confirmation sent', { orderNumber: order.order_number, to: order.customer_email })
    res.json({ success: true, message: 'Order confirmation email sent' })
  })

  app.post('/send-admin-notification', async (req, res) => {
    const order: OrderNotificationPayload = parseInput(OrderPayloadSchema, req.body)

    await mailer.send({ to: config.notifier.adminEmail, ...renderAdminNotification(order) })
    logger.info('Admin notification sent', { orderNumber: order.order_number })
    res.json({ success: true, message: 'Admin notification email sent' })
  })

  app.use((_req, res) => {
    res.status(404).json({ success: false, message: 'Route not found', code: 'NOT_FOUND' })
  })

  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (isAppError(err) && err.kind !== 'internal') {
      res.status(err.status).json({ success: false, message: err.message, code: err.code })
      return
    }
    logger.error('Notifier request failed', { path: req.originalUrl, err: err.message })
    res.status(500).json({ success: false, message: `Failed to send email: ${err.message}`, code: 'INTERNAL_ERROR' })
  })

  return app
}
