/**
 * Order notification dispatcher.
 *
 * Posts the order snapshot to the mail notifier after checkout commits.
 * Each target is tried at most once; failures are logged and dropped.
 */
import axios from 'axios'
import { config } from '../config'
import { logger } from '../utils/logger'

export interface NotificationLine {
  item_type: 'room' | 'product'
  item_id: number
  item_name: string
  quantity: number
  unit_price: number
  total_price: number
  check_in_date?: string
  check_out_date?: string
  nights?: number
}

export interface OrderNotificationPayload {
  order_number: string
  customer_name: string
  customer_phone: string
  customer_email: string | null
  total_amount: number
  status: string
  notes: string | null
  items: NotificationLine[]
}

export type NotificationTarget = 'send-order-confirmation' | 'send-admin-notification'

export interface NotificationOutcome {
  target: NotificationTarget
  delivered: boolean
}

/** The notifier routes a payload goes to; customers without email get no confirmation. */
export function notificationTargets(payload: OrderNotificationPayload): NotificationTarget[] {
  return payload.customer_email
    ? ['send-order-confirmation', 'send-admin-notification']
    : ['send-admin-notification']
}

/** Sends every notification for an order. Never rejects. */
export async function sendOrderNotifications(payload: OrderNotificationPayload): Promise<NotificationOutcome[]> {
  const targets = notificationTargets(payload)

  const results = await Promise.allSettled(
    targets.map(target =>
      axios.post(`${config.notifications.baseUrl}/${target}`, payload, {
        timeout: config.notifications.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      })
    )
  )

  return results.map((result, i) => {
    const target = targets[i]
    if (result.status === 'rejected') {
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason)
      logger.warn('Order notification failed', { target, orderNumber: payload.order_number, reason })
      return { target, delivered: false }
    }
    return { target, delivered: true }
  })
}

/** Queues the notifications for a later tick and returns immediately. */
export function dispatchOrderNotifications(payload: OrderNotificationPayload): void {
  if (!config.notifications.enabled) return

  setImmediate(() => {
    sendOrderNotifications(payload).catch((err: unknown) => {
      logger.warn('Order notification dispatch crashed', { orderNumber: payload.order_number, err })
    })
  })
}
