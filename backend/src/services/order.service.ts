/**
 * Order queries for customers and admins, and the admin status change that
 * cascades cancellations to room bookings.
 */
import { getDb, nowIso } from '../database/sqlite'
import {
  ORDER_TRANSITIONS,
  type Order, type OrderItem, type OrderStatus, type OrderWithItems,
} from '../models/Order.model'
import type { CustomerClaims } from '../models/User.model'
import { AppError } from '../utils/errors'
import { logger } from '../utils/logger'

const ORDER_COLUMNS = `
  id, user_id, order_number, total_amount_cents / 100.0 AS total_amount, status, customer_name,
  customer_phone, customer_email, notes, created_at, updated_at
`

function itemsOf(orderId: number): OrderItem[] {
  return getDb().prepare(`
    SELECT id, order_id, item_type, item_id, item_name, quantity,
           unit_price_cents / 100.0 AS unit_price, total_price_cents / 100.0 AS total_price,
           check_in_date, check_out_date, nights, created_at
    FROM order_items
    WHERE order_id = ?
    ORDER BY id
  `).all(orderId) as OrderItem[]
}

export function listOrders(userId: number): OrderWithItems[] {
  const orders = getDb().prepare(`
    SELECT ${ORDER_COLUMNS} FROM orders
    WHERE user_id = ?
    ORDER BY created_at DESC, id DESC
  `).all(userId) as Order[]

  return orders.map(order => ({ ...order, items: itemsOf(order.id) }))
}

/** A customer sees only their own orders; admins see any. */
export function getOrder(claims: CustomerClaims, orderId: number): OrderWithItems {
  const order = getDb().prepare(`SELECT ${ORDER_COLUMNS} FROM orders WHERE id = ?`).get(orderId) as Order | undefined
  if (!order || (!claims.isAdmin && order.user_id !== claims.userId)) {
    throw AppError.notFound('Order not found')
  }
  return { ...order, items: itemsOf(order.id) }
}

export interface OrderPageQuery {
  status?: OrderStatus
  limit: number
  offset: number
}

export interface OrderPage {
  orders: Order[]
  count: number
  total_count: number
  status: OrderStatus | null
}

export function listAllOrders(query: OrderPageQuery): OrderPage {
  const db = getDb()
  const where = query.status ? 'WHERE status = ?' : ''
  const params: unknown[] = query.status ? [query.status] : []

  const orders = db.prepare(`
    SELECT ${ORDER_COLUMNS} FROM orders ${where}
    ORDER BY created_at DESC, id DESC
    LIMIT ? OFFSET ?
  `).all(...params, query.limit, query.offset) as Order[]
  const total = (db.prepare(`SELECT COUNT(*) AS cnt FROM orders ${where}`).get(...params) as { cnt: number }).cnt

  return { orders, count: orders.length, total_count: total, status: query.status ?? null }
}

export interface StatusChange {
  order_id: number
  status: OrderStatus
  previous_status: OrderStatus
  changed: boolean
  cancelled_bookings: number
}

export function updateOrderStatus(orderId: number, status: OrderStatus, notes?: string): StatusChange {
  const db = getDb()

  const apply = db.transaction((): StatusChange => {
    const row = db.prepare('SELECT status FROM orders WHERE id = ?').get(orderId) as { status: OrderStatus } | undefined
    if (!row) throw AppError.notFound('Order not found')

    const previous = row.status
    const now = nowIso()

    if (previous === status) {
      if (notes !== undefined) {
        db.prepare('UPDATE orders SET notes = ?, updated_at = ? WHERE id = ?').run(notes, now, orderId)
      }
      return { order_id: orderId, status, previous_status: previous, changed: false, cancelled_bookings: 0 }
    }

    if (!ORDER_TRANSITIONS[previous].includes(status)) {
      throw AppError.invalidState(`Cannot change order status from ${previous} to ${status}`)
    }

    if (notes !== undefined) {
      db.prepare('UPDATE orders SET status = ?, notes = ?, updated_at = ? WHERE id = ?').run(status, notes, now, orderId)
    } else {
      db.prepare('UPDATE orders SET status = ?, updated_at = ? WHERE id = ?').run(status, now, orderId)
    }

    let cancelled = 0
    if (status === 'cancelled') {
      cancelled = db.prepare(`
        UPDATE room_bookings SET status = 'cancelled', updated_at = ?
        WHERE order_id = ? AND status != 'cancelled'
      `).run(now, orderId).changes
    }

    return { order_id: orderId, status, previous_status: previous, changed: true, cancelled_bookings: cancelled }
  })

  const change = apply()
  if (change.changed) {
    logger.info('Order status changed', {
      orderId, from: change.previous_status, to: change.status, cancelledBookings: change.cancelled_bookings,
    })
  }
  return change
}
