/**
 * Checkout turns a customer's cart into an order, its line snapshots and
 * room bookings in one SQLite transaction, then notifies in the background.
 *
 * Availability is not re-checked here: two checkouts for overlapping stays
 * of the same room can both succeed.
 */
import crypto from 'crypto'
import type Database from 'better-sqlite3'
import { getDb, nowIso } from '../database/sqlite'
import type { CheckoutResult, ContactInfo, OrderLineDraft } from '../models/Order.model'
import { AppError } from '../utils/errors'
import { logger } from '../utils/logger'
import { clearCart, readCart } from './cart.service'
import { dispatchOrderNotifications, type NotificationLine } from './notification.service'
import { fromCents, priceCart } from './pricing'

/**
 * ORD-<base36 ms>-<customer>-<6 hex>. Unique per customer by the random part;
 * the orders.order_number UNIQUE constraint backs it up.
 */
export function generateOrderNumber(userId: number, now: number = Date.now()): string {
  const ts = now.toString(36).toUpperCase()
  const rand = crypto.randomBytes(3).toString('hex').toUpperCase()
  return `ORD-${ts}-${userId}-${rand}`
}

interface PlacedOrder extends CheckoutResult {
  lines: OrderLineDraft[]
}

function placeOrder(db: Database.Database, userId: number, contact: ContactInfo): PlacedOrder {
  const { lines: cartLines, orphans } = readCart(db, userId)

  if (cartLines.length === 0 && orphans.length === 0) {
    throw AppError.invalidState('Cart is empty')
  }
  if (orphans.length > 0) {
    const [first] = orphans
    throw AppError.notFound(`Cart item ${first.id} refers to a ${first.kind} that no longer exists`)
  }

  const { lines, totalCents } = priceCart(cartLines)
  const orderNumber = generateOrderNumber(userId)
  const createdAt = nowIso()

  const order = db.prepare(`
    INSERT INTO orders (user_id, order_number, total_amount_cents, status, customer_name, customer_phone, customer_email, notes, created_at, updated_at)
    VALUES (?, ?, ?, 'pending', ?, ?, ?, ?, ?, ?)
  `).run(
    userId, orderNumber, totalCents, contact.customer_name, contact.customer_phone,
    contact.customer_email || null, contact.notes || null, createdAt, createdAt
  )
  const orderId = Number(order.lastInsertRowid)

  const insertItem = db.prepare(`
    INSERT INTO order_items (order_id, item_type, item_id, item_name, quantity, unit_price_cents, total_price_cents, check_in_date, check_out_date, nights, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `)
  const insertBooking = db.prepare(`
    INSERT INTO room_bookings (room_id, order_id, order_item_id, check_in_date, check_out_date, guest_count, status, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, 'confirmed', ?, ?)
  `)

  for (const line of lines) {
    const stay = line.kind === 'room' ? line.stay : null
    const nights = line.kind === 'room' ? line.nights : null
    const item = insertItem.run(
      orderId, line.kind, line.itemId, line.itemName, line.quantity, line.unitPriceCents, line.totalCents,
      stay?.checkIn ?? null, stay?.checkOut ?? null, nights, createdAt
    )

    // Guest count mirrors the line quantity
    if (stay) {
      insertBooking.run(
        line.itemId, orderId, Number(item.lastInsertRowid), stay.checkIn, stay.checkOut,
        line.quantity, createdAt, createdAt
      )
    }
  }

  clearCart(userId, db)

  return { order_id: orderId, order_number: orderNumber, total_amount: fromCents(totalCents), created_at: createdAt, lines }
}

function toNotificationLine(line: OrderLineDraft): NotificationLine {
  const base: NotificationLine = {
    item_type: line.kind,
    item_id: line.itemId,
    item_name: line.itemName,
    quantity: line.quantity,
    unit_price: fromCents(line.unitPriceCents),
    total_price: fromCents(line.totalCents),
  }
  if (line.kind === 'room' && line.stay) {
    return { ...base, check_in_date: line.stay.checkIn, check_out_date: line.stay.checkOut, nights: line.nights ?? undefined }
  }
  return base
}

export function checkout(userId: number, contact: ContactInfo): CheckoutResult {
  const db = getDb()
  // better-sqlite3 rolls the whole transaction back if placeOrder throws
  const placed = db.transaction(() => placeOrder(db, userId, contact))()

  logger.info('Order placed', {
    userId,
    orderId: placed.order_id,
    orderNumber: placed.order_number,
    total: placed.total_amount,
    lines: placed.lines.length,
  })

  dispatchOrderNotifications({
    order_number: placed.order_number,
    customer_name: contact.customer_name,
    customer_phone: contact.customer_phone,
    customer_email: contact.customer_email || null,
    total_amount: placed.total_amount,
    status: 'pending',
    notes: contact.notes || null,
    items: placed.lines.map(toNotificationLine),
  })

  return {
    order_id: placed.order_id,
    order_number: placed.order_number,
    total_amount: placed.total_amount,
    created_at: placed.created_at,
  }
}
