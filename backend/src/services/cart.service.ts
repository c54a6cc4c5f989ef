/**
 * Cart store: one line per (customer, kind, item, stay range).
 */
import type Database from 'better-sqlite3'
import { getDb, nowIso, fromJson } from '../database/sqlite'
import type {
  AddLineInput, AddLineResult, CartItemView, CartJoinRow, CartLine, CartView, PricedCartLine,
} from '../models/Cart.model'
import type { ItemKind } from '../models/Catalog.model'
import { AppError } from '../utils/errors'
import { logger } from '../utils/logger'
import { fromCents, priceLine } from './pricing'

const CART_JOIN_SQL = `
  SELECT ci.id, ci.user_id, ci.item_type, ci.item_id, ci.quantity,
         ci.check_in_date, ci.check_out_date, ci.created_at,
         CASE ci.item_type WHEN 'room' THEN r.title ELSE p.name END AS item_name,
         CASE ci.item_type WHEN 'room' THEN r.price_per_night ELSE p.price END AS unit_price,
         CASE ci.item_type WHEN 'room' THEN r.images ELSE p.images END AS images
  FROM cart_items ci
  LEFT JOIN rooms r ON ci.item_type = 'room' AND ci.item_id = r.id
  LEFT JOIN products p ON ci.item_type = 'product' AND ci.item_id = p.id
  WHERE ci.user_id = ?
  ORDER BY ci.created_at DESC, ci.id DESC
`

function toCartLine(row: CartJoinRow): CartLine {
  const base = {
    id: row.id,
    userId: row.user_id,
    itemId: row.item_id,
    quantity: row.quantity,
    createdAt: row.created_at,
  }
  if (row.item_type === 'room') {
    const stay = row.check_in_date && row.check_out_date
      ? { checkIn: row.check_in_date, checkOut: row.check_out_date }
      : null
    return { ...base, kind: 'room', stay }
  }
  if (row.item_type === 'product') return { ...base, kind: 'product' }
  throw AppError.internal(`Cart item ${row.id} has unknown item type '${row.item_type}'`)
}

export interface CartContents {
  lines: PricedCartLine[]
  // Lines whose room or product row no longer exists
  orphans: CartLine[]
}

/**
 * Reads a customer's cart joined with current catalog pricing. Checkout calls
 * this inside its transaction with the same connection.
 */
export function readCart(db: Database.Database, userId: number): CartContents {
  const rows = db.prepare(CART_JOIN_SQL).all(userId) as CartJoinRow[]
  const lines: PricedCartLine[] = []
  const orphans: CartLine[] = []

  for (const row of rows) {
    const line = toCartLine(row)
    if (row.item_name === null || row.unit_price === null) {
      orphans.push(line)
      continue
    }
    lines.push({ ...line, itemName: row.item_name, unitPrice: row.unit_price, images: fromJson<string[]>(row.images, []) })
  }

  return { lines, orphans }
}

function catalogItemExists(db: Database.Database, kind: ItemKind, itemId: number): boolean {
  switch (kind) {
    case 'room':
      return db.prepare('SELECT 1 FROM rooms WHERE id = ? AND is_available = 1').get(itemId) !== undefined
    case 'product':
      return db.prepare('SELECT 1 FROM products WHERE id = ? AND is_active = 1').get(itemId) !== undefined
    default: {
      const unreachable: never = kind
      throw AppError.invalidArgument(`Invalid item type '${String(unreachable)}'. Must be 'room' or 'product'`)
    }
  }
}

export function addLine(userId: number, input: AddLineInput): AddLineResult {
  const db = getDb()

  if (!catalogItemExists(db, input.kind, input.itemId)) {
    throw AppError.notFound('Item not found')
  }

  // Products never carry a stay range
  const stay = input.kind === 'room' ? input.stay ?? null : null
  const checkIn = stay?.checkIn ?? null
  const checkOut = stay?.checkOut ?? null

  const upsert = db.transaction((): AddLineResult => {
    const existing = db.prepare(`
      SELECT id FROM cart_items
      WHERE user_id = ? AND item_type = ? AND item_id = ?
        AND check_in_date IS ? AND check_out_date IS ?
    `).get(userId, input.kind, input.itemId, checkIn, checkOut) as { id: number } | undefined

    const now = nowIso()
    if (existing) {
      db.prepare('UPDATE cart_items SET quantity = quantity + ?, updated_at = ? WHERE id = ?')
        .run(input.quantity, now, existing.id)
      return { cartItemId: existing.id, created: false }
    }

    const result = db.prepare(`
      INSERT INTO cart_items (user_id, item_type, item_id, quantity, check_in_date, check_out_date, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(userId, input.kind, input.itemId, input.quantity, checkIn, checkOut, now, now)
    return { cartItemId: Number(result.lastInsertRowid), created: true }
  })

  const result = upsert()
  logger.debug('Cart line saved', { userId, ...result, kind: input.kind, itemId: input.itemId })
  return result
}

function toView(line: PricedCartLine): CartItemView {
  const priced = priceLine(line)
  const view: CartItemView = {
    id: line.id,
    item_type: line.kind,
    item_id: line.itemId,
    item_name: line.itemName,
    quantity: line.quantity,
    unit_price: line.unitPrice,
    total_price: fromCents(priced.totalCents),
    images: line.images,
  }
  if (priced.kind === 'room') {
    if (priced.stay) {
      view.check_in_date = priced.stay.checkIn
      view.check_out_date = priced.stay.checkOut
    }
    view.nights = priced.nights ?? 1
  }
  return view
}

export function listCart(userId: number): CartView {
  const { lines, orphans } = readCart(getDb(), userId)
  if (orphans.length > 0) {
    logger.warn('Cart holds lines for missing catalog items', { userId, cartItemIds: orphans.map(o => o.id) })
  }

  const items = lines.map(toView)
  const totalCents = lines.reduce((sum, line) => sum + priceLine(line).totalCents, 0)
  return {
    cart_items: items,
    total_amount: fromCents(totalCents),
    item_count: items.length,
    user_id: userId,
  }
}

export function removeLine(userId: number, cartItemId: number): void {
  const result = getDb().prepare('DELETE FROM cart_items WHERE id = ? AND user_id = ?').run(cartItemId, userId)
  if (result.changes === 0) throw AppError.notFound('Cart item not found')
}

/** Removes every line of the customer's cart; returns how many were removed. */
export function clearCart(userId: number, db: Database.Database = getDb()): number {
  return db.prepare('DELETE FROM cart_items WHERE user_id = ?').run(userId).changes
}
