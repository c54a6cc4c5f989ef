// Shared in-memory database fixtures for service and HTTP tests.
import type Database from 'better-sqlite3'
import { initDatabase, nowIso } from '../database/sqlite'
import { AppError, isAppError } from '../utils/errors'

export function openTestDatabase(): Database.Database {
  return initDatabase(':memory:')
}

let phoneSeq = 0

export function insertUser(db: Database.Database, opts: { isAdmin?: boolean; phone?: string } = {}): number {
  const now = nowIso()
  phoneSeq += 1
  const phone = opts.phone ?? `+1555000${String(phoneSeq).padStart(4, '0')}`
  const result = db.prepare(`
    INSERT INTO users (phone_number, name, is_admin, created_at, updated_at)
    VALUES (?, 'Test Guest', ?, ?, ?)
  `).run(phone, opts.isAdmin ? 1 : 0, now, now)
  return Number(result.lastInsertRowid)
}

export function insertRoom(
  db: Database.Database,
  opts: { roomNumber?: string; price?: number; available?: boolean } = {}
): number {
  const now = nowIso()
  const roomNumber = opts.roomNumber ?? `R${Math.floor(Math.random() * 1e9)}`
  const result = db.prepare(`
    INSERT INTO rooms (room_number, room_type, title, description, price_per_night, max_occupancy, amenities, images, is_available, created_at, updated_at)
    VALUES (?, 'double', ?, NULL, ?, 2, '["WiFi"]', '[]', ?, ?, ?)
  `).run(roomNumber, `Room ${roomNumber}`, opts.price ?? 100, opts.available === false ? 0 : 1, now, now)
  return Number(result.lastInsertRowid)
}

export function insertProduct(
  db: Database.Database,
  opts: { name?: string; price?: number; category?: string; active?: boolean } = {}
): number {
  const now = nowIso()
  const result = db.prepare(`
    INSERT INTO products (name, description, price, category, stock_quantity, images, is_active, created_at, updated_at)
    VALUES (?, NULL, ?, ?, 10, '[]', ?, ?, ?)
  `).run(opts.name ?? 'Test Product', opts.price ?? 25, opts.category ?? 'dining', opts.active === false ? 0 : 1, now, now)
  return Number(result.lastInsertRowid)
}

export function countRows(db: Database.Database, table: 'orders' | 'order_items' | 'room_bookings' | 'cart_items'): number {
  return (db.prepare(`SELECT COUNT(*) AS cnt FROM ${table}`).get() as { cnt: number }).cnt
}

/** Runs `fn` and returns the AppError it throws; fails when it throws nothing or something else. */
export function appErrorOf(fn: () => unknown): AppError {
  try {
    fn()
  } catch (err) {
    if (isAppError(err)) return err
    throw err
  }
  throw new Error('Expected an AppError to be thrown')
}
