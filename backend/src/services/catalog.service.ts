/**
 * Catalog store for rooms and products.
 */
import { getDb, nowIso, toJson } from '../database/sqlite'
import type { StayRange } from '../models/Cart.model'
import {
  parseProduct, parseRoom,
  type Product, type ProductCategory, type ProductRow, type Room, type RoomRow,
} from '../models/Catalog.model'
import { OCCUPYING_BOOKING_STATUSES } from '../models/Order.model'
import { AppError } from '../utils/errors'
import { logger } from '../utils/logger'

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE'
}

// ─── Rooms ────────────────────────────────────────────────────────

export function listRooms(): Room[] {
  const rows = getDb().prepare('SELECT * FROM rooms WHERE is_available = 1 ORDER BY room_number').all() as RoomRow[]
  return rows.map(parseRoom)
}

export function getRoom(id: number): Room {
  const row = getDb().prepare('SELECT * FROM rooms WHERE id = ?').get(id) as RoomRow | undefined
  if (!row) throw AppError.notFound('Room not found')
  return parseRoom(row)
}

export interface AvailabilityResult {
  available: boolean
  room_id: number
  check_in_date: string
  check_out_date: string
  conflicting_bookings: number
}

/**
 * Counts live bookings overlapping [checkIn, checkOut). Advisory only:
 * checkout does not take this into account.
 */
export function checkAvailability(roomId: number, stay: StayRange): AvailabilityResult {
  if (stay.checkIn >= stay.checkOut) {
    throw AppError.invalidArgument('check_out_date must be after check_in_date')
  }

  const db = getDb()
  if (!db.prepare('SELECT 1 FROM rooms WHERE id = ?').get(roomId)) {
    throw AppError.notFound('Room not found')
  }

  const placeholders = OCCUPYING_BOOKING_STATUSES.map(() => '?').join(', ')
  // Stays are half-open: [a, b) and [c, d) overlap iff a < d and c < b
  const { cnt } = db.prepare(`
    SELECT COUNT(*) AS cnt FROM room_bookings
    WHERE room_id = ?
      AND status IN (${placeholders})
      AND check_in_date < ? AND ? < check_out_date
  `).get(roomId, ...OCCUPYING_BOOKING_STATUSES, stay.checkOut, stay.checkIn) as { cnt: number }

  return {
    available: cnt === 0,
    room_id: roomId,
    check_in_date: stay.checkIn,
    check_out_date: stay.checkOut,
    conflicting_bookings: cnt,
  }
}

export interface CreateRoomInput {
  room_number: string
  room_type: string
  title: string
  description?: string
  price_per_night: number
  max_occupancy: number
  amenities?: string[]
  images?: string[]
}

export function createRoom(input: CreateRoomInput): Room {
  const db = getDb()
  const now = nowIso()
  try {
    const result = db.prepare(`
      INSERT INTO rooms (room_number, room_type, title, description, price_per_night, max_occupancy, amenities, images, is_available, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?)
    `).run(
      input.room_number, input.room_type, input.title, input.description || null,
      input.price_per_night, input.max_occupancy, toJson(input.amenities || []), toJson(input.images || []),
      now, now
    )
    const room = getRoom(Number(result.lastInsertRowid))
    logger.info('Room created', { roomId: room.id, roomNumber: room.room_number })
    return room
  } catch (err) {
    if (isUniqueViolation(err)) throw AppError.invalidArgument(`Room number ${input.room_number} already exists`)
    throw err
  }
}

// ─── Products ─────────────────────────────────────────────────────

export function listProducts(category?: string): Product[] {
  const db = getDb()
  const rows = category
    ? db.prepare('SELECT * FROM products WHERE is_active = 1 AND category = ? ORDER BY name').all(category)
    : db.prepare('SELECT * FROM products WHERE is_active = 1 ORDER BY category, name').all()
  return (rows as ProductRow[]).map(parseProduct)
}

export function getProduct(id: number): Product {
  const row = getDb().prepare('SELECT * FROM products WHERE id = ? AND is_active = 1').get(id) as ProductRow | undefined
  if (!row) throw AppError.notFound('Product not found')
  return parseProduct(row)
}

export function listCategories(): ProductCategory[] {
  return getDb().prepare(`
    SELECT category, COUNT(*) AS product_count
    FROM products
    WHERE is_active = 1
    GROUP BY category
    ORDER BY category
  `).all() as ProductCategory[]
}

export interface CreateProductInput {
  name: string
  description?: string
  price: number
  category: string
  stock_quantity: number
  images?: string[]
}

export function createProduct(input: CreateProductInput): Product {
  const now = nowIso()
  const result = getDb().prepare(`
    INSERT INTO products (name, description, price, category, stock_quantity, images, is_active, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, 1, ?, ?)
  `).run(
    input.name, input.description || null, input.price, input.category,
    input.stock_quantity, toJson(input.images || []), now, now
  )
  const product = getProduct(Number(result.lastInsertRowid))
  logger.info('Product created', { productId: product.id, name: product.name })
  return product
}
