/**
 * Database seeder: demo guest and admin accounts plus a small demo catalog
 * Usage: npm run seed
 */
import type Database from 'better-sqlite3'
import { config } from '../config'
import { closeDatabase, initDatabase, nowIso, toJson } from '../database/sqlite'
import { logger } from './logger'

export const ADMIN_PHONE = '+1234567890'
export const DEMO_GUEST_PHONE = '+10000000000'

const ROOMS = [
  {
    room_number: '101', room_type: 'single', title: 'Cozy Single Room',
    description: 'A comfortable single room with a garden view',
    price_per_night: 89.99, max_occupancy: 1,
    amenities: ['WiFi', 'TV', 'Air Conditioning', 'Mini Fridge'],
  },
  {
    room_number: '201', room_type: 'double', title: 'Deluxe Double Room',
    description: 'Spacious double room with a city view and a work desk',
    price_per_night: 149.99, max_occupancy: 2,
    amenities: ['WiFi', 'TV', 'Air Conditioning', 'Mini Bar', 'Work Desk'],
  },
  {
    room_number: '301', room_type: 'suite', title: 'Executive Suite',
    description: 'Suite with a separate living area and a panoramic view',
    price_per_night: 299.99, max_occupancy: 4,
    amenities: ['WiFi', 'Smart TV', 'Air Conditioning', 'Mini Bar', 'Jacuzzi', 'Room Service'],
  },
]

const PRODUCTS = [
  { name: 'Spa Package', description: 'Full-body massage and sauna access', price: 120.0, category: 'wellness', stock_quantity: 20 },
  { name: 'Airport Transfer', description: 'Private car to or from the airport', price: 45.0, category: 'transport', stock_quantity: 50 },
  { name: 'Breakfast Buffet', description: 'Daily breakfast buffet for one guest', price: 18.5, category: 'dining', stock_quantity: 200 },
  { name: 'Welcome Wine', description: 'Bottle of house wine delivered to the room', price: 35.0, category: 'dining', stock_quantity: 40 },
  { name: 'Late Checkout', description: 'Keep the room until 4pm', price: 25.0, category: 'services', stock_quantity: 100 },
]

export interface SeedSummary {
  demoGuestCreated: boolean
  adminCreated: boolean
  rooms: number
  products: number
}

/**
 * Inserts the demo guest, the admin user and the demo catalog. Rows that
 * already exist are left alone. The guest takes DEMO_USER_ID so callers
 * without an identity land on a plain customer account.
 */
export function seedDatabase(db: Database.Database): SeedSummary {
  const now = nowIso()

  const insertDemoGuest = db.prepare(`
    INSERT OR IGNORE INTO users (id, phone_number, name, email, is_admin, created_at, updated_at)
    VALUES (?, ?, 'Demo Guest', NULL, 0, ?, ?)
  `)
  const insertAdmin = db.prepare(`
    INSERT OR IGNORE INTO users (phone_number, name, email, is_admin, created_at, updated_at)
    VALUES (?, 'Hotel Admin', 'admin@hotel.example', 1, ?, ?)
  `)
  const insertRoom = db.prepare(`
    INSERT OR IGNORE INTO rooms (room_number, room_type, title, description, price_per_night, max_occupancy, amenities, images, is_available, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, '[]', 1, ?, ?)
  `)
  const findProduct = db.prepare('SELECT id FROM products WHERE name = ?')
  const insertProduct = db.prepare(`
    INSERT INTO products (name, description, price, category, stock_quantity, images, is_active, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, '[]', 1, ?, ?)
  `)

  return db.transaction((): SeedSummary => {
    const demoGuestCreated = insertDemoGuest.run(config.auth.demoUserId, DEMO_GUEST_PHONE, now, now).changes > 0
    const adminCreated = insertAdmin.run(ADMIN_PHONE, now, now).changes > 0

    let rooms = 0
    for (const r of ROOMS) {
      rooms += insertRoom.run(
        r.room_number, r.room_type, r.title, r.description,
        r.price_per_night, r.max_occupancy, toJson(r.amenities), now, now
      ).changes
    }

    let products = 0
    for (const p of PRODUCTS) {
      if (findProduct.get(p.name)) continue
      products += insertProduct.run(p.name, p.description, p.price, p.category, p.stock_quantity, now, now).changes
    }

    return { demoGuestCreated, adminCreated, rooms, products }
  })()
}

if (require.main === module) {
  const summary = seedDatabase(initDatabase())
  logger.info('Seeding complete', { ...summary })
  logger.info(`Admin login phone: ${ADMIN_PHONE}`)
  closeDatabase()
}
