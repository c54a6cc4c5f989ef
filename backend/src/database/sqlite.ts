/**
 * SQLite Database Layer
 * File-based storage through better-sqlite3; tests open ':memory:'.
 */
import Database from 'better-sqlite3'
import fs from 'fs'
import path from 'path'
import { config } from '../config'
import { logger } from '../utils/logger'

let _db: Database.Database | null = null

export function initDatabase(dbPath: string = config.db.path): Database.Database {
  if (_db) closeDatabase()

  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath)
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true })
  }

  _db = new Database(dbPath, { timeout: config.db.busyTimeoutMs })
  if (dbPath !== ':memory:') _db.pragma('journal_mode = WAL')
  _db.pragma('foreign_keys = ON')

  createTables(_db)
  logger.info('SQLite database ready', { path: dbPath })
  return _db
}

export function getDb(): Database.Database {
  if (!_db) throw new Error('Database not initialized')
  return _db
}

export function closeDatabase(): void {
  _db?.close()
  _db = null
}

// ─── Helpers ──────────────────────────────────────────────────────

export function toJson(val: unknown): string {
  return JSON.stringify(val ?? null)
}

export function fromJson<T>(str: string | null | undefined, fallback: T): T {
  if (!str) return fallback
  try { return JSON.parse(str) as T } catch { return fallback }
}

export function nowIso(): string {
  return new Date().toISOString()
}

// ─── Schema ───────────────────────────────────────────────────────

function createTables(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      phone_number TEXT NOT NULL UNIQUE,
      name TEXT,
      email TEXT,
      is_admin INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS otps (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      phone_number TEXT NOT NULL,
      otp_code TEXT NOT NULL,
      expires_at TEXT NOT NULL,
      is_used INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_otps_phone_expires ON otps(phone_number, expires_at);

    CREATE TABLE IF NOT EXISTS rooms (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      room_number TEXT NOT NULL UNIQUE,
      room_type TEXT NOT NULL,
      title TEXT NOT NULL,
      description TEXT,
      price_per_night REAL NOT NULL,
      max_occupancy INTEGER NOT NULL,
      amenities TEXT DEFAULT '[]',
      images TEXT DEFAULT '[]',
      is_available INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS products (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      description TEXT,
      price REAL NOT NULL,
      category TEXT,
      stock_quantity INTEGER NOT NULL DEFAULT 0,
      images TEXT DEFAULT '[]',
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_products_category ON products(category);
    CREATE INDEX IF NOT EXISTS idx_products_active ON products(is_active);

    CREATE TABLE IF NOT EXISTS cart_items (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      item_type TEXT NOT NULL CHECK (item_type IN ('room', 'product')),
      item_id INTEGER NOT NULL,
      quantity INTEGER NOT NULL DEFAULT 1 CHECK (quantity >= 1),
      check_in_date TEXT,
      check_out_date TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_cart_items_user_id ON cart_items(user_id);
    -- NULL dates compare equal here so a product or undated room has one line
    CREATE UNIQUE INDEX IF NOT EXISTS uq_cart_items_line ON cart_items(
      user_id, item_type, item_id, IFNULL(check_in_date, ''), IFNULL(check_out_date, '')
    );

    CREATE TABLE IF NOT EXISTS orders (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users(id),
      order_number TEXT NOT NULL UNIQUE,
      total_amount_cents INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending'
        CHECK (status IN ('pending', 'confirmed', 'cancelled', 'completed')),
      customer_name TEXT NOT NULL,
      customer_phone TEXT NOT NULL,
      customer_email TEXT,
      notes TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_orders_user_id ON orders(user_id);
    CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status);
    CREATE INDEX IF NOT EXISTS idx_orders_created_at ON orders(created_at);

    CREATE TABLE IF NOT EXISTS order_items (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      order_id INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
      item_type TEXT NOT NULL CHECK (item_type IN ('room', 'product')),
      item_id INTEGER NOT NULL,
      item_name TEXT NOT NULL,
      quantity INTEGER NOT NULL DEFAULT 1,
      unit_price_cents INTEGER NOT NULL,
      total_price_cents INTEGER NOT NULL,
      check_in_date TEXT,
      check_out_date TEXT,
      nights INTEGER,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_order_items_order_id ON order_items(order_id);

    CREATE TABLE IF NOT EXISTS room_bookings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      room_id INTEGER NOT NULL REFERENCES rooms(id),
      order_id INTEGER NOT NULL REFERENCES orders(id),
      order_item_id INTEGER NOT NULL UNIQUE REFERENCES order_items(id),
      check_in_date TEXT NOT NULL,
      check_out_date TEXT NOT NULL,
      guest_count INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'confirmed'
        CHECK (status IN ('confirmed', 'checked_in', 'checked_out', 'cancelled')),
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_room_bookings_room_id_dates
      ON room_bookings(room_id, check_in_date, check_out_date);
    CREATE INDEX IF NOT EXISTS idx_room_bookings_order_id ON room_bookings(order_id);
  `)
}
