/**
 * Admin reporting: the dashboard summary, order analytics over a date range,
 * room occupancy and the order-line CSV export.
 *
 * Order dates are compared on the YYYY-MM-DD prefix of `created_at`, and
 * both ends of a range are inclusive.
 */
import { getDb } from '../database/sqlite'
import type { OrderStatus } from '../models/Order.model'
import { daysBetween, fromCents } from './pricing'

export interface DashboardStats {
  orders: { total: number; pending: number; confirmed: number; completed: number; cancelled: number; revenue: number }
  rooms: { total: number; available: number; occupied_today: number }
  products: { total: number; active: number }
  recent_orders: {
    id: number
    order_number: string
    customer_name: string
    total_amount: number
    status: OrderStatus
    created_at: string
  }[]
}

// Orders whose money counts as earned
const EARNING_STATUSES = `('confirmed', 'completed')`

function count(sql: string, ...params: unknown[]): number {
  return (getDb().prepare(sql).get(...params) as { cnt: number }).cnt
}

/** `today` is YYYY-MM-DD; a room is occupied when a confirmed or checked-in stay covers it. */
export function getDashboardStats(today: string = new Date().toISOString().slice(0, 10)): DashboardStats {
  const db = getDb()

  const byStatus = db.prepare('SELECT status, COUNT(*) AS cnt FROM orders GROUP BY status').all() as { status: OrderStatus; cnt: number }[]
  const statusCount = (status: OrderStatus) => byStatus.find(s => s.status === status)?.cnt ?? 0
  const { revenue_cents } = db.prepare(`
    SELECT COALESCE(SUM(total_amount_cents), 0) AS revenue_cents FROM orders WHERE status IN ${EARNING_STATUSES}
  `).get() as { revenue_cents: number }

  return {
    orders: {
      total: byStatus.reduce((sum, s) => sum + s.cnt, 0),
      pending: statusCount('pending'),
      confirmed: statusCount('confirmed'),
      completed: statusCount('completed'),
      cancelled: statusCount('cancelled'),
      revenue: fromCents(revenue_cents),
    },
    rooms: {
      total: count('SELECT COUNT(*) AS cnt FROM rooms'),
      available: count('SELECT COUNT(*) AS cnt FROM rooms WHERE is_available = 1'),
      occupied_today: count(`
        SELECT COUNT(DISTINCT room_id) AS cnt FROM room_bookings
        WHERE status IN ('confirmed', 'checked_in') AND check_in_date <= ? AND check_out_date > ?
      `, today, today),
    },
    products: {
      total: count('SELECT COUNT(*) AS cnt FROM products'),
      active: count('SELECT COUNT(*) AS cnt FROM products WHERE is_active = 1'),
    },
    recent_orders: db.prepare(`
      SELECT id, order_number, customer_name, total_amount_cents / 100.0 AS total_amount, status, created_at
      FROM orders ORDER BY created_at DESC, id DESC LIMIT 5
    `).all() as DashboardStats['recent_orders'],
  }
}

// ─── Analytics ────────────────────────────────────────────────────

export interface DateRangeFilter {
  start?: string
  end?: string
}

const TOP_ITEMS = 10

export interface OrderAnalytics {
  summary: {
    total_orders: number
    total_revenue: number
    average_order_value: number
    room_revenue: number
    product_revenue: number
  }
  order_status_distribution: Partial<Record<OrderStatus, number>>
  daily_revenue: Record<string, number>
  top_items_by_quantity: { item_name: string; quantity: number }[]
  top_items_by_revenue: { item_name: string; revenue: number }[]
  date_range: { start: string; end: string }
}

function orderDateWhere(range: DateRangeFilter, alias: string): { sql: string; params: string[] } {
  const clauses: string[] = []
  const params: string[] = []
  if (range.start) {
    clauses.push(`substr(${alias}.created_at, 1, 10) >= ?`)
    params.push(range.start)
  }
  if (range.end) {
    clauses.push(`substr(${alias}.created_at, 1, 10) <= ?`)
    params.push(range.end)
  }
  return { sql: clauses.length ? `WHERE ${clauses.join(' AND ')}` : '', params }
}

/** Every order in the range counts, whatever its status. */
export function getOrderAnalytics(range: DateRangeFilter = {}): OrderAnalytics {
  const db = getDb()
  const where = orderDateWhere(range, 'o')

  const { orders, revenue_cents } = db.prepare(`
    SELECT COUNT(*) AS orders, COALESCE(SUM(o.total_amount_cents), 0) AS revenue_cents FROM orders o ${where.sql}
  `).get(...where.params) as { orders: number; revenue_cents: number }

  const byKind = db.prepare(`
    SELECT oi.item_type, SUM(oi.total_price_cents) AS cents
    FROM order_items oi JOIN orders o ON o.id = oi.order_id
    ${where.sql}
    GROUP BY oi.item_type
  `).all(...where.params) as { item_type: string; cents: number }[]
  const kindCents = (kind: string) => byKind.find(k => k.item_type === kind)?.cents ?? 0

  const statuses = db.prepare(`
    SELECT o.status, COUNT(*) AS cnt FROM orders o ${where.sql} GROUP BY o.status ORDER BY o.status
  `).all(...where.params) as { status: OrderStatus; cnt: number }[]

  const days = db.prepare(`
    SELECT substr(o.created_at, 1, 10) AS day, SUM(o.total_amount_cents) AS cents
    FROM orders o ${where.sql}
    GROUP BY day ORDER BY day
  `).all(...where.params) as { day: string; cents: number }[]

  const items = db.prepare(`
    SELECT oi.item_name, SUM(oi.quantity) AS quantity, SUM(oi.total_price_cents) AS cents
    FROM order_items oi JOIN orders o ON o.id = oi.order_id
    ${where.sql}
    GROUP BY oi.item_name
  `).all(...where.params) as { item_name: string; quantity: number; cents: number }[]

  const byQuantity = [...items].sort((a, b) => b.quantity - a.quantity || a.item_name.localeCompare(b.item_name))
  const byRevenue = [...items].sort((a, b) => b.cents - a.cents || a.item_name.localeCompare(b.item_name))

  return {
    summary: {
      total_orders: orders,
      total_revenue: fromCents(revenue_cents),
      average_order_value: orders > 0 ? fromCents(Math.round(revenue_cents / orders)) : 0,
      room_revenue: fromCents(kindCents('room')),
      product_revenue: fromCents(kindCents('product')),
    },
    order_status_distribution: Object.fromEntries(statuses.map(s => [s.status, s.cnt])),
    daily_revenue: Object.fromEntries(days.map(d => [d.day, fromCents(d.cents)])),
    top_items_by_quantity: byQuantity.slice(0, TOP_ITEMS).map(i => ({ item_name: i.item_name, quantity: i.quantity })),
    top_items_by_revenue: byRevenue.slice(0, TOP_ITEMS).map(i => ({ item_name: i.item_name, revenue: fromCents(i.cents) })),
    date_range: { start: range.start ?? 'all time', end: range.end ?? 'all time' },
  }
}

// ─── Occupancy ────────────────────────────────────────────────────

export interface RoomStay {
  check_in: string
  check_out: string
  nights: number
  order_number: string
}

export interface RoomOccupancy {
  period: { start_date: string; end_date: string; total_days: number }
  rooms: {
    total_rooms: number
    total_room_nights_available: number
    booked_room_nights: number
    occupancy_rate: number
  }
  room_bookings: Record<string, RoomStay[]>
}

/**
 * Room-nights sold against room-nights available for the nights of `start`
 * through `end`. Counts dated room lines of confirmed and completed orders.
 */
export function getRoomOccupancy(start: string, end: string): RoomOccupancy {
  const db = getDb()
  const totalDays = daysBetween(start, end) + 1
  const totalRooms = count('SELECT COUNT(*) AS cnt FROM rooms')
  const available = totalRooms * totalDays

  const stays = db.prepare(`
    SELECT oi.item_name, oi.check_in_date, oi.check_out_date, oi.nights, oi.quantity, o.order_number
    FROM order_items oi JOIN orders o ON o.id = oi.order_id
    WHERE oi.item_type = 'room' AND o.status IN ${EARNING_STATUSES}
      AND oi.check_in_date IS NOT NULL AND oi.check_out_date IS NOT NULL
      AND oi.check_in_date <= ? AND oi.check_out_date > ?
    ORDER BY oi.check_in_date, oi.id
  `).all(end, start) as {
    item_name: string
    check_in_date: string
    check_out_date: string
    nights: number | null
    quantity: number
    order_number: string
  }[]

  let booked = 0
  const roomBookings: Record<string, RoomStay[]> = {}
  for (const stay of stays) {
    const from = Math.max(daysBetween(start, stay.check_in_date), 0)
    const to = Math.min(daysBetween(start, stay.check_out_date), totalDays)
    booked += Math.max(0, to - from) * stay.quantity

    const list = roomBookings[stay.item_name] ?? (roomBookings[stay.item_name] = [])
    list.push({
      check_in: stay.check_in_date,
      check_out: stay.check_out_date,
      nights: stay.nights ?? 1,
      order_number: stay.order_number,
    })
  }

  return {
    period: { start_date: start, end_date: end, total_days: totalDays },
    rooms: {
      total_rooms: totalRooms,
      total_room_nights_available: available,
      booked_room_nights: booked,
      occupancy_rate: available > 0 ? Math.round((booked / available) * 10000) / 100 : 0,
    },
    room_bookings: roomBookings,
  }
}

// ─── CSV export ───────────────────────────────────────────────────

export const ORDER_EXPORT_COLUMNS = [
  'order_number', 'customer_name', 'customer_phone', 'customer_email',
  'total_amount', 'status', 'created_at', 'item_name', 'item_type',
  'quantity', 'unit_price', 'check_in_date', 'check_out_date', 'nights',
] as const

type ExportColumn = typeof ORDER_EXPORT_COLUMNS[number]
type ExportRow = Record<ExportColumn, string | number | null>

function csvField(value: string | number | null): string {
  if (value === null) return ''
  const text = String(value)
  if (/[",\r\n]/.test(text)) return `"${text.replace(/"/g, '""')}"`
  return text
}

/** One row per order line, oldest order first. */
export function exportOrderLinesCsv(range: DateRangeFilter = {}): string {
  const where = orderDateWhere(range, 'o')
  const rows = getDb().prepare(`
    SELECT o.order_number, o.customer_name, o.customer_phone, o.customer_email,
           o.total_amount_cents / 100.0 AS total_amount, o.status, o.created_at,
           oi.item_name, oi.item_type, oi.quantity, oi.unit_price_cents / 100.0 AS unit_price,
           oi.check_in_date, oi.check_out_date, oi.nights
    FROM orders o JOIN order_items oi ON oi.order_id = o.id
    ${where.sql}
    ORDER BY o.created_at, o.id, oi.id
  `).all(...where.params) as ExportRow[]

  const lines = [
    ORDER_EXPORT_COLUMNS.join(','),
    ...rows.map(row => ORDER_EXPORT_COLUMNS.map(col => csvField(row[col])).join(',')),
  ]
  return `${lines.join('\n')}\n`
}
