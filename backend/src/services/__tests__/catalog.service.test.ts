import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type Database from 'better-sqlite3'
import { closeDatabase } from '../../database/sqlite'
import { addLine } from '../cart.service'
import { checkout } from '../checkout.service'
import { updateOrderStatus } from '../order.service'
import {
  checkAvailability, createProduct, createRoom, getProduct, getRoom, listCategories, listProducts, listRooms,
} from '../catalog.service'
import { appErrorOf, insertProduct, insertRoom, insertUser, openTestDatabase } from '../../__tests__/fixtures'

describe('room availability', () => {
  let db: Database.Database
  let roomId: number
  let orderId: number

  beforeEach(() => {
    db = openTestDatabase()
    const userId = insertUser(db)
    roomId = insertRoom(db)
    addLine(userId, { kind: 'room', itemId: roomId, quantity: 1, stay: { checkIn: '2025-06-01', checkOut: '2025-06-05' } })
    orderId = checkout(userId, { customer_name: 'Ada Guest', customer_phone: '+15550001111' }).order_id
  })

  afterEach(() => {
    closeDatabase()
  })

  it('reports an overlapping stay as unavailable', () => {
    expect(checkAvailability(roomId, { checkIn: '2025-06-03', checkOut: '2025-06-06' })).toEqual({
      available: false,
      room_id: roomId,
      check_in_date: '2025-06-03',
      check_out_date: '2025-06-06',
      conflicting_bookings: 1,
    })
  })

  it('allows a stay starting on the booked check-out day', () => {
    expect(checkAvailability(roomId, { checkIn: '2025-06-05', checkOut: '2025-06-08' }).available).toBe(true)
  })

  it('allows a stay ending on the booked check-in day', () => {
    expect(checkAvailability(roomId, { checkIn: '2025-05-28', checkOut: '2025-06-01' }).available).toBe(true)
  })

  it('ignores bookings of other rooms', () => {
    const otherRoom = insertRoom(db)
    expect(checkAvailability(otherRoom, { checkIn: '2025-06-02', checkOut: '2025-06-03' }).available).toBe(true)
  })

  it('frees the room once the order is cancelled', () => {
    updateOrderStatus(orderId, 'cancelled')
    expect(checkAvailability(roomId, { checkIn: '2025-06-03', checkOut: '2025-06-06' })).toMatchObject({
      available: true,
      conflicting_bookings: 0,
    })
  })

  it('rejects empty or inverted ranges', () => {
    const err = appErrorOf(() => checkAvailability(roomId, { checkIn: '2025-06-05', checkOut: '2025-06-05' }))
    expect(err.kind).toBe('invalid_argument')
    expect(err.message).toBe('check_out_date must be after check_in_date')
  })

  it('rejects an unknown room', () => {
    expect(appErrorOf(() => checkAvailability(9999, { checkIn: '2025-06-01', checkOut: '2025-06-02' })).message)
      .toBe('Room not found')
  })
})

describe('catalog', () => {
  let db: Database.Database

  beforeEach(() => {
    db = openTestDatabase()
  })

  afterEach(() => {
    closeDatabase()
  })

  it('lists only available rooms ordered by number', () => {
    insertRoom(db, { roomNumber: '201' })
    insertRoom(db, { roomNumber: '101' })
    insertRoom(db, { roomNumber: '301', available: false })

    expect(listRooms().map(r => r.room_number)).toEqual(['101', '201'])
  })

  it('parses stored JSON columns and flags', () => {
    const id = insertRoom(db, { roomNumber: '101' })
    expect(getRoom(id)).toMatchObject({ amenities: ['WiFi'], images: [], is_available: true })
  })

  it('creates a room and refuses a duplicate room number', () => {
    const room = createRoom({ room_number: '401', room_type: 'suite', title: 'Sky Suite', price_per_night: 299.99, max_occupancy: 4 })
    expect(room).toMatchObject({ room_number: '401', description: null, amenities: [], is_available: true })

    const err = appErrorOf(() => createRoom({ room_number: '401', room_type: 'single', title: 'Copy', price_per_night: 50, max_occupancy: 1 }))
    expect(err.kind).toBe('invalid_argument')
    expect(err.message).toBe('Room number 401 already exists')
  })

  it('filters active products by category', () => {
    insertProduct(db, { name: 'Breakfast Buffet', category: 'dining' })
    insertProduct(db, { name: 'Airport Transfer', category: 'transport' })
    insertProduct(db, { name: 'Welcome Wine', category: 'dining' })
    insertProduct(db, { name: 'Old Menu', category: 'dining', active: false })

    expect(listProducts('dining').map(p => p.name)).toEqual(['Breakfast Buffet', 'Welcome Wine'])
    expect(listProducts().map(p => p.name)).toEqual(['Breakfast Buffet', 'Welcome Wine', 'Airport Transfer'])
    expect(listCategories()).toEqual([
      { category: 'dining', product_count: 2 },
      { category: 'transport', product_count: 1 },
    ])
  })

  it('hides inactive products', () => {
    const id = insertProduct(db, { active: false })
    expect(appErrorOf(() => getProduct(id)).message).toBe('Product not found')
  })

  it('creates a product', () => {
    const product = createProduct({ name: 'Late Checkout', price: 25, category: 'services', stock_quantity: 100 })
    expect(getProduct(product.id)).toMatchObject({ name: 'Late Checkout', price: 25, is_active: true, images: [] })
  })
})
