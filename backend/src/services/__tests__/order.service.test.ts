import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type Database from 'better-sqlite3'
import { closeDatabase } from '../../database/sqlite'
import type { CustomerClaims } from '../../models/User.model'
import { addLine } from '../cart.service'
import { checkout } from '../checkout.service'
import { getOrder, listAllOrders, listOrders, updateOrderStatus } from '../order.service'
import { appErrorOf, insertProduct, insertRoom, insertUser, openTestDatabase } from '../../__tests__/fixtures'

const contact = { customer_name: 'Ada Guest', customer_phone: '+15550001111' }

function claims(userId: number, isAdmin = false): CustomerClaims {
  return { userId, isAdmin, source: 'header' }
}

describe('order service', () => {
  let db: Database.Database
  let userId: number
  let roomId: number
  let productId: number

  function placeOrder(forUser: number = userId): number {
    addLine(forUser, { kind: 'room', itemId: roomId, quantity: 2, stay: { checkIn: '2025-06-01', checkOut: '2025-06-03' } })
    addLine(forUser, { kind: 'product', itemId: productId, quantity: 1 })
    return checkout(forUser, contact).order_id
  }

  function bookingStatuses(orderId: number): string[] {
    return (db.prepare('SELECT status FROM room_bookings WHERE order_id = ?').all(orderId) as { status: string }[])
      .map(b => b.status)
  }

  beforeEach(() => {
    db = openTestDatabase()
    userId = insertUser(db)
    roomId = insertRoom(db, { price: 100 })
    productId = insertProduct(db, { price: 20 })
  })

  afterEach(() => {
    closeDatabase()
  })

  describe('queries', () => {
    it('lists a customer\'s orders newest first with their lines', () => {
      const first = placeOrder()
      const second = placeOrder()
      placeOrder(insertUser(db))

      const orders = listOrders(userId)
      expect(orders.map(o => o.id)).toEqual([second, first])
      expect(orders[0].items).toHaveLength(2)
      expect(orders[0].total_amount).toBe(420)
    })

    it('hides other customers\' orders unless the caller is an admin', () => {
      const orderId = placeOrder()
      const stranger = insertUser(db)
      const admin = insertUser(db, { isAdmin: true })

      expect(getOrder(claims(userId), orderId).id).toBe(orderId)
      expect(appErrorOf(() => getOrder(claims(stranger), orderId)).message).toBe('Order not found')
      expect(getOrder(claims(admin, true), orderId).items).toHaveLength(2)
    })

    it('pages through all orders and filters by status', () => {
      const a = placeOrder()
      const b = placeOrder()
      const c = placeOrder()
      updateOrderStatus(b, 'confirmed')

      expect(listAllOrders({ limit: 2, offset: 0 })).toMatchObject({ count: 2, total_count: 3, status: null })
      expect(listAllOrders({ limit: 2, offset: 2 }).orders.map(o => o.id)).toEqual([a])

      const pending = listAllOrders({ status: 'pending', limit: 50, offset: 0 })
      expect(pending.orders.map(o => o.id)).toEqual([c, a])
      expect(pending).toMatchObject({ count: 2, total_count: 2, status: 'pending' })
    })
  })

  describe('updateOrderStatus', () => {
    it('cancels the order and its room bookings', () => {
      const orderId = placeOrder()

      expect(updateOrderStatus(orderId, 'cancelled')).toEqual({
        order_id: orderId, status: 'cancelled', previous_status: 'pending', changed: true, cancelled_bookings: 1,
      })
      expect(bookingStatuses(orderId)).toEqual(['cancelled'])
    })

    it('treats a repeated cancel as a no-op', () => {
      const orderId = placeOrder()
      updateOrderStatus(orderId, 'cancelled')

      expect(updateOrderStatus(orderId, 'cancelled')).toEqual({
        order_id: orderId, status: 'cancelled', previous_status: 'cancelled', changed: false, cancelled_bookings: 0,
      })
      expect(bookingStatuses(orderId)).toEqual(['cancelled'])
    })

    it('moves through confirmed to completed without touching bookings', () => {
      const orderId = placeOrder()
      updateOrderStatus(orderId, 'confirmed')
      const change = updateOrderStatus(orderId, 'completed', 'Guest checked out')

      expect(change).toMatchObject({ previous_status: 'confirmed', status: 'completed', changed: true, cancelled_bookings: 0 })
      expect(db.prepare('SELECT status, notes FROM orders WHERE id = ?').get(orderId))
        .toEqual({ status: 'completed', notes: 'Guest checked out' })
      expect(bookingStatuses(orderId)).toEqual(['confirmed'])
    })

    it('refuses to leave a terminal status', () => {
      const orderId = placeOrder()
      updateOrderStatus(orderId, 'cancelled')

      const err = appErrorOf(() => updateOrderStatus(orderId, 'confirmed'))
      expect(err.kind).toBe('invalid_state')
      expect(err.message).toBe('Cannot change order status from cancelled to confirmed')
      expect(db.prepare('SELECT status FROM orders WHERE id = ?').get(orderId)).toEqual({ status: 'cancelled' })
    })

    it('refuses to move a confirmed order back to pending', () => {
      const orderId = placeOrder()
      updateOrderStatus(orderId, 'confirmed')
      expect(appErrorOf(() => updateOrderStatus(orderId, 'pending')).kind).toBe('invalid_state')
    })

    it('updates notes on a same-status request', () => {
      const orderId = placeOrder()
      const change = updateOrderStatus(orderId, 'pending', 'Call before arrival')

      expect(change.changed).toBe(false)
      expect(db.prepare('SELECT notes FROM orders WHERE id = ?').get(orderId)).toEqual({ notes: 'Call before arrival' })
    })

    it('reports a missing order', () => {
      expect(appErrorOf(() => updateOrderStatus(9999, 'confirmed')).kind).toBe('not_found')
    })
  })
})
