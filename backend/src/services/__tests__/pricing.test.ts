import { describe, it, expect } from 'vitest'
import type { PricedCartLine } from '../../models/Cart.model'
import { daysBetween, fromCents, nightsFor, priceCart, priceLine, toCents } from '../pricing'

function roomLine(overrides: Partial<{ unitPrice: number; quantity: number; checkIn: string; checkOut: string }> = {}): PricedCartLine {
  const stay = overrides.checkIn && overrides.checkOut
    ? { checkIn: overrides.checkIn, checkOut: overrides.checkOut }
    : null
  return {
    id: 1, userId: 1, itemId: 7, quantity: overrides.quantity ?? 1, createdAt: '2025-05-01T00:00:00.000Z',
    kind: 'room', stay, itemName: 'Deluxe Double Room', unitPrice: overrides.unitPrice ?? 100, images: [],
  }
}

function productLine(unitPrice: number, quantity: number): PricedCartLine {
  return {
    id: 2, userId: 1, itemId: 3, quantity, createdAt: '2025-05-01T00:00:00.000Z',
    kind: 'product', itemName: 'Breakfast Buffet', unitPrice, images: [],
  }
}

describe('nights and date ranges', () => {
  it('counts calendar days between check-in and check-out', () => {
    expect(nightsFor({ checkIn: '2025-06-01', checkOut: '2025-06-04' })).toBe(3)
    expect(daysBetween('2025-01-30', '2025-02-02')).toBe(3)
  })

  it('charges at least one night for same-day or inverted stays', () => {
    expect(nightsFor({ checkIn: '2025-06-01', checkOut: '2025-06-01' })).toBe(1)
    expect(nightsFor({ checkIn: '2025-06-05', checkOut: '2025-06-01' })).toBe(1)
    expect(daysBetween('2025-06-05', '2025-06-01')).toBe(-4)
  })
})

describe('cents', () => {
  it('converts prices to whole cents', () => {
    expect(toCents(89.99)).toBe(8999)
    expect(toCents(149.99)).toBe(14999)
    expect(toCents(0.1)).toBe(10)
  })

  it('converts back for display', () => {
    expect(fromCents(26997)).toBe(269.97)
    expect(fromCents(toCents(0.1) + toCents(0.2))).toBe(0.3)
  })
})

describe('priceLine', () => {
  it('prices a dated room per night and per unit', () => {
    const priced = priceLine(roomLine({ unitPrice: 100, quantity: 2, checkIn: '2025-06-01', checkOut: '2025-06-04' }))
    expect(priced).toEqual({
      kind: 'room', itemId: 7, itemName: 'Deluxe Double Room', quantity: 2, unitPriceCents: 10000,
      stay: { checkIn: '2025-06-01', checkOut: '2025-06-04' }, nights: 3, totalCents: 60000,
    })
  })

  it('prices an undated room as price times quantity', () => {
    const priced = priceLine(roomLine({ unitPrice: 120, quantity: 2 }))
    expect(priced.totalCents).toBe(24000)
    expect(priced).toMatchObject({ kind: 'room', stay: null, nights: null })
  })

  it('prices a product per unit', () => {
    expect(priceLine(productLine(25.5, 3))).toEqual({
      kind: 'product', itemId: 3, itemName: 'Breakfast Buffet', quantity: 3, unitPriceCents: 2550, totalCents: 7650,
    })
  })
})

describe('priceCart', () => {
  it('sums line totals in cents', () => {
    const { lines, totalCents } = priceCart([
      roomLine({ unitPrice: 149.99, checkIn: '2025-07-01', checkOut: '2025-07-03' }),
      productLine(10, 2),
    ])
    expect(lines.map(l => l.totalCents)).toEqual([29998, 2000])
    expect(totalCents).toBe(31998)
  })

  it('adds 0.1 and 0.2 to exactly 30 cents', () => {
    expect(priceCart([productLine(0.1, 1), productLine(0.2, 1)]).totalCents).toBe(30)
  })

  it('is zero for no lines', () => {
    expect(priceCart([])).toEqual({ lines: [], totalCents: 0 })
  })
})
