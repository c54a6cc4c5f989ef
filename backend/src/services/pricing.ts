/**
 * Line pricing shared by the cart listing and checkout.
 *
 * Room lines are charged per night of their stay range; product lines per
 * unit. Amounts are worked out in integer cents, so an order total is an
 * exact sum of its line totals. Catalog prices are converted once on the
 * way in and amounts go back to currency units only when shown.
 */
import type { PricedCartLine, StayRange } from '../models/Cart.model'
import type { OrderLineDraft } from '../models/Order.model'

const DAY_MS = 24 * 60 * 60 * 1000

function dayNumber(date: string): number {
  return Math.floor(Date.parse(`${date}T00:00:00Z`) / DAY_MS)
}

export function toCents(amount: number): number {
  return Math.round(amount * 100)
}

export function fromCents(cents: number): number {
  return cents / 100
}

/** Calendar days from `from` to `to`; negative when the range is inverted. */
export function daysBetween(from: string, to: string): number {
  return dayNumber(to) - dayNumber(from)
}

/** Nights charged for a stay, never fewer than one. */
export function nightsFor(stay: StayRange): number {
  return Math.max(1, daysBetween(stay.checkIn, stay.checkOut))
}

export function priceLine(line: PricedCartLine): OrderLineDraft {
  const unitPriceCents = toCents(line.unitPrice)
  const base = {
    itemId: line.itemId,
    itemName: line.itemName,
    quantity: line.quantity,
    unitPriceCents,
  }

  switch (line.kind) {
    case 'room': {
      if (!line.stay) {
        return { ...base, kind: 'room', stay: null, nights: null, totalCents: unitPriceCents * line.quantity }
      }
      const nights = nightsFor(line.stay)
      return { ...base, kind: 'room', stay: line.stay, nights, totalCents: unitPriceCents * nights * line.quantity }
    }
    case 'product':
      return { ...base, kind: 'product', totalCents: unitPriceCents * line.quantity }
    default: {
      const unreachable: never = line
      throw new Error(`Unhandled cart line kind: ${JSON.stringify(unreachable)}`)
    }
  }
}

export function priceCart(lines: PricedCartLine[]): { lines: OrderLineDraft[]; totalCents: number } {
  const priced = lines.map(priceLine)
  return { lines: priced, totalCents: priced.reduce((sum, line) => sum + line.totalCents, 0) }
}
