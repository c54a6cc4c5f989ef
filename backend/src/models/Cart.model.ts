/**
 * Cart lines. A line is a tagged union on `kind`: only room lines carry a
 * stay range, so nights-based pricing is only reachable for rooms.
 */
import type { ItemKind } from './Catalog.model'

/** Half-open date interval [check_in, check_out), dates as YYYY-MM-DD. */
export interface StayRange {
  checkIn: string
  checkOut: string
}

interface CartLineBase {
  id: number
  userId: number
  itemId: number
  quantity: number
  createdAt: string
}

export interface RoomCartLine extends CartLineBase {
  kind: 'room'
  stay: StayRange | null
}

export interface ProductCartLine extends CartLineBase {
  kind: 'product'
}

export type CartLine = RoomCartLine | ProductCartLine

/** A cart line joined with the current catalog name, price and images. */
export type PricedCartLine = CartLine & {
  itemName: string
  unitPrice: number
  images: string[]
}

/** Raw row of the cart ⨝ catalog join used by listing and checkout. */
export interface CartJoinRow {
  id: number
  user_id: number
  item_type: string
  item_id: number
  quantity: number
  check_in_date: string | null
  check_out_date: string | null
  created_at: string
  item_name: string | null
  unit_price: number | null
  images: string | null
}

export interface AddLineInput {
  kind: ItemKind
  itemId: number
  quantity: number
  stay?: StayRange | null
}

export interface AddLineResult {
  cartItemId: number
  created: boolean
}

/** Cart line as rendered by GET /cart. */
export interface CartItemView {
  id: number
  item_type: ItemKind
  item_id: number
  item_name: string
  quantity: number
  unit_price: number
  total_price: number
  images: string[]
  check_in_date?: string
  check_out_date?: string
  nights?: number
}

export interface CartView {
  cart_items: CartItemView[]
  total_amount: number
  item_count: number
  user_id: number
}
