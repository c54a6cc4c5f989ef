/**
 * Orders, order lines and room bookings.
 */
import type { StayRange } from './Cart.model'

export const ORDER_STATUSES = ['pending', 'confirmed', 'cancelled', 'completed'] as const
export type OrderStatus = typeof ORDER_STATUSES[number]

export const BOOKING_STATUSES = ['confirmed', 'checked_in', 'checked_out', 'cancelled'] as const
export type BookingStatus = typeof BOOKING_STATUSES[number]

// Booking states that hold a room for availability purposes
export const OCCUPYING_BOOKING_STATUSES: readonly BookingStatus[] = ['confirmed', 'checked_in']

// Which status an order may move to from its current one; the same status is
// always accepted as a no-op
export const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  pending: ['confirmed', 'cancelled', 'completed'],
  confirmed: ['cancelled', 'completed'],
  cancelled: [],
  completed: [],
}

export function isOrderStatus(value: string): value is OrderStatus {
  return (ORDER_STATUSES as readonly string[]).includes(value)
}

export interface ContactInfo {
  customer_name: string
  customer_phone: string
  customer_email?: string
  notes?: string
}

/** A priced line ready to be written as an order line (a snapshot). Money in cents. */
interface OrderLineDraftBase {
  itemId: number
  itemName: string
  quantity: number
  unitPriceCents: number
  totalCents: number
}

export interface RoomOrderLineDraft extends OrderLineDraftBase {
  kind: 'room'
  stay: StayRange | null
  nights: number | null
}

export interface ProductOrderLineDraft extends OrderLineDraftBase {
  kind: 'product'
}

export type OrderLineDraft = RoomOrderLineDraft | ProductOrderLineDraft

export interface OrderItem {
  id: number
  order_id: number
  item_type: string
  item_id: number
  item_name: string
  quantity: number
  unit_price: number
  total_price: number
  check_in_date: string | null
  check_out_date: string | null
  nights: number | null
  created_at: string
}

export interface Order {
  id: number
  user_id: number
  order_number: string
  total_amount: number
  status: OrderStatus
  customer_name: string
  customer_phone: string
  customer_email: string | null
  notes: string | null
  created_at: string
  updated_at: string
}

export type OrderWithItems = Order & { items: OrderItem[] }

export interface RoomBooking {
  id: number
  room_id: number
  order_id: number
  order_item_id: number
  check_in_date: string
  check_out_date: string
  guest_count: number
  status: BookingStatus
  created_at: string
  updated_at: string
}

export interface CheckoutResult {
  order_id: number
  order_number: string
  total_amount: number
  created_at: string
}
