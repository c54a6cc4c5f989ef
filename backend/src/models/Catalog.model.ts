/**
 * Catalog read models for hotel rooms and shop products.
 */
import { fromJson } from '../database/sqlite'

export type ItemKind = 'room' | 'product'

export interface Room {
  id: number
  room_number: string
  room_type: string
  title: string
  description: string | null
  price_per_night: number
  max_occupancy: number
  amenities: string[]
  images: string[]
  // Advisory flag maintained by staff; bookings never clear it
  is_available: boolean
  created_at: string
  updated_at: string
}

export interface Product {
  id: number
  name: string
  description: string | null
  price: number
  category: string | null
  stock_quantity: number
  images: string[]
  is_active: boolean
  created_at: string
  updated_at: string
}

export interface ProductCategory {
  category: string | null
  product_count: number
}

export type RoomRow = Omit<Room, 'amenities' | 'images' | 'is_available'> & {
  amenities: string | null
  images: string | null
  is_available: number
}

export type ProductRow = Omit<Product, 'images' | 'is_active'> & {
  images: string | null
  is_active: number
}

export function parseRoom(row: RoomRow): Room {
  return {
    ...row,
    amenities: fromJson<string[]>(row.amenities, []),
    images: fromJson<string[]>(row.images, []),
    is_available: Boolean(row.is_available),
  }
}

export function parseProduct(row: ProductRow): Product {
  return {
    ...row,
    images: fromJson<string[]>(row.images, []),
    is_active: Boolean(row.is_active),
  }
}
