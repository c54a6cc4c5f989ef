import { Request, Response } from 'express'
import { z } from 'zod'
import {
  checkAvailability, getProduct, getRoom, listCategories, listProducts, listRooms,
} from '../services/catalog.service'
import { isoDate, parseId, parseInput, positiveInt } from '../utils/validation'

const AvailabilityBody = z.object({
  room_id: positiveInt,
  check_in_date: isoDate,
  check_out_date: isoDate,
})

const ProductQuery = z.object({
  category: z.string().trim().min(1).optional(),
})

// ─── Rooms ────────────────────────────────────────────────────────

export async function getRooms(_req: Request, res: Response): Promise<void> {
  const rooms = listRooms()
  res.json({ success: true, rooms, count: rooms.length })
}

export async function getRoomById(req: Request, res: Response): Promise<void> {
  res.json({ success: true, room: getRoom(parseId(req.params.id, 'room')) })
}

export async function checkRoomAvailability(req: Request, res: Response): Promise<void> {
  const body = parseInput(AvailabilityBody, req.body)
  const result = checkAvailability(body.room_id, { checkIn: body.check_in_date, checkOut: body.check_out_date })
  res.json({ success: true, ...result })
}

// ─── Products ─────────────────────────────────────────────────────

export async function getProducts(req: Request, res: Response): Promise<void> {
  const { category } = parseInput(ProductQuery, req.query)
  const products = listProducts(category)
  res.json({ success: true, products, count: products.length, category: category ?? null })
}

export async function getProductById(req: Request, res: Response): Promise<void> {
  res.json({ success: true, product: getProduct(parseId(req.params.id, 'product')) })
}

export async function getProductCategories(_req: Request, res: Response): Promise<void> {
  const categories = listCategories()
  res.json({ success: true, categories, count: categories.length })
}
