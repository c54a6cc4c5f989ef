import { Request, Response } from 'express'
import { z } from 'zod'
import { ORDER_STATUSES } from '../models/Order.model'
import { createProduct, createRoom } from '../services/catalog.service'
import {
  exportOrderLinesCsv, getDashboardStats, getOrderAnalytics, getRoomOccupancy,
} from '../services/dashboard.service'
import { listAllOrders, updateOrderStatus } from '../services/order.service'
import { isoDate, parseId, parseInput } from '../utils/validation'

const statusEnum = z.enum(ORDER_STATUSES, {
  errorMap: () => ({ message: `Invalid status. Must be one of: ${ORDER_STATUSES.join(', ')}` }),
})

const OrderListQuery = z.object({
  status: statusEnum.optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
})

const UpdateStatusBody = z.object({
  status: statusEnum,
  notes: z.string().optional(),
})

const notAfter = (range: { start?: string; end?: string }) => !range.start || !range.end || range.start <= range.end

const AnalyticsQuery = z.object({
  start: isoDate.optional(),
  end: isoDate.optional(),
}).refine(notAfter, 'start must not be after end')

const OccupancyQuery = z.object({
  start: isoDate,
  end: isoDate,
}).refine(notAfter, 'start must not be after end')

const CreateRoomBody = z.object({
  room_number: z.string().trim().min(1),
  room_type: z.string().trim().min(1),
  title: z.string().trim().min(1),
  description: z.string().optional(),
  price_per_night: z.number().positive(),
  max_occupancy: z.number().int().positive(),
  amenities: z.array(z.string()).optional(),
  images: z.array(z.string()).optional(),
})

const CreateProductBody = z.object({
  name: z.string().trim().min(1),
  description: z.string().optional(),
  price: z.number().positive(),
  category: z.string().trim().min(1),
  stock_quantity: z.number().int().min(0),
  images: z.array(z.string()).optional(),
})

export async function getDashboard(_req: Request, res: Response): Promise<void> {
  res.json({ success: true, ...getDashboardStats() })
}

export async function getAnalytics(req: Request, res: Response): Promise<void> {
  const range = parseInput(AnalyticsQuery, req.query)
  res.json({ success: true, ...getOrderAnalytics(range) })
}

export async function getOccupancy(req: Request, res: Response): Promise<void> {
  const { start, end } = parseInput(OccupancyQuery, req.query)
  res.json({ success: true, ...getRoomOccupancy(start, end) })
}

export async function exportOrders(req: Request, res: Response): Promise<void> {
  const range = parseInput(AnalyticsQuery, req.query)
  res
    .type('text/csv; charset=utf-8')
    .attachment('orders_export.csv')
    .send(exportOrderLinesCsv(range))
}

export async function getAllOrders(req: Request, res: Response): Promise<void> {
  const query = parseInput(OrderListQuery, req.query)
  res.json({ success: true, ...listAllOrders(query) })
}

export async function changeOrderStatus(req: Request, res: Response): Promise<void> {
  const orderId = parseId(req.params.id, 'order')
  const body = parseInput(UpdateStatusBody, req.body)
  const change = updateOrderStatus(orderId, body.status, body.notes)
  res.json({ success: true, message: 'Order status updated successfully', ...change })
}

export async function addRoom(req: Request, res: Response): Promise<void> {
  const room = createRoom(parseInput(CreateRoomBody, req.body))
  res.status(201).json({ success: true, message: 'Room created successfully', room_id: room.id, room })
}

export async function addProduct(req: Request, res: Response): Promise<void> {
  const product = createProduct(parseInput(CreateProductBody, req.body))
  res.status(201).json({ success: true, message: 'Product created successfully', product_id: product.id, product })
}
