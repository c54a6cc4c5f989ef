import { Request, Response } from 'express'
import { z } from 'zod'
import { claimsOf } from '../middleware/identity.middleware'
import { checkout } from '../services/checkout.service'
import { getOrder, listOrders } from '../services/order.service'
import { parseId, parseInput } from '../utils/validation'

const CheckoutBody = z.object({
  customer_name: z.string().trim().min(1),
  customer_phone: z.string().trim().min(1),
  customer_email: z.string().trim().email().optional().or(z.literal('')),
  notes: z.string().optional(),
})

export async function createOrder(req: Request, res: Response): Promise<void> {
  const { userId } = claimsOf(req)
  const contact = parseInput(CheckoutBody, req.body)
  const result = checkout(userId, contact)
  res.status(201).json({ success: true, message: 'Order created successfully', ...result })
}

export async function getOrders(req: Request, res: Response): Promise<void> {
  const { userId } = claimsOf(req)
  const orders = listOrders(userId)
  res.json({ success: true, orders, count: orders.length })
}

export async function getOrderById(req: Request, res: Response): Promise<void> {
  const order = getOrder(claimsOf(req), parseId(req.params.id, 'order'))
  res.json({ success: true, order })
}
