import { Request, Response } from 'express'
import { z } from 'zod'
import { claimsOf } from '../middleware/identity.middleware'
import { addLine, clearCart, listCart, removeLine } from '../services/cart.service'
import { isoDate, parseId, parseInput, positiveInt } from '../utils/validation'

const AddToCartBody = z.object({
  item_type: z.enum(['room', 'product'], {
    errorMap: () => ({ message: "Invalid item type. Must be 'room' or 'product'" }),
  }),
  item_id: positiveInt,
  quantity: positiveInt,
  check_in_date: isoDate.optional(),
  check_out_date: isoDate.optional(),
}).refine(
  body => (body.check_in_date === undefined) === (body.check_out_date === undefined),
  { message: 'check_in_date and check_out_date must be given together', path: ['check_out_date'] }
)

export async function getCart(req: Request, res: Response): Promise<void> {
  const { userId } = claimsOf(req)
  res.json({ success: true, ...listCart(userId) })
}

export async function addToCart(req: Request, res: Response): Promise<void> {
  const { userId } = claimsOf(req)
  const body = parseInput(AddToCartBody, req.body)

  const stay = body.check_in_date && body.check_out_date
    ? { checkIn: body.check_in_date, checkOut: body.check_out_date }
    : null
  const result = addLine(userId, {
    kind: body.item_type,
    itemId: body.item_id,
    quantity: body.quantity,
    stay,
  })

  res.status(result.created ? 201 : 200).json({
    success: true,
    message: result.created ? 'Item added to cart successfully' : 'Cart item quantity updated successfully',
    cart_item_id: result.cartItemId,
  })
}

export async function removeFromCart(req: Request, res: Response): Promise<void> {
  const { userId } = claimsOf(req)
  removeLine(userId, parseId(req.params.id, 'cart item'))
  res.json({ success: true, message: 'Item removed from cart successfully' })
}

export async function emptyCart(req: Request, res: Response): Promise<void> {
  const { userId } = claimsOf(req)
  const removed = clearCart(userId)
  res.json({ success: true, message: 'Cart cleared successfully', removed })
}
