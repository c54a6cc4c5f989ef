import { Router } from 'express'
import { createOrder, getOrderById, getOrders } from '../controllers/order.controller'
import { identify } from '../middleware/identity.middleware'

const router = Router()
router.use(identify)

router.get('/', getOrders)
router.post('/', createOrder)
router.get('/:id', getOrderById)

export default router
