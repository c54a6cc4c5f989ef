import { Router } from 'express'
import {
  addProduct, addRoom, changeOrderStatus, exportOrders, getAllOrders, getAnalytics, getDashboard, getOccupancy,
} from '../controllers/admin.controller'
import { identify, requireAdmin } from '../middleware/identity.middleware'

const router = Router()
router.use(identify, requireAdmin)

router.get('/dashboard', getDashboard)
router.get('/analytics', getAnalytics)
router.get('/occupancy', getOccupancy)
router.get('/orders', getAllOrders)
router.get('/orders/export.csv', exportOrders)
router.put('/orders/:id', changeOrderStatus)
router.post('/rooms', addRoom)
router.post('/products', addProduct)

export default router
