import { Router } from 'express'
import authRoutes from './auth.routes'
import roomRoutes from './room.routes'
import productRoutes from './product.routes'
import cartRoutes from './cart.routes'
import orderRoutes from './order.routes'
import adminRoutes from './admin.routes'

const router = Router()

// Public routes
router.use('/auth', authRoutes)
router.use('/rooms', roomRoutes)
router.use('/products', productRoutes)

// Caller identity required
router.use('/cart', cartRoutes)
router.use('/orders', orderRoutes)
router.use('/admin', adminRoutes)

export default router
