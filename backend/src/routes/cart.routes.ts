import { Router } from 'express'
import { addToCart, emptyCart, getCart, removeFromCart } from '../controllers/cart.controller'
import { identify } from '../middleware/identity.middleware'

const router = Router()
router.use(identify)

router.get('/', getCart)
router.post('/add', addToCart)
// Registered before /:id so "clear" is not read as a line id
router.delete('/clear', emptyCart)
router.delete('/:id', removeFromCart)

export default router
