import { Router } from 'express'
import { getProductById, getProductCategories, getProducts } from '../controllers/catalog.controller'

const router = Router()

router.get('/', getProducts)
router.get('/categories', getProductCategories)
router.get('/:id', getProductById)

export default router
