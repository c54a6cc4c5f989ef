import { Router } from 'express'
import { checkRoomAvailability, getRoomById, getRooms } from '../controllers/catalog.controller'

const router = Router()

router.get('/', getRooms)
router.post('/check-availability', checkRoomAvailability)
router.get('/:id', getRoomById)

export default router
