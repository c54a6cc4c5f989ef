import { Router } from 'express'
import { login, logout, me, requestOtp } from '../controllers/auth.controller'
import { identify } from '../middleware/identity.middleware'

const router = Router()

router.post('/send-otp', requestOtp)
router.post('/verify-otp', login)
router.post('/logout', logout)
router.get('/profile', identify, me)

export default router
