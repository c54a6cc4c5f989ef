import { Request, Response } from 'express'
import { z } from 'zod'
import { claimsOf } from '../middleware/identity.middleware'
import { getProfile, sendOtp, verifyOtp } from '../services/auth.service'
import { parseInput } from '../utils/validation'

const phoneNumber = z.string().trim().regex(/^\+?[0-9]{6,20}$/, 'Invalid phone number')

const SendOtpBody = z.object({ phone_number: phoneNumber })

const VerifyOtpBody = z.object({
  phone_number: phoneNumber,
  otp_code: z.string().trim().regex(/^[0-9]{6}$/, 'OTP must be 6 digits'),
})

export async function requestOtp(req: Request, res: Response): Promise<void> {
  const { phone_number } = parseInput(SendOtpBody, req.body)
  res.json({ success: true, message: 'OTP sent successfully', ...sendOtp(phone_number) })
}

export async function login(req: Request, res: Response): Promise<void> {
  const body = parseInput(VerifyOtpBody, req.body)
  const { user, token } = verifyOtp(body.phone_number, body.otp_code)
  res.json({ success: true, message: 'Login successful', user, token })
}

// Tokens are stateless; the client discards its copy
export async function logout(_req: Request, res: Response): Promise<void> {
  res.json({ success: true, message: 'Logged out successfully' })
}

export async function me(req: Request, res: Response): Promise<void> {
  res.json({ success: true, user: getProfile(claimsOf(req)) })
}
