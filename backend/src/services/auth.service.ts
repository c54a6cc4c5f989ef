/**
 * Phone OTP login and JWT claims.
 *
 * No SMS gateway is wired: the code is stored and, when EXPOSE_OTP is on,
 * echoed back in the response.
 */
import crypto from 'crypto'
import jwt from 'jsonwebtoken'
import { config } from '../config'
import { getDb, nowIso } from '../database/sqlite'
import { parseUser, type CustomerClaims, type User, type UserRow } from '../models/User.model'
import { AppError } from '../utils/errors'
import { logger } from '../utils/logger'


export function generateOtpCode(): string {
  return String(crypto.randomInt(0, 1_000_000)).padStart(6, '0')
}

export function signToken(user: Pick<User, 'id'>): string {
  return jwt.sign({ sub: String(user.id) }, config.auth.jwtSecret, {
    expiresIn: config.auth.jwtExpiresInSeconds,
  })
}

/** Verifies a bearer token and returns the user id it was issued to. */
export function verifyToken(token: string): number {
  let decoded: string | jwt.JwtPayload
  try {
    decoded = jwt.verify(token, config.auth.jwtSecret)
  } catch {
    throw AppError.unauthenticated('Invalid or expired token')
  }

  const userId = typeof decoded === 'string' ? NaN : Number(decoded.sub)
  if (!Number.isInteger(userId) || userId <= 0) {
    throw AppError.unauthenticated('Invalid or expired token')
  }
  return userId
}

export function findUser(userId: number): User | null {
  const row = getDb().prepare('SELECT * FROM users WHERE id = ?').get(userId) as UserRow | undefined
  return row ? parseUser(row) : null
}

export interface OtpIssued {
  phone_number: string
  expires_at: string
  otp_code?: string
}

export function sendOtp(phoneNumber: string): OtpIssued {
  const code = generateOtpCode()
  const now = new Date()
  const expiresAt = new Date(now.getTime() + config.auth.otpTtlMinutes * 60_000).toISOString()

  getDb().prepare(`
    INSERT INTO otps (phone_number, otp_code, expires_at, is_used, created_at)
    VALUES (?, ?, ?, 0, ?)
  `).run(phoneNumber, code, expiresAt, now.toISOString())

  logger.info('OTP issued', { phoneNumber })
  const issued: OtpIssued = { phone_number: phoneNumber, expires_at: expiresAt }
  if (config.auth.exposeOtp) issued.otp_code = code
  return issued
}

export interface LoginResult {
  user: User
  token: string
}

export function verifyOtp(phoneNumber: string, code: string): LoginResult {
  const db = getDb()

  const login = db.transaction((): User => {
    const otp = db.prepare(`
      SELECT id, is_used, expires_at FROM otps
      WHERE phone_number = ? AND otp_code = ?
      ORDER BY created_at DESC, id DESC
      LIMIT 1
    `).get(phoneNumber, code) as { id: number; is_used: number; expires_at: string } | undefined

    if (!otp) throw AppError.unauthenticated('Invalid OTP')
    if (otp.is_used) throw AppError.unauthenticated('OTP already used')
    if (otp.expires_at <= nowIso()) throw AppError.unauthenticated('OTP expired')

    db.prepare('UPDATE otps SET is_used = 1 WHERE id = ?').run(otp.id)

    const existing = db.prepare('SELECT * FROM users WHERE phone_number = ?').get(phoneNumber) as UserRow | undefined
    if (existing) return parseUser(existing)

    const now = nowIso()
    const result = db.prepare(`
      INSERT INTO users (phone_number, name, is_admin, created_at, updated_at)
      VALUES (?, 'Guest', 0, ?, ?)
    `).run(phoneNumber, now, now)
    logger.info('New user registered', { userId: Number(result.lastInsertRowid) })
    return parseUser(db.prepare('SELECT * FROM users WHERE id = ?').get(result.lastInsertRowid) as UserRow)
  })

  const user = login()
  return { user, token: signToken(user) }
}

export function getProfile(claims: CustomerClaims): User {
  const user = findUser(claims.userId)
  if (!user) throw AppError.notFound('User not found')
  return user
}
