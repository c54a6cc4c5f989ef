import { Request, Response, NextFunction } from 'express'
import { config } from '../config'
import type { CustomerClaims } from '../models/User.model'
import { findUser, verifyToken } from '../services/auth.service'
import { AppError } from '../utils/errors'
import { logger } from '../utils/logger'

declare global {
  namespace Express {
    interface Request {
      customer?: CustomerClaims
    }
  }
}

const USER_ID_HEADER = /^\d+$/

/**
 * Resolves who is calling: a bearer token first, then (demo mode only) the
 * caller-asserted X-User-ID header, falling back to DEMO_USER_ID.
 */
function resolveUserId(req: Request): { userId: number; source: CustomerClaims['source'] } {
  const authHeader = req.headers.authorization
  if (authHeader?.startsWith('Bearer ')) {
    return { userId: verifyToken(authHeader.slice('Bearer '.length)), source: 'token' }
  }

  if (!config.auth.allowHeaderIdentity) {
    throw AppError.unauthenticated('No token provided')
  }

  const header = req.header('x-user-id')
  if (header === undefined || header === '') {
    return { userId: config.auth.demoUserId, source: 'demo' }
  }
  const userId = USER_ID_HEADER.test(header) ? Number(header) : NaN
  if (!Number.isSafeInteger(userId) || userId <= 0) {
    throw AppError.invalidArgument('Invalid user ID')
  }
  return { userId, source: 'header' }
}

export function identify(req: Request, _res: Response, next: NextFunction): void {
  const { userId, source } = resolveUserId(req)
  const user = findUser(userId)
  if (!user) throw AppError.unauthenticated('User not found')

  // An anonymous caller never gets admin rights, whichever user it falls back to
  req.customer = { userId: user.id, isAdmin: source !== 'demo' && user.is_admin, source }
  logger.debug('Caller identified', { userId: user.id, source, path: req.path })
  next()
}

export function requireAdmin(req: Request, _res: Response, next: NextFunction): void {
  if (!req.customer?.isAdmin) throw AppError.forbidden('Admin access required')
  next()
}

/** The claims set by `identify`; routes mounted behind it can rely on them. */
export function claimsOf(req: Request): CustomerClaims {
  if (!req.customer) throw AppError.unauthenticated('User not authenticated')
  return req.customer
}
