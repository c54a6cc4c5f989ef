export interface User {
  id: number
  phone_number: string
  name: string | null
  email: string | null
  is_admin: boolean
  created_at: string
  updated_at: string
}

export type UserRow = Omit<User, 'is_admin'> & { is_admin: number }

export function parseUser(row: UserRow): User {
  return { ...row, is_admin: Boolean(row.is_admin) }
}

/**
 * Who is calling. Resolved once per request by the identity middleware and
 * passed explicitly into services.
 */
export interface CustomerClaims {
  userId: number
  isAdmin: boolean
  // 'demo' is the DEMO_USER_ID fallback for callers that sent no identity
  source: 'token' | 'header' | 'demo'
}
