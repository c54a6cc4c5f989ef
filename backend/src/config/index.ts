import dotenv from 'dotenv'
dotenv.config()

function required(key: string): string {
  const val = process.env[key]
  if (!val) throw new Error(`Missing required env var: ${key}`)
  return val
}

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback
}

function flag(key: string, fallback: boolean): boolean {
  const val = process.env[key]
  if (val === undefined || val === '') return fallback
  return val === 'true' || val === '1'
}

const nodeEnv = optional('NODE_ENV', 'development')
const isProduction = nodeEnv === 'production'

export const config = {
  server: {
    port: parseInt(optional('PORT', '8080')),
    nodeEnv,
    frontendUrl: optional('FRONTEND_URL', 'http://localhost:3000'),
    isDev: nodeEnv === 'development',
    isTest: nodeEnv === 'test',
  },

  db: {
    path: optional('SQLITE_PATH', './data/hotel.db'),
    // better-sqlite3 waits this long on a locked database before throwing
    busyTimeoutMs: parseInt(optional('SQLITE_BUSY_TIMEOUT_MS', '5000')),
  },

  auth: {
    jwtSecret: isProduction ? required('JWT_SECRET') : optional('JWT_SECRET', 'dev_secret_change_in_production'),
    jwtExpiresInSeconds: parseInt(optional('JWT_EXPIRES_IN_SECONDS', '604800')),
    allowHeaderIdentity: flag('ALLOW_HEADER_IDENTITY', !isProduction),
    demoUserId: parseInt(optional('DEMO_USER_ID', '1')),
    exposeOtp: flag('EXPOSE_OTP', !isProduction),
    otpTtlMinutes: parseInt(optional('OTP_TTL_MINUTES', '5')),
  },

  notifications: {
    enabled: flag('NOTIFICATIONS_ENABLED', true),
    baseUrl: optional('NOTIFIER_URL', 'http://localhost:8001'),
    timeoutMs: parseInt(optional('NOTIFIER_TIMEOUT_MS', '3000')),
  },

  notifier: {
    port: parseInt(optional('NOTIFIER_PORT', '8001')),
    adminEmail: optional('ADMIN_EMAIL', 'admin@hotel.example'),
    from: optional('MAIL_FROM', 'noreply@hotel.example'),
    smtp: {
      host: optional('SMTP_HOST', 'smtp.gmail.com'),
      port: parseInt(optional('SMTP_PORT', '587')),
      user: optional('SMTP_USER', ''),
      pass: optional('SMTP_PASS', ''),
    },
  },

  rateLimit: {
    windowMs: parseInt(optional('RATE_LIMIT_WINDOW_MS', '60000')),
    maxRequests: parseInt(optional('RATE_LIMIT_MAX_REQUESTS', '100')),
  },

  log: {
    level: optional('LOG_LEVEL', 'info'),
    dir: optional('LOG_DIR', './logs'),
  },
}
