import path from 'path'

const DEV_SESSION_SECRET = 'dev-session-secret-change-me'
const DEFAULT_SESSION_MAX_AGE = 60 * 60 * 24 * 14 // 14 days
const SESSION_COOKIE = 'classroom-admin.session-token'

export type AppConfig = {
  sessionSecret: string
  sessionMaxAge: number
  cookieName: string
  secureCookie: boolean
  dataDir: string
  debug: boolean
}

type Env = Record<string, string | undefined>

let warnedAboutSecret = false

function getSessionMaxAge(envValue?: string) {
  if (!envValue) return DEFAULT_SESSION_MAX_AGE
  const parsed = Number(envValue)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_SESSION_MAX_AGE
}

function getSessionSecret(env: Env) {
  const secret = env.SESSION_SECRET || env.NEXTAUTH_SECRET
  if (secret) return secret
  if (env.NODE_ENV === 'production') {
    throw new Error('SESSION_SECRET is required in production')
  }
  if (!warnedAboutSecret) {
    warnedAboutSecret = true
    console.warn('[config] SESSION_SECRET is not set, using the development placeholder')
  }
  return DEV_SESSION_SECRET
}

export function usesPlaceholderSecret(config: AppConfig) {
  return config.sessionSecret === DEV_SESSION_SECRET
}

export function loadConfig(env: Env = process.env): AppConfig {
  const secureCookie = env.SESSION_COOKIE_SECURE === '1'
  return {
    sessionSecret: getSessionSecret(env),
    sessionMaxAge: getSessionMaxAge(env.SESSION_MAX_AGE),
    cookieName: secureCookie ? `__Secure-${SESSION_COOKIE}` : SESSION_COOKIE,
    secureCookie,
    dataDir: path.resolve(env.DATA_DIR || '.data'),
    debug: env.DEBUG === '1',
  }
}
