import type { NextApiRequest, NextApiResponse } from 'next'
import { encode, getToken } from 'next-auth/jwt'
import { serialize } from 'cookie'
import type { AppConfig } from './config'
import { normalizeRoleInput, type Role } from './roles'

export type SessionData = {
  userId: string
  role: Role | null
}

function cookieOptions(config: AppConfig) {
  return {
    httpOnly: true,
    sameSite: 'lax' as const,
    path: '/',
    secure: config.secureCookie,
  }
}

export async function createSession(res: NextApiResponse, config: AppConfig, data: { userId: string; role: Role }) {
  const token = await encode({
    token: { sub: data.userId, role: data.role },
    secret: config.sessionSecret,
    maxAge: config.sessionMaxAge,
  })
  res.setHeader('Set-Cookie', serialize(config.cookieName, token, {
    ...cookieOptions(config),
    maxAge: config.sessionMaxAge,
  }))
}

export async function readSession(req: NextApiRequest, config: AppConfig): Promise<SessionData | null> {
  const token = await getToken({
    req,
    secret: config.sessionSecret,
    cookieName: config.cookieName,
    secureCookie: config.secureCookie,
  })
  if (!token?.sub) return null
  return { userId: token.sub, role: normalizeRoleInput(token.role) ?? null }
}

export function clearSession(res: NextApiResponse, config: AppConfig) {
  res.setHeader('Set-Cookie', serialize(config.cookieName, '', {
    ...cookieOptions(config),
    maxAge: 0,
    expires: new Date(0),
  }))
}
