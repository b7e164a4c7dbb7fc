import type { NextApiRequest, NextApiResponse } from 'next'
import { createMocks, createRequest, type RequestMethod } from 'node-mocks-http'
import { parse } from 'cookie'
import type { AppConfig } from '../lib/config'
import { withRequestContext, type ContextHandler } from '../lib/requestContext'
import { readSession } from '../lib/session'
import { createMemoryClassroomStore, type Classroom } from '../lib/stores/classrooms'
import { createMemoryUserStore, type UserRecord } from '../lib/stores/users'
import { handler as loginHandler } from '../pages/api/login'

export const testConfig = (): AppConfig => ({
  sessionSecret: 'test-secret',
  sessionMaxAge: 3600,
  cookieName: 'test.session-token',
  secureCookie: false,
  dataDir: '',
  debug: false,
})

export const ADMIN: UserRecord = { userId: 'admin', password: 'admin-pass', role: 'Admin' }
export const STUDENT: UserRecord = { userId: 'student', password: 'student-pass', role: 'Student' }

export const LAB_1: Classroom = {
  id: 1,
  name: 'Lab1',
  location: 'Bldg A',
  capacity: 30,
  equipment: { projector: true },
}

type HeaderValue = ReturnType<NextApiResponse['getHeader']>

type CallOptions = {
  method: RequestMethod
  body?: Record<string, string>
  query?: Record<string, string>
}

export type CallResult = {
  status: number
  location: string
  html: string
  allow: HeaderValue
}

/**
 * In-process app: memory stores shared across calls and a cookie jar that
 * follows Set-Cookie the way a browser would.
 */
export function createTestApp(seed: { users?: UserRecord[]; classrooms?: Classroom[] } = {}) {
  const users = createMemoryUserStore(seed.users)
  const classrooms = createMemoryClassroomStore(seed.classrooms)
  const jar = new Map<string, string>()

  function storeCookies(header: HeaderValue) {
    for (const line of [header].flat()) {
      if (typeof line !== 'string') continue
      for (const [name, value] of Object.entries(parse(line.split(';')[0] ?? ''))) {
        if (value) jar.set(name, value)
        else jar.delete(name)
      }
    }
  }

  async function call(handler: ContextHandler, { method, body = {}, query = {} }: CallOptions): Promise<CallResult> {
    const { req, res } = createMocks<NextApiRequest, NextApiResponse>({
      method,
      body,
      query,
      cookies: Object.fromEntries(jar),
    })
    await withRequestContext(handler, { config: testConfig, stores: () => ({ users, classrooms }) })(req, res)
    storeCookies(res.getHeader('Set-Cookie'))
    return {
      status: res._getStatusCode(),
      location: res._getRedirectUrl(),
      html: String(res._getData()),
      allow: res.getHeader('Allow'),
    }
  }

  function signIn(user: Pick<UserRecord, 'userId' | 'password'>) {
    return call(loginHandler, { method: 'POST', body: { user_id: user.userId, password: user.password } })
  }

  async function currentSession() {
    const req = createRequest<NextApiRequest>({ cookies: Object.fromEntries(jar) })
    return readSession(req, testConfig())
  }

  return { users, classrooms, jar, call, signIn, currentSession }
}
