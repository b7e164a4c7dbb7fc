import { expect, test } from '@playwright/test'
import type { NextApiRequest, NextApiResponse } from 'next'
import { createRequest, createResponse } from 'node-mocks-http'
import { parse } from 'cookie'
import { clearSession, createSession, readSession } from '../lib/session'
import { escapeHtml } from '../lib/views/render'
import { errorPage } from '../lib/views/errors'
import { testConfig } from './helpers'

function setCookieLine(res: NextApiResponse) {
  const header = res.getHeader('Set-Cookie')
  return typeof header === 'string' ? header : ''
}

test('a created session reads back with the same user and role', async () => {
  const config = testConfig()
  const res = createResponse<NextApiResponse>()
  await createSession(res, config, { userId: 'alice', role: 'Admin' })

  const line = setCookieLine(res)
  expect(line.startsWith('test.session-token=')).toBe(true)
  expect(line).toContain('Max-Age=3600')
  expect(line).toContain('HttpOnly')
  expect(line).toContain('SameSite=Lax')

  const cookies = parse(line.split(';')[0] ?? '')
  const token = cookies['test.session-token'] ?? ''
  const req = createRequest<NextApiRequest>({ cookies: { 'test.session-token': token } })
  expect(await readSession(req, config)).toEqual({ userId: 'alice', role: 'Admin' })
})

test('a session signed with another secret is ignored', async () => {
  const res = createResponse<NextApiResponse>()
  await createSession(res, { ...testConfig(), sessionSecret: 'other-secret' }, { userId: 'alice', role: 'Admin' })
  const token = parse(setCookieLine(res).split(';')[0] ?? '')['test.session-token'] ?? ''
  const req = createRequest<NextApiRequest>({ cookies: { 'test.session-token': token } })
  expect(await readSession(req, testConfig())).toBeNull()
})

test('clearing the session expires the cookie', () => {
  const res = createResponse<NextApiResponse>()
  clearSession(res, testConfig())
  const line = setCookieLine(res)
  expect(line.startsWith('test.session-token=;')).toBe(true)
  expect(line).toContain('Max-Age=0')
})

test('html escaping covers markup and quotes', () => {
  expect(escapeHtml(`<a href="x">Tom's</a> & co`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom&#39;s&lt;/a&gt; &amp; co')
  expect(escapeHtml(42)).toBe('42')
})

test('error pages carry the status title and message', () => {
  const html = errorPage({ status: 404, message: 'Classroom not found.' })
  expect(html).toContain('<title>Not found | Classroom Booking</title>')
  expect(html).toContain('<p class="error-detail">Classroom not found.</p>')
  expect(html).not.toContain('Go to sign in')
})
