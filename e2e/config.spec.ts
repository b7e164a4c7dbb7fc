import { expect, test } from '@playwright/test'
import path from 'node:path'
import type { NextApiRequest, NextApiResponse } from 'next'
import { createMocks } from 'node-mocks-http'
import { loadConfig } from '../lib/config'
import { withRequestContext } from '../lib/requestContext'

test('settings are read from the environment', () => {
  const config = loadConfig({
    SESSION_SECRET: 'test-secret',
    SESSION_MAX_AGE: '60',
    DATA_DIR: '/srv/classrooms',
    DEBUG: '1',
  })
  expect(config).toEqual({
    sessionSecret: 'test-secret',
    sessionMaxAge: 60,
    cookieName: 'classroom-admin.session-token',
    secureCookie: false,
    dataDir: path.resolve('/srv/classrooms'),
    debug: true,
  })
})

test('defaults apply when values are missing or unusable', () => {
  const config = loadConfig({ NEXTAUTH_SECRET: 'fallback-secret', SESSION_MAX_AGE: 'soon' })
  expect(config.sessionSecret).toBe('fallback-secret')
  expect(config.sessionMaxAge).toBe(1209600)
  expect(config.dataDir).toBe(path.resolve('.data'))
  expect(config.debug).toBe(false)
})

test('secure cookies switch to the __Secure- name', () => {
  const config = loadConfig({ SESSION_SECRET: 'test-secret', SESSION_COOKIE_SECURE: '1' })
  expect(config.secureCookie).toBe(true)
  expect(config.cookieName).toBe('__Secure-classroom-admin.session-token')
})

test('production refuses to start without a secret', () => {
  expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('SESSION_SECRET is required in production')
})

test('development falls back to a placeholder secret', () => {
  expect(loadConfig({ NODE_ENV: 'development' }).sessionSecret).toBe('dev-session-secret-change-me')
})

test('without a production secret every request fails with a 500 before reaching the handler', async () => {
  let reached = false
  const route = withRequestContext(async () => {
    reached = true
  }, { config: () => loadConfig({ NODE_ENV: 'production' }) })
  const { req, res } = createMocks<NextApiRequest, NextApiResponse>({ method: 'GET', url: '/classrooms' })
  await route(req, res)
  expect(res._getStatusCode()).toBe(500)
  expect(String(res._getData())).toContain('<p class="error-detail">Something went wrong on our side.</p>')
  expect(reached).toBe(false)
})
