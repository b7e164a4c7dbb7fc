import type { NextApiRequest, NextApiResponse } from 'next'
import { loadConfig, type AppConfig } from './config'
import { HttpError } from './http'
import { readSession, type SessionData } from './session'
import { createFileClassroomStore, type ClassroomStore } from './stores/classrooms'
import { createFileUserStore, type UserStore } from './stores/users'
import { renderPage } from './views/render'
import { errorPage } from './views/errors'

export type Stores = {
  users: UserStore
  classrooms: ClassroomStore
}

export type RequestContext = Stores & {
  config: AppConfig
  session: SessionData | null
}

export type ContextHandler = (req: NextApiRequest, res: NextApiResponse, ctx: RequestContext) => Promise<void>

export type RequestContextOptions = {
  config?: () => AppConfig
  stores?: (config: AppConfig) => Stores
}

export function fileStores(config: AppConfig): Stores {
  return {
    users: createFileUserStore(config.dataDir),
    classrooms: createFileClassroomStore(config.dataDir),
  }
}

export function withRequestContext(handler: ContextHandler, options: RequestContextOptions = {}) {
  const resolveConfig = options.config ?? (() => loadConfig())
  const resolveStores = options.stores ?? fileStores

  return async function route(req: NextApiRequest, res: NextApiResponse) {
    try {
      const config = resolveConfig()
      const session = await readSession(req, config)
      await handler(req, res, { config, session, ...resolveStores(config) })
    } catch (err) {
      if (err instanceof HttpError) {
        renderPage(res, errorPage({ status: err.status, message: err.message }), err.status)
        return
      }
      console.error(`${req.method} ${req.url} server error`, err)
      renderPage(res, errorPage({ status: 500, message: 'Something went wrong on our side.' }), 500)
    }
  }
}

export function methodNotAllowed(req: NextApiRequest, res: NextApiResponse, allowed: string[]) {
  res.setHeader('Allow', allowed)
  res.status(405).end(`Method ${req.method} Not Allowed`)
}
