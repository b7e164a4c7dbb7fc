import { usesPlaceholderSecret } from '../../lib/config'
import { methodNotAllowed, withRequestContext, type ContextHandler } from '../../lib/requestContext'

export const handler: ContextHandler = async (req, res, ctx) => {
  if (!ctx.config.debug) {
    res.status(404).end()
    return
  }
  if (req.method !== 'GET') {
    methodNotAllowed(req, res, ['GET'])
    return
  }

  const info: { config: Record<string, boolean | number>; storage: Record<string, unknown> } = {
    config: {
      sessionSecretConfigured: !usesPlaceholderSecret(ctx.config),
      secureCookie: ctx.config.secureCookie,
      sessionMaxAge: ctx.config.sessionMaxAge,
    },
    storage: {},
  }

  try {
    const classrooms = await ctx.classrooms.list()
    info.storage = { reachable: true, dataDir: ctx.config.dataDir, classroomCount: classrooms.length }
  } catch (err) {
    console.error('/api/health storage error', err)
    info.storage = { reachable: false, error: err instanceof Error ? err.message : String(err) }
  }

  res.status(200).json(info)
}

export default withRequestContext(handler)
