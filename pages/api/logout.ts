import { methodNotAllowed, withRequestContext, type ContextHandler } from '../../lib/requestContext'
import { clearSession } from '../../lib/session'

export const handler: ContextHandler = async (req, res, ctx) => {
  if (req.method !== 'GET') {
    methodNotAllowed(req, res, ['GET'])
    return
  }
  clearSession(res, ctx.config)
  res.redirect(302, '/login')
}

export default withRequestContext(handler)
