import { getCurrentUser } from '../../lib/auth'
import { methodNotAllowed, withRequestContext, type ContextHandler } from '../../lib/requestContext'
import { homePage } from '../../lib/views/home'
import { renderPage } from '../../lib/views/render'

export const handler: ContextHandler = async (req, res, ctx) => {
  if (req.method !== 'GET') {
    methodNotAllowed(req, res, ['GET'])
    return
  }
  const user = await getCurrentUser(ctx)
  if (!user) {
    res.redirect(302, '/login')
    return
  }
  renderPage(res, homePage(user))
}

export default withRequestContext(handler)
