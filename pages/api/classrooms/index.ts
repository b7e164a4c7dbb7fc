import { requireAuth } from '../../../lib/auth'
import { methodNotAllowed, withRequestContext, type ContextHandler } from '../../../lib/requestContext'
import { classroomListPage } from '../../../lib/views/classrooms'
import { renderPage } from '../../../lib/views/render'

export const handler: ContextHandler = async (req, res, ctx) => {
  if (req.method !== 'GET') {
    methodNotAllowed(req, res, ['GET'])
    return
  }
  // Any signed-in role may browse; changes are admin-only.
  const user = await requireAuth(ctx)
  const classrooms = await ctx.classrooms.list()
  renderPage(res, classroomListPage({ classrooms, user }))
}

export default withRequestContext(handler)
