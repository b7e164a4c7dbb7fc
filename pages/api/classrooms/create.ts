import { requireAdmin } from '../../../lib/auth'
import { parseClassroomForm } from '../../../lib/classroomForm'
import { methodNotAllowed, withRequestContext, type ContextHandler } from '../../../lib/requestContext'
import { classroomFormPage } from '../../../lib/views/classrooms'
import { renderPage } from '../../../lib/views/render'

export const handler: ContextHandler = async (req, res, ctx) => {
  if (req.method !== 'GET' && req.method !== 'POST') {
    methodNotAllowed(req, res, ['GET', 'POST'])
    return
  }

  const user = await requireAdmin(ctx)
  if (req.method === 'GET') {
    renderPage(res, classroomFormPage({ mode: 'create', user }))
    return
  }

  const input = parseClassroomForm(req.body)
  const id = await ctx.classrooms.create(input)
  console.info('[classrooms] created', { id, by: user.userId })
  res.redirect(303, '/classrooms')
}

export default withRequestContext(handler)
