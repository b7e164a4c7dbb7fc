import type { NextApiRequest, NextApiResponse } from 'next'
import { getCurrentUser } from '../../lib/auth'
import { asString, formBody } from '../../lib/forms'
import { BadRequestError } from '../../lib/http'
import { methodNotAllowed, withRequestContext, type ContextHandler, type RequestContext } from '../../lib/requestContext'
import { normalizeRoleInput } from '../../lib/roles'
import { registerPage } from '../../lib/views/auth'
import { renderPage } from '../../lib/views/render'

async function submitRegistration(req: NextApiRequest, res: NextApiResponse, ctx: RequestContext) {
  const body = formBody(req.body)
  const userId = asString(body.user_id)
  const password = typeof body.password === 'string' ? body.password : ''
  const role = normalizeRoleInput(body.role)
  if (!role) throw new BadRequestError('Role must be Admin or Student.')

  if (!userId || !password) {
    renderPage(res, registerPage({ errorMessage: 'Both ID and password are required.' }))
    return
  }

  const created = await ctx.users.register(userId, password, role)
  if (!created) {
    renderPage(res, registerPage({ errorMessage: `The ID ${userId} is already in use.` }))
    return
  }

  console.info('[register] created user', { userId, role })
  res.redirect(303, '/login')
}

export const handler: ContextHandler = async (req, res, ctx) => {
  if (req.method === 'GET') {
    if (await getCurrentUser(ctx)) {
      res.redirect(302, '/')
      return
    }
    renderPage(res, registerPage())
    return
  }
  if (req.method === 'POST') {
    await submitRegistration(req, res, ctx)
    return
  }
  methodNotAllowed(req, res, ['GET', 'POST'])
}

export default withRequestContext(handler)
