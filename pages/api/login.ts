import type { NextApiRequest, NextApiResponse } from 'next'
import { getCurrentUser } from '../../lib/auth'
import { asString, formBody } from '../../lib/forms'
import { methodNotAllowed, withRequestContext, type ContextHandler, type RequestContext } from '../../lib/requestContext'
import { createSession } from '../../lib/session'
import { loginPage } from '../../lib/views/auth'
import { renderPage } from '../../lib/views/render'

// Same message for unknown ids and wrong passwords so the form does not reveal which ids exist.
export const LOGIN_FAILED_MESSAGE = 'ID or password is incorrect.'

async function submitLogin(req: NextApiRequest, res: NextApiResponse, ctx: RequestContext) {
  const body = formBody(req.body)
  const userId = asString(body.user_id)
  const password = typeof body.password === 'string' ? body.password : ''

  const user = userId ? await ctx.users.get(userId) : null
  if (!user || user.password !== password) {
    renderPage(res, loginPage({ errorMessage: LOGIN_FAILED_MESSAGE }))
    return
  }

  await createSession(res, ctx.config, { userId: user.userId, role: user.role })
  console.info('[login] signed in', { userId: user.userId })
  res.redirect(303, '/')
}

export const handler: ContextHandler = async (req, res, ctx) => {
  if (req.method === 'GET') {
    if (await getCurrentUser(ctx)) {
      res.redirect(302, '/')
      return
    }
    renderPage(res, loginPage())
    return
  }
  if (req.method === 'POST') {
    await submitLogin(req, res, ctx)
    return
  }
  methodNotAllowed(req, res, ['GET', 'POST'])
}

export default withRequestContext(handler)
