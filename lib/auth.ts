import { ForbiddenError, UnauthorizedError } from './http'
import type { RequestContext } from './requestContext'
import { isAdmin, type Role } from './roles'

export type CurrentUser = {
  userId: string
  role: Role
}

// The session only says who signed in; the role always comes from the user store.
export async function getCurrentUser(ctx: RequestContext): Promise<CurrentUser | null> {
  const userId = ctx.session?.userId
  if (!userId) return null
  const user = await ctx.users.get(userId)
  if (!user) return null
  return { userId, role: user.role }
}

export async function requireAuth(ctx: RequestContext) {
  const user = await getCurrentUser(ctx)
  if (!user) throw new UnauthorizedError()
  return user
}

export async function requireAdmin(ctx: RequestContext) {
  const user = await requireAuth(ctx)
  if (!isAdmin(user.role)) throw new ForbiddenError()
  return user
}
