export const ROLE_VALUES = ['Admin', 'Student'] as const
export type Role = typeof ROLE_VALUES[number]

export function normalizeRoleInput(input: unknown): Role | undefined {
  if (typeof input !== 'string') return undefined
  const lower = input.trim().toLowerCase()
  if (!lower) return undefined
  return ROLE_VALUES.find(role => role.toLowerCase() === lower)
}

export function isAdmin(role?: Role | null) {
  return role === 'Admin'
}
