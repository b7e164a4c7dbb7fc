import { BadRequestError } from './http'

export function asString(value: unknown) {
  if (Array.isArray(value)) return asString(value[0])
  return typeof value === 'string' ? value.trim() : ''
}

const TRUE_VALUES = ['1', 'true', 't', 'yes', 'y', 'on']
const FALSE_VALUES = ['0', 'false', 'f', 'no', 'n', 'off']

// An unchecked checkbox is simply absent, so absent (or empty) means false.
export function parseBoolean(value: unknown, field: string): boolean {
  if (Array.isArray(value)) return parseBoolean(value[value.length - 1], field)
  if (value === undefined || value === null) return false
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase()
    if (!normalised || FALSE_VALUES.includes(normalised)) return false
    if (TRUE_VALUES.includes(normalised)) return true
  }
  throw new BadRequestError(`Field "${field}" must be a boolean`)
}

export function requireField(body: Record<string, unknown>, field: string) {
  const value = asString(body[field])
  if (!value) throw new BadRequestError(`Field "${field}" is required`)
  return value
}

export function parseInteger(value: unknown, field: string) {
  const raw = asString(value)
  if (!/^[+-]?\d+$/.test(raw)) throw new BadRequestError(`Field "${field}" must be an integer`)
  const parsed = Number.parseInt(raw, 10)
  if (!Number.isSafeInteger(parsed)) throw new BadRequestError(`Field "${field}" is out of range`)
  return parsed
}

export function formBody(body: unknown): Record<string, unknown> {
  if (!body || typeof body !== 'object' || Array.isArray(body)) return {}
  return { ...body }
}
