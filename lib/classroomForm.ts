import type { NextApiRequest } from 'next'
import { formBody, parseBoolean, parseInteger, requireField } from './forms'
import { NotFoundError } from './http'
import { buildEquipment, type ClassroomInput } from './stores/classrooms'

export const CLASSROOM_NOT_FOUND = 'Classroom not found.'

export function parseClassroomForm(body: unknown): ClassroomInput {
  const fields = formBody(body)
  return {
    name: requireField(fields, 'name'),
    location: requireField(fields, 'location'),
    capacity: parseInteger(fields.capacity, 'capacity'),
    equipment: buildEquipment({
      projector: parseBoolean(fields.projector, 'projector'),
      whiteboard: parseBoolean(fields.whiteboard, 'whiteboard'),
    }),
  }
}

export function parseClassroomId(req: NextApiRequest) {
  const idParam = Array.isArray(req.query.id) ? req.query.id[0] : req.query.id
  if (!idParam || !/^\d+$/.test(idParam)) throw new NotFoundError(CLASSROOM_NOT_FOUND)
  return Number.parseInt(idParam, 10)
}
