import path from 'path'
import {
  CorruptStoreError,
  createJsonFileStorage,
  createMemoryStorage,
  isRecord,
  type DocumentStorage,
} from './storage'

export const EQUIPMENT_FLAGS = ['projector', 'whiteboard'] as const
export type EquipmentFlag = typeof EQUIPMENT_FLAGS[number]

/** Only flags that are present are stored; there is never an explicit `false`. */
export type Equipment = Partial<Record<EquipmentFlag, true>>

export type ClassroomInput = {
  name: string
  location: string
  capacity: number
  equipment: Equipment
}

export type Classroom = ClassroomInput & { id: number }

export type ClassroomsDocument = {
  nextId: number
  classrooms: Classroom[]
}

export interface ClassroomStore {
  create(input: ClassroomInput): Promise<number>
  get(id: number): Promise<Classroom | null>
  list(): Promise<Classroom[]>
  update(id: number, input: ClassroomInput): Promise<boolean>
  delete(id: number): Promise<boolean>
}

const CLASSROOMS_FILE = 'classrooms.json'

export function buildEquipment(flags: Record<EquipmentFlag, boolean>): Equipment {
  const equipment: Equipment = {}
  for (const flag of EQUIPMENT_FLAGS) {
    if (flags[flag]) equipment[flag] = true
  }
  return equipment
}

function emptyClassrooms(): ClassroomsDocument {
  return { nextId: 1, classrooms: [] }
}

function parseEquipment(raw: unknown, index: number): Equipment {
  if (!isRecord(raw)) throw new CorruptStoreError(CLASSROOMS_FILE, `invalid equipment at index ${index}`)
  return buildEquipment({ projector: raw.projector === true, whiteboard: raw.whiteboard === true })
}

export function parseClassroomsDocument(raw: unknown): ClassroomsDocument {
  if (!isRecord(raw) || !Array.isArray(raw.classrooms)) {
    throw new CorruptStoreError(CLASSROOMS_FILE, 'expected an object with a "classrooms" array')
  }
  const classrooms = raw.classrooms.map((entry, index): Classroom => {
    if (
      !isRecord(entry)
      || !Number.isInteger(entry.id)
      || typeof entry.id !== 'number'
      || typeof entry.name !== 'string'
      || typeof entry.location !== 'string'
      || typeof entry.capacity !== 'number'
      || !Number.isInteger(entry.capacity)
    ) {
      throw new CorruptStoreError(CLASSROOMS_FILE, `invalid classroom at index ${index}`)
    }
    return {
      id: entry.id,
      name: entry.name,
      location: entry.location,
      capacity: entry.capacity,
      equipment: parseEquipment(entry.equipment ?? {}, index),
    }
  })
  const highestId = classrooms.reduce((max, room) => Math.max(max, room.id), 0)
  const storedNext = typeof raw.nextId === 'number' && Number.isInteger(raw.nextId) ? raw.nextId : 1
  return { nextId: Math.max(storedNext, highestId + 1), classrooms }
}

export function createClassroomStore(storage: DocumentStorage<ClassroomsDocument>): ClassroomStore {
  return {
    async create(input) {
      const doc = await storage.read()
      const id = doc.nextId
      doc.classrooms.push({ id, ...input, equipment: { ...input.equipment } })
      doc.nextId = id + 1
      await storage.write(doc)
      return id
    },
    async get(id) {
      const { classrooms } = await storage.read()
      return classrooms.find(room => room.id === id) ?? null
    },
    async list() {
      const { classrooms } = await storage.read()
      return [...classrooms].sort((a, b) => a.id - b.id)
    },
    async update(id, input) {
      const doc = await storage.read()
      const index = doc.classrooms.findIndex(room => room.id === id)
      if (index === -1) return false
      doc.classrooms[index] = { id, ...input, equipment: { ...input.equipment } }
      await storage.write(doc)
      return true
    },
    async delete(id) {
      const doc = await storage.read()
      const remaining = doc.classrooms.filter(room => room.id !== id)
      if (remaining.length === doc.classrooms.length) return false
      doc.classrooms = remaining
      await storage.write(doc)
      return true
    },
  }
}

export function createFileClassroomStore(dataDir: string) {
  return createClassroomStore(
    createJsonFileStorage(path.join(dataDir, CLASSROOMS_FILE), emptyClassrooms, parseClassroomsDocument)
  )
}

export function createMemoryClassroomStore(initial: Classroom[] = []) {
  const highestId = initial.reduce((max, room) => Math.max(max, room.id), 0)
  return createClassroomStore(createMemoryStorage<ClassroomsDocument>({ nextId: highestId + 1, classrooms: initial }))
}
