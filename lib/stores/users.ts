import path from 'path'
import { normalizeRoleInput, type Role } from '../roles'
import {
  CorruptStoreError,
  createJsonFileStorage,
  createMemoryStorage,
  isRecord,
  type DocumentStorage,
} from './storage'

export type UserRecord = {
  userId: string
  // Stored and compared as entered; hashing is not part of this store yet.
  password: string
  role: Role
}

export type UsersDocument = {
  users: UserRecord[]
}

export interface UserStore {
  register(userId: string, password: string, role: Role): Promise<boolean>
  get(userId: string): Promise<UserRecord | null>
  getRole(userId: string): Promise<Role | null>
}

const USERS_FILE = 'users.json'

function emptyUsers(): UsersDocument {
  return { users: [] }
}

export function parseUsersDocument(raw: unknown): UsersDocument {
  if (!isRecord(raw) || !Array.isArray(raw.users)) {
    throw new CorruptStoreError(USERS_FILE, 'expected an object with a "users" array')
  }
  const users = raw.users.map((entry, index): UserRecord => {
    const role = isRecord(entry) ? normalizeRoleInput(entry.role) : undefined
    if (!isRecord(entry) || typeof entry.userId !== 'string' || typeof entry.password !== 'string' || !role) {
      throw new CorruptStoreError(USERS_FILE, `invalid user at index ${index}`)
    }
    return { userId: entry.userId, password: entry.password, role }
  })
  return { users }
}

export function createUserStore(storage: DocumentStorage<UsersDocument>): UserStore {
  async function get(userId: string) {
    const { users } = await storage.read()
    return users.find(user => user.userId === userId) ?? null
  }

  return {
    async register(userId, password, role) {
      const doc = await storage.read()
      if (doc.users.some(user => user.userId === userId)) return false
      doc.users.push({ userId, password, role })
      await storage.write(doc)
      return true
    },
    get,
    async getRole(userId) {
      const user = await get(userId)
      return user ? user.role : null
    },
  }
}

export function createFileUserStore(dataDir: string) {
  return createUserStore(createJsonFileStorage(path.join(dataDir, USERS_FILE), emptyUsers, parseUsersDocument))
}

export function createMemoryUserStore(initial: UserRecord[] = []) {
  return createUserStore(createMemoryStorage<UsersDocument>({ users: initial }))
}
