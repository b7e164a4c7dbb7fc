import { expect, test } from '@playwright/test'
import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { CorruptStoreError } from '../lib/stores/storage'
import { createFileClassroomStore, createMemoryClassroomStore } from '../lib/stores/classrooms'
import { createFileUserStore, createMemoryUserStore } from '../lib/stores/users'
import { LAB_1 } from './helpers'

async function tempDataDir() {
  return fs.mkdtemp(path.join(os.tmpdir(), 'classroom-admin-'))
}

test.describe('file stores', () => {
  test('users written by one store are seen by the next', async () => {
    const dataDir = await tempDataDir()
    try {
      expect(await createFileUserStore(dataDir).register('alice', 'pw1', 'Admin')).toBe(true)
      const reopened = createFileUserStore(dataDir)
      expect(await reopened.get('alice')).toEqual({ userId: 'alice', password: 'pw1', role: 'Admin' })
      expect(await reopened.register('alice', 'pw2', 'Student')).toBe(false)
      expect(await reopened.getRole('alice')).toBe('Admin')
      expect(await reopened.getRole('bob')).toBeNull()
    } finally {
      await fs.rm(dataDir, { recursive: true, force: true })
    }
  })

  test('classroom ids keep counting after a delete', async () => {
    const dataDir = await tempDataDir()
    try {
      const store = createFileClassroomStore(dataDir)
      const room = { name: 'Lab1', location: 'Bldg A', capacity: 30, equipment: { projector: true as const } }
      expect(await store.create(room)).toBe(1)
      expect(await store.create({ ...room, name: 'Lab2' })).toBe(2)
      expect(await store.delete(2)).toBe(true)
      expect(await createFileClassroomStore(dataDir).create({ ...room, name: 'Lab3' })).toBe(3)
      expect((await store.list()).map(r => r.name)).toEqual(['Lab1', 'Lab3'])
    } finally {
      await fs.rm(dataDir, { recursive: true, force: true })
    }
  })

  test('equipment is written with present flags only', async () => {
    const dataDir = await tempDataDir()
    try {
      await createFileClassroomStore(dataDir).create({ name: 'Lab1', location: 'Bldg A', capacity: 30, equipment: { projector: true } })
      const saved = JSON.parse(await fs.readFile(path.join(dataDir, 'classrooms.json'), 'utf8'))
      expect(saved).toEqual({
        nextId: 2,
        classrooms: [{ id: 1, name: 'Lab1', location: 'Bldg A', capacity: 30, equipment: { projector: true } }],
      })
      expect(Object.keys(saved.classrooms[0].equipment)).toEqual(['projector'])
    } finally {
      await fs.rm(dataDir, { recursive: true, force: true })
    }
  })

  test('writes landing in the same instant all complete', async () => {
    const dataDir = await tempDataDir()
    try {
      const store = createFileClassroomStore(dataDir)
      const results = await Promise.allSettled(
        Array.from({ length: 8 }, (_, i) => store.create({ name: `R${i}`, location: 'Bldg A', capacity: 10, equipment: {} }))
      )
      expect(results.filter(result => result.status === 'rejected')).toEqual([])
      expect(await fs.readdir(dataDir)).toEqual(['classrooms.json'])
      expect((await store.list()).length).toBeGreaterThanOrEqual(1)
    } finally {
      await fs.rm(dataDir, { recursive: true, force: true })
    }
  })

  test('a missing data directory reads as empty', async () => {
    const dataDir = path.join(os.tmpdir(), `classroom-admin-missing-${process.pid}-${Date.now()}`)
    expect(await createFileClassroomStore(dataDir).list()).toEqual([])
    expect(await createFileUserStore(dataDir).get('anyone')).toBeNull()
  })

  test('a malformed file is reported rather than treated as empty', async () => {
    const dataDir = await tempDataDir()
    try {
      await fs.writeFile(path.join(dataDir, 'users.json'), JSON.stringify({ users: [{ userId: 'x', role: 'Janitor' }] }))
      await expect(createFileUserStore(dataDir).get('x')).rejects.toThrow(CorruptStoreError)
    } finally {
      await fs.rm(dataDir, { recursive: true, force: true })
    }
  })
})

test.describe('memory stores', () => {
  test('update and delete report missing ids', async () => {
    const store = createMemoryClassroomStore([LAB_1])
    expect(await store.update(7, { name: 'X', location: 'Y', capacity: 1, equipment: {} })).toBe(false)
    expect(await store.delete(7)).toBe(false)
    expect(await store.list()).toEqual([LAB_1])
  })

  test('seeded ids are not handed out again', async () => {
    const store = createMemoryClassroomStore([LAB_1])
    expect(await store.create({ name: 'Lab2', location: 'Bldg A', capacity: 8, equipment: {} })).toBe(2)
  })

  test('returned records are copies', async () => {
    const store = createMemoryUserStore([{ userId: 'alice', password: 'pw1', role: 'Admin' }])
    const user = await store.get('alice')
    if (user) user.role = 'Student'
    expect(await store.getRole('alice')).toBe('Admin')
  })
})
