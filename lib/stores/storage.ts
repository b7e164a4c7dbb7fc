import crypto from 'crypto'
import { promises as fs } from 'fs'
import path from 'path'

export interface DocumentStorage<T> {
  read(): Promise<T>
  write(value: T): Promise<void>
}

export function createMemoryStorage<T>(initial: T): DocumentStorage<T> {
  let current = structuredClone(initial)
  return {
    async read() {
      return structuredClone(current)
    },
    async write(value) {
      current = structuredClone(value)
    },
  }
}

function isMissingFile(err: unknown) {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * JSON document on disk. Every read goes back to the file so separate
 * requests (and processes) see each other's writes; writes land in a temp
 * file first and are renamed over the target.
 */
export function createJsonFileStorage<T>(
  filePath: string,
  empty: () => T,
  parse: (raw: unknown) => T
): DocumentStorage<T> {
  return {
    async read() {
      let raw: string
      try {
        raw = await fs.readFile(filePath, 'utf8')
      } catch (err) {
        if (isMissingFile(err)) return empty()
        throw err
      }
      if (!raw.trim()) return empty()
      const data: unknown = JSON.parse(raw)
      return parse(data)
    },
    async write(value) {
      await fs.mkdir(path.dirname(filePath), { recursive: true })
      const tmpPath = `${filePath}.${process.pid}.${crypto.randomUUID()}.tmp`
      await fs.writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8')
      await fs.rename(tmpPath, filePath)
    },
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export class CorruptStoreError extends Error {
  constructor(file: string, detail: string) {
    super(`${file}: ${detail}`)
    this.name = 'CorruptStoreError'
  }
}
