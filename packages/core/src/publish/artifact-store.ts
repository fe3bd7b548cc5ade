/**
 * Artifact Stores
 *
 * Single-slot storage for the published calendar. `replace` swaps the whole
 * artifact at once: a reader sees the previous document or the new one,
 * never a partial write.
 */

import { randomUUID } from 'node:crypto'
import { mkdir, open, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

export interface ArtifactStore {
  /** Current artifact, or null before the first publish */
  read(): Promise<Uint8Array | null>

  replace(bytes: Uint8Array, signal?: AbortSignal): Promise<void>
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * File-backed store: write a hidden temp file beside the target, flush it to
 * disk, then rename it over the target.
 */
export class FileArtifactStore implements ArtifactStore {
  readonly path: string

  constructor(path: string) {
    this.path = path
  }

  async read(): Promise<Uint8Array | null> {
    try {
      return await readFile(this.path)
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  async replace(bytes: Uint8Array, signal?: AbortSignal): Promise<void> {
    const dir = dirname(this.path)
    // Dot-prefixed so the static file server never exposes it
    const tempPath = join(dir, `.${basename(this.path)}.${process.pid}.${randomUUID()}.tmp`)

    await mkdir(dir, { recursive: true })

    try {
      await writeFile(tempPath, bytes, { signal })

      const handle = await open(tempPath, 'r+')
      try {
        await handle.sync()
      } finally {
        await handle.close()
      }

      signal?.throwIfAborted()
      await rename(tempPath, this.path)
    } catch (err) {
      await rm(tempPath, { force: true })
      throw err
    }
  }
}

/**
 * In-process store holding one immutable buffer.
 */
export class MemoryArtifactStore implements ArtifactStore {
  private current: Uint8Array | null

  constructor(initial: Uint8Array | null = null) {
    this.current = initial
  }

  async read(): Promise<Uint8Array | null> {
    return this.current
  }

  async replace(bytes: Uint8Array, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()
    this.current = Uint8Array.from(bytes)
  }
}
