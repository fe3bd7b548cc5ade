/**
 * Publisher
 *
 * Turns an encoded document into the served artifact.
 */

import { Buffer } from 'node:buffer'
import { PublishError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { ArtifactStore } from './artifact-store.js'

const log = createLogger('publisher')

export interface PublishResult {
  /** False when the document matched the current artifact and nothing was written */
  changed: boolean
  bytes: number
}

export class Publisher {
  private store: ArtifactStore

  constructor(store: ArtifactStore) {
    this.store = store
  }

  /**
   * Replace the served artifact with `document`.
   *
   * @throws PublishError on any storage failure; the previous artifact stays in place
   */
  async publish(document: string, signal?: AbortSignal): Promise<PublishResult> {
    const bytes = Buffer.from(document, 'utf-8')

    try {
      const current = await this.store.read()
      if (current && Buffer.compare(bytes, current) === 0) {
        log.debug({ bytes: bytes.length }, 'Document unchanged, skipping write')
        return { changed: false, bytes: bytes.length }
      }

      await this.store.replace(bytes, signal)
    } catch (err) {
      throw new PublishError(
        `Failed to publish calendar: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      )
    }

    log.info({ bytes: bytes.length }, 'Published calendar')
    return { changed: true, bytes: bytes.length }
  }

  /**
   * The currently served document, or null before the first publish.
   */
  async current(): Promise<string | null> {
    const bytes = await this.store.read()
    return bytes ? Buffer.from(bytes).toString('utf-8') : null
  }
}
