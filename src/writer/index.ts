/**
 * Result Writer
 *
 * Durable, append-only JSONL persistence: one record per line, flushed to disk
 * before append() resolves. Existing content is never rewritten or truncated.
 * Each line is written with a single write() in append mode, so concurrent
 * readers see either nothing or the whole line.
 *
 * A log whose last line was torn by a crash gets a newline before the next
 * record, so the torn line stays malformed on its own and the new record parses.
 */

import { type FileHandle, mkdir, open } from 'node:fs/promises'
import { dirname } from 'node:path'
import { formatUnit, type ResultRecord } from '../types'

/**
 * Raised when a record could not be made durable.
 * The caller must not treat the unit as complete.
 */
export class PersistenceFailure extends Error {
  readonly sampleId: string
  readonly runIndex: number
  readonly path: string

  constructor(record: Pick<ResultRecord, 'sampleId' | 'runIndex'>, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to persist result for ${formatUnit(record)} to ${path}: ${reason}`, { cause })
    this.name = 'PersistenceFailure'
    this.sampleId = record.sampleId
    this.runIndex = record.runIndex
    this.path = path
  }
}

/**
 * Anything that can durably store a record. The orchestrator depends only on this.
 */
export interface ResultWriter {
  /** @throws PersistenceFailure */
  append(record: ResultRecord): Promise<void>
}

/**
 * Serialize one record as a single log line (with trailing newline).
 */
export function serializeRecord(record: ResultRecord): string {
  return `${JSON.stringify(record)}\n`
}

/**
 * True when the file is empty or already ends with a newline.
 */
async function endsWithNewline(handle: FileHandle): Promise<boolean> {
  const { size } = await handle.stat()
  if (size === 0) return true
  const { buffer, bytesRead } = await handle.read(Buffer.alloc(1), 0, 1, size - 1)
  return bytesRead === 1 && buffer[0] === 0x0a
}

export class JsonlResultWriter implements ResultWriter {
  private directoryReady = false
  /** Set once the log is known to end on a line boundary; cleared after a failed append */
  private tailChecked = false

  constructor(readonly path: string) {}

  async append(record: ResultRecord): Promise<void> {
    if (!record.sampleId) {
      throw new PersistenceFailure(record, this.path, new Error('record has no sampleId'))
    }

    try {
      if (!this.directoryReady) {
        await mkdir(dirname(this.path), { recursive: true })
        this.directoryReady = true
      }

      const handle = await open(this.path, 'a+')
      try {
        const prefix = this.tailChecked || (await endsWithNewline(handle)) ? '' : '\n'
        const data = Buffer.from(prefix + serializeRecord(record), 'utf-8')
        const { bytesWritten } = await handle.write(data)
        if (bytesWritten < data.length) {
          throw new Error(`short write: ${bytesWritten} of ${data.length} bytes`)
        }
        await handle.datasync()
      } finally {
        await handle.close()
      }
      this.tailChecked = true
    } catch (error) {
      this.tailChecked = false
      throw new PersistenceFailure(record, this.path, error)
    }
  }
}
