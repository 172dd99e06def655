/**
 * WorkspaceRecord — persisted state of one story workspace, stored as
 * `<workspace-root>/.records/<id>.json` and replaced atomically.
 */

import { readFile, readdir, unlink } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { StateConflictError } from '../../core/errors.js'
import { writeFileAtomic } from '../../utils/atomic-write.js'
import { hasErrnoCode } from '../../utils/helpers.js'

export const WorkspaceStatusSchema = z.enum(['unprovisioned', 'cloning', 'ready', 'failed'])
export type WorkspaceStatus = z.infer<typeof WorkspaceStatusSchema>

export const WorkspaceRecordSchema = z.object({
  storyId: z.string(),
  /** `<workspace-root>/<id>` */
  path: z.string(),
  /** Remote URL as given; redact before display */
  remote: z.string(),
  branch: z.string(),
  status: WorkspaceStatusSchema,
  /** Provisioning attempts so far */
  attempts: z.number().int().min(0),
  updatedAt: z.string(),
  lastError: z.string().optional(),
})

export type WorkspaceRecord = z.infer<typeof WorkspaceRecordSchema>

export const RECORDS_DIR_NAME = '.records'

export function recordsDir(workspaceRoot: string): string {
  return join(workspaceRoot, RECORDS_DIR_NAME)
}

export function recordPath(workspaceRoot: string, storyId: string): string {
  return join(recordsDir(workspaceRoot), `${storyId}.json`)
}

/**
 * Read a record.
 *
 * @returns null when the story has no record
 * @throws {StateConflictError} the record file is unreadable
 */
export async function readRecord(workspaceRoot: string, storyId: string): Promise<WorkspaceRecord | null> {
  const filePath = recordPath(workspaceRoot, storyId)
  let raw: string
  try {
    raw = await readFile(filePath, 'utf-8')
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return null
    throw err
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw corruptRecord(filePath, message)
  }
  const result = WorkspaceRecordSchema.safeParse(parsed)
  if (!result.success) {
    throw corruptRecord(filePath, result.error.issues.map((i) => i.message).join('; '))
  }
  return result.data
}

export async function writeRecord(workspaceRoot: string, record: WorkspaceRecord): Promise<void> {
  await writeFileAtomic(recordPath(workspaceRoot, record.storyId), `${JSON.stringify(record, null, 2)}\n`)
}

export async function deleteRecord(workspaceRoot: string, storyId: string): Promise<boolean> {
  try {
    await unlink(recordPath(workspaceRoot, storyId))
    return true
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return false
    throw err
  }
}

/** Ids of every story with a record file */
export async function listRecordIds(workspaceRoot: string): Promise<string[]> {
  let names: string[]
  try {
    names = await readdir(recordsDir(workspaceRoot))
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return []
    throw err
  }
  return names.filter((n) => n.endsWith('.json')).map((n) => n.slice(0, -'.json'.length))
}

function corruptRecord(filePath: string, detail: string): StateConflictError {
  return new StateConflictError(
    `Workspace record ${filePath} is unreadable: ${detail}`,
    `Delete ${filePath} and run "storyloom workspace provision" again`,
    { filePath },
  )
}
