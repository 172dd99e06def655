/**
 * Atomic file replacement: write a temp file beside the target, then rename
 * it over the target. Readers see the old or the new content, never a
 * partial write.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { hasErrnoCode } from './helpers.js'

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true })
  const tempPath = `${filePath}.${String(process.pid)}.${Math.random().toString(36).slice(2)}.tmp`

  try {
    await writeFile(tempPath, content, 'utf-8')
    await rename(tempPath, filePath)
  } catch (err) {
    // Clean up temp file on failure; a missing temp file is fine
    await unlink(tempPath).catch((cleanupErr: unknown) => {
      if (!hasErrnoCode(cleanupErr, 'ENOENT')) throw cleanupErr
    })
    throw err
  }
}
