/**
 * Advisory filesystem locks scoped to one resource (a story, a workspace,
 * a project counter).
 *
 * Built on proper-lockfile: the lock is a directory created next to the
 * guarded path, its mtime refreshed while held. A process that dies while
 * holding it leaves a lock that goes stale after `staleMs` and is then taken
 * over by the next caller.
 */

import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import lockfile from 'proper-lockfile'
import { BusyError } from '../core/errors.js'
import { hasErrnoCode, sleep } from './helpers.js'

// proper-lockfile refuses stale values below 2s
const MIN_STALE_MS = 2000

export interface LockOptions {
  /** Longest time to wait for a held lock before giving up with BusyError */
  timeoutMs: number
  /** Age after which an unrefreshed lock is considered abandoned */
  staleMs: number
  /** false: fail fast with BusyError instead of waiting */
  wait?: boolean
  /** Delay between acquisition attempts while waiting */
  pollMs?: number
}

export type ReleaseLock = () => Promise<void>

/**
 * Acquire the lock at `lockPath`.
 *
 * @param lockPath - Path the lock guards; the lock directory is `${lockPath}.lock`
 * @param resource - Human-readable name used in the BusyError message
 * @throws BusyError when the lock is still held after `timeoutMs`
 */
export async function acquireLock(
  lockPath: string,
  resource: string,
  options: LockOptions,
): Promise<ReleaseLock> {
  const { timeoutMs, wait = true, pollMs = 50 } = options
  const staleMs = Math.max(options.staleMs, MIN_STALE_MS)

  await mkdir(dirname(lockPath), { recursive: true })

  const startedAt = Date.now()
  for (;;) {
    try {
      const release = await lockfile.lock(lockPath, {
        realpath: false,
        stale: staleMs,
        retries: 0,
        lockfilePath: `${lockPath}.lock`,
      })
      return async () => {
        await release()
      }
    } catch (err) {
      if (!hasErrnoCode(err, 'ELOCKED')) throw err
      const waitedMs = Date.now() - startedAt
      if (!wait || waitedMs >= timeoutMs) {
        throw new BusyError(resource, waitedMs, { lockPath })
      }
      await sleep(Math.min(pollMs, timeoutMs - waitedMs))
    }
  }
}

/**
 * Run `fn` while holding the lock at `lockPath`. The lock is released
 * whether `fn` resolves or throws.
 */
export async function withLock<T>(
  lockPath: string,
  resource: string,
  options: LockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  const release = await acquireLock(lockPath, resource, options)
  try {
    return await fn()
  } finally {
    await release()
  }
}
