/**
 * GitRepositoryManagerImpl — drives the git CLI through a GitRunner.
 *
 * Network operations (clone, fetch) are bounded by the network timeout and
 * retried with exponential backoff while their failure looks transient.
 * Local operations fail fast.
 */

import { realpath, rm, stat } from 'node:fs/promises'
import { resolve } from 'node:path'
import type { InvocationContext } from '../../core/context.js'
import {
  BranchConflictError,
  GitError,
  StateConflictError,
  TimeoutError,
} from '../../core/errors.js'
import { maskSecrets, redactUrl } from '../../cli/utils/masking.js'
import { withRetry } from '../../utils/helpers.js'
import {
  MIN_GIT_VERSION,
  getGitVersion,
  isGitVersionSupported,
  isTransientGitFailure,
  spawnGit,
  type GitRunner,
  type GitSpawnResult,
} from './git-utils.js'
import type {
  BranchOutcome,
  CloneOutcome,
  GitRepositoryManager,
  GitRepositoryManagerOptions,
  GitRetryPolicy,
} from './git-repository-manager.js'

// ---------------------------------------------------------------------------
// Retry wrapper
// ---------------------------------------------------------------------------

/**
 * Run a git network operation, retrying transient GitErrors with
 * exponential backoff (`baseDelayMs * 2^n`). Every retry is logged and
 * emitted as `git:retry`.
 */
export function withGitRetry<T>(
  ctx: InvocationContext,
  operation: string,
  policy: GitRetryPolicy,
  fn: (attempt: number) => Promise<T>,
): Promise<T> {
  return withRetry(fn, {
    maxRetries: policy.count,
    baseDelayMs: policy.baseDelayMs,
    shouldRetry: (error) => error instanceof GitError && error.transient,
    onRetry: (error, attempt, delayMs) => {
      const stderr = error instanceof GitError ? error.stderr : String(error)
      ctx.logger.warn({ operation, attempt, delayMs, stderr }, 'Transient git failure, retrying')
      ctx.events.emit('git:retry', { operation, attempt, delayMs, stderr })
    },
  })
}

// ---------------------------------------------------------------------------
// GitRepositoryManagerImpl
// ---------------------------------------------------------------------------

interface RunOptions {
  cwd?: string
  url?: string
  network?: boolean
}

export class GitRepositoryManagerImpl implements GitRepositoryManager {
  private readonly _run: GitRunner
  private readonly _networkTimeoutMs: number
  private readonly _retry: GitRetryPolicy

  constructor(options: GitRepositoryManagerOptions) {
    this._run = options.runner ?? spawnGit
    this._networkTimeoutMs = options.networkTimeoutMs
    this._retry = options.retry
  }

  // -------------------------------------------------------------------------
  // Network operations
  // -------------------------------------------------------------------------

  async cloneIfAbsent(ctx: InvocationContext, url: string, dir: string): Promise<CloneOutcome> {
    if (await this.isWorkTree(dir)) {
      const origin = await this.remoteUrl(dir)
      if (origin === url) {
        ctx.logger.debug({ dir }, 'Clone already present')
        return 'present'
      }
      throw new StateConflictError(
        `${dir} is a clone of ${redactUrl(origin ?? '(no origin)')}, not ${redactUrl(url)}`,
        `Move ${dir} aside or tear the workspace down, then provision again`,
        { dir },
      )
    }

    await withGitRetry(ctx, 'clone', this._retry, async (attempt) => {
      // a killed or failed attempt may leave a partial directory behind
      if (attempt > 0) await rm(dir, { recursive: true, force: true })
      await this._runOrThrow('clone', ['clone', '--', url, dir], { url, network: true })
    })

    ctx.logger.info({ url: redactUrl(url), dir }, 'Repository cloned')
    return 'cloned'
  }

  async fetch(ctx: InvocationContext, dir: string): Promise<void> {
    await withGitRetry(ctx, 'fetch', this._retry, async () => {
      await this._runOrThrow('fetch', ['fetch', '--prune', 'origin'], { cwd: dir, network: true })
    })
    ctx.logger.debug({ dir }, 'Fetched origin')
  }

  // -------------------------------------------------------------------------
  // Branches
  // -------------------------------------------------------------------------

  async checkoutOrCreateBranch(
    ctx: InvocationContext,
    dir: string,
    branch: string,
    base?: string,
  ): Promise<BranchOutcome> {
    const local = await this._revParse(dir, `refs/heads/${branch}`)
    const remote = await this._revParse(dir, `refs/remotes/origin/${branch}`)

    let outcome: BranchOutcome
    if (local !== null && remote !== null) {
      outcome = await this._reconcile(dir, branch, local, remote)
    } else if (local !== null) {
      await this._runOrThrow('checkout', ['checkout', branch], { cwd: dir })
      outcome = 'checked-out'
    } else if (remote !== null) {
      await this._runOrThrow('checkout', ['checkout', '-b', branch, '--track', `origin/${branch}`], {
        cwd: dir,
      })
      outcome = 'tracked-remote'
    } else {
      const startPoint = base !== undefined ? `origin/${base}` : 'origin/HEAD'
      await this._runOrThrow('checkout', ['checkout', '--no-track', '-b', branch, startPoint], {
        cwd: dir,
      })
      outcome = 'created'
    }

    ctx.logger.info({ dir, branch, outcome }, 'Branch checked out')
    return outcome
  }

  private async _reconcile(
    dir: string,
    branch: string,
    localSha: string,
    remoteSha: string,
  ): Promise<BranchOutcome> {
    if (localSha === remoteSha) {
      await this._runOrThrow('checkout', ['checkout', branch], { cwd: dir })
      return 'checked-out'
    }
    if (await this._isAncestor(dir, localSha, remoteSha)) {
      await this._runOrThrow('checkout', ['checkout', branch], { cwd: dir })
      await this._runOrThrow('merge', ['merge', '--ff-only', `origin/${branch}`], { cwd: dir })
      return 'fast-forwarded'
    }
    if (await this._isAncestor(dir, remoteSha, localSha)) {
      await this._runOrThrow('checkout', ['checkout', branch], { cwd: dir })
      return 'local-ahead'
    }
    throw new BranchConflictError(branch, { dir })
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  async isWorkTree(dir: string): Promise<boolean> {
    let real: string
    try {
      const info = await stat(dir)
      if (!info.isDirectory()) return false
      real = await realpath(dir)
    } catch {
      return false
    }
    const result = await this._run(['rev-parse', '--show-toplevel'], { cwd: dir })
    return result.code === 0 && resolve(result.stdout) === real
  }

  async remoteUrl(dir: string): Promise<string | null> {
    const result = await this._run(['config', '--get', 'remote.origin.url'], { cwd: dir })
    return result.code === 0 && result.stdout !== '' ? result.stdout : null
  }

  async verifyGitVersion(): Promise<string> {
    const version = await getGitVersion(this._run)
    if (version === null) {
      throw new GitError('git is not installed or could not be executed; install git 2.20 or newer', {
        operation: 'version',
        exitCode: 1,
        stderr: '',
        transient: false,
      })
    }
    if (!isGitVersionSupported(version)) {
      throw new GitError(`git ${version} is too old; storyloom requires git ${MIN_GIT_VERSION} or newer`, {
        operation: 'version',
        exitCode: 0,
        stderr: '',
        transient: false,
      })
    }
    return version
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private async _revParse(dir: string, ref: string): Promise<string | null> {
    const result = await this._run(['rev-parse', '--verify', '--quiet', ref], { cwd: dir })
    return result.code === 0 && result.stdout !== '' ? result.stdout : null
  }

  private async _isAncestor(dir: string, ancestor: string, descendant: string): Promise<boolean> {
    const result = await this._run(['merge-base', '--is-ancestor', ancestor, descendant], { cwd: dir })
    return result.code === 0
  }

  /**
   * Run git and turn a non-zero exit into GitError, or a timeout kill into
   * TimeoutError. Only network operations get a timeout and a transient
   * classification.
   */
  private async _runOrThrow(operation: string, args: string[], options: RunOptions): Promise<GitSpawnResult> {
    const network = options.network === true
    const result = await this._run(args, {
      ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
      ...(network ? { timeoutMs: this._networkTimeoutMs } : {}),
    })

    const url = options.url !== undefined ? redactUrl(options.url) : undefined

    if (result.timedOut) {
      throw new TimeoutError(`git ${operation}`, this._networkTimeoutMs, {
        ...(url !== undefined ? { url } : {}),
      })
    }

    if (result.code !== 0) {
      const stderr = maskSecrets(result.stderr)
      const firstLine = stderr.split('\n').find((line) => line.trim() !== '') ?? 'no output'
      throw new GitError(`git ${operation} failed: ${firstLine}`, {
        operation,
        ...(url !== undefined ? { url } : {}),
        exitCode: result.code,
        stderr,
        transient: network && isTransientGitFailure(stderr),
      })
    }

    return result
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createGitRepositoryManager(options: GitRepositoryManagerOptions): GitRepositoryManager {
  return new GitRepositoryManagerImpl(options)
}
