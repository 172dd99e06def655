/**
 * GitRepositoryManager — interface and types for the git operations a
 * story workspace needs: clone, fetch, branch checkout.
 *
 * Every operation is idempotent: calling it again after success changes
 * nothing.
 *
 * Implementation: GitRepositoryManagerImpl (git-repository-manager-impl.ts)
 */

import type { InvocationContext } from '../../core/context.js'
import type { GitRunner } from './git-utils.js'

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type CloneOutcome = 'cloned' | 'present'

/**
 * What checkoutOrCreateBranch() did:
 *  - checked-out:    local branch existed and was not behind its remote
 *  - fast-forwarded: local branch was behind origin and was moved forward
 *  - local-ahead:    local branch has commits origin does not; left alone
 *  - tracked-remote: only origin had the branch; a tracking branch was made
 *  - created:        branch existed nowhere and was created from the base
 */
export type BranchOutcome =
  | 'checked-out'
  | 'fast-forwarded'
  | 'local-ahead'
  | 'tracked-remote'
  | 'created'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface GitRetryPolicy {
  /** Extra attempts after the first one */
  count: number
  baseDelayMs: number
}

export interface GitRepositoryManagerOptions {
  /** Runs git; defaults to spawnGit */
  runner?: GitRunner
  /** Wall-clock limit for clone and fetch */
  networkTimeoutMs: number
  retry: GitRetryPolicy
}

// ---------------------------------------------------------------------------
// GitRepositoryManager interface
// ---------------------------------------------------------------------------

export interface GitRepositoryManager {
  /**
   * Clone `url` into `dir` unless `dir` already is a clone of `url`.
   *
   * @throws {GitError} clone failed (after retries for transient failures)
   * @throws {TimeoutError} clone exceeded the network timeout
   * @throws {StateConflictError} `dir` is a clone of a different remote
   */
  cloneIfAbsent(ctx: InvocationContext, url: string, dir: string): Promise<CloneOutcome>

  /** `git fetch --prune origin`, retried on transient failures */
  fetch(ctx: InvocationContext, dir: string): Promise<void>

  /**
   * Check out `branch`, creating it from `origin/<base>` (or origin/HEAD)
   * when it exists neither locally nor on origin.
   *
   * @throws {BranchConflictError} local and origin branches have diverged
   */
  checkoutOrCreateBranch(
    ctx: InvocationContext,
    dir: string,
    branch: string,
    base?: string,
  ): Promise<BranchOutcome>

  /** true when `dir` is the top level of a git work tree */
  isWorkTree(dir: string): Promise<boolean>

  /** URL of the `origin` remote, or null when there is none */
  remoteUrl(dir: string): Promise<string | null>

  /**
   * Check that git is installed and >= 2.20.
   *
   * @returns the installed version
   * @throws {GitError} git is missing or too old
   */
  verifyGitVersion(): Promise<string>
}
