/**
 * git-utils.ts — Low-level git command helpers.
 *
 * All git commands are executed via child_process.spawn; nothing here
 * re-implements git.
 *
 * Functions:
 *  - spawnGit: Execute git with given args, returns stdout/stderr/code/timedOut
 *  - getGitVersion: Returns version string like "2.42.0"
 *  - isGitVersionSupported: Checks the version against MIN_GIT_VERSION with semver
 *  - isTransientGitFailure: Classifies stderr of a failed network operation
 *  - renderBranchName: Expands the branch template for a story id
 */

import { spawn } from 'node:child_process'
import * as semver from 'semver'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SpawnOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Kill the process after this many milliseconds */
  timeoutMs?: number
}

export interface GitSpawnResult {
  stdout: string
  stderr: string
  code: number
  /** true when the process was killed by the timeout */
  timedOut: boolean
}

/** Anything that runs git; spawnGit in production, a fake in tests */
export type GitRunner = (args: string[], options?: SpawnOptions) => Promise<GitSpawnResult>

/** Oldest git with the checkout and fetch behaviour relied on */
export const MIN_GIT_VERSION = '2.20'

// ---------------------------------------------------------------------------
// spawnGit
// ---------------------------------------------------------------------------

/**
 * Spawn a git subprocess with the given args.
 *
 * Terminal prompts are disabled so a remote asking for credentials fails
 * instead of hanging the invocation.
 *
 * @param args    - Arguments to pass to git (e.g., ['clone', url, dir])
 * @param options - Optional spawn options (cwd, env, timeoutMs)
 */
export const spawnGit: GitRunner = (args, options) => {
  return new Promise((resolve) => {
    const proc = spawn('git', args, {
      cwd: options?.cwd,
      env: { ...(options?.env ?? process.env), GIT_TERMINAL_PROMPT: '0' },
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let timedOut = false
    let settled = false

    const timer =
      options?.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true
            proc.kill('SIGKILL')
          }, options.timeoutMs)
        : undefined

    const settle = (result: GitSpawnResult): void => {
      if (settled) return
      settled = true
      if (timer !== undefined) clearTimeout(timer)
      resolve(result)
    }

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    proc.on('close', (code) => {
      settle({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1, timedOut })
    })

    proc.on('error', (err) => {
      settle({ stdout: '', stderr: err.message, code: 1, timedOut })
    })
  })
}

// ---------------------------------------------------------------------------
// Version checks
// ---------------------------------------------------------------------------

/**
 * Get the installed git version string.
 *
 * @returns Version string like "2.42.0", or null when git cannot be run
 *          or its output cannot be parsed
 */
export async function getGitVersion(run: GitRunner = spawnGit): Promise<string | null> {
  const result = await run(['--version'])
  if (result.code !== 0) return null

  // Output is like: "git version 2.42.0"
  const match = /git version\s+(\d+\.\d+(?:\.\d+)?)/.exec(result.stdout)
  return match?.[1] ?? null
}

/**
 * Check if the given git version string is >= 2.20.0.
 */
export function isGitVersionSupported(version: string): boolean {
  const parsed = semver.coerce(version)
  return parsed !== null && semver.gte(parsed, `${MIN_GIT_VERSION}.0`)
}

// ---------------------------------------------------------------------------
// Failure classification
// ---------------------------------------------------------------------------

/** stderr fragments of network failures worth retrying */
const TRANSIENT_PATTERNS: readonly RegExp[] = [
  /connection reset/i,
  /timed out/i,
  /could not resolve host/i,
  /failed to connect/i,
  /remote end hung up/i,
  /early eof/i,
]

/** stderr fragments that are never retried even if a transient pattern matches */
const PERMANENT_PATTERNS: readonly RegExp[] = [
  /authentication failed/i,
  /permission denied/i,
  /could not read username/i,
  /repository .*not found/i,
]

/**
 * Decide whether a failed network operation is worth retrying.
 * Authentication failures and missing repositories never are.
 */
export function isTransientGitFailure(stderr: string): boolean {
  if (PERMANENT_PATTERNS.some((p) => p.test(stderr))) return false
  return TRANSIENT_PATTERNS.some((p) => p.test(stderr))
}

// ---------------------------------------------------------------------------
// Branch naming
// ---------------------------------------------------------------------------

/**
 * Expand a branch template for a story id.
 *
 * @example
 * renderBranchName('story/{id}', 'filte-12')          // 'story/filte-12'
 * renderBranchName('{prefix}/task-{number}', 'api-3') // 'api/task-3'
 */
export function renderBranchName(template: string, storyId: string): string {
  const dash = storyId.lastIndexOf('-')
  const prefix = dash === -1 ? storyId : storyId.slice(0, dash)
  const number = dash === -1 ? '' : storyId.slice(dash + 1)
  return template
    .replaceAll('{id}', storyId)
    .replaceAll('{prefix}', prefix)
    .replaceAll('{number}', number)
}
