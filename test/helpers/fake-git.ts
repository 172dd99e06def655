/**
 * In-process stand-in for the git CLI.
 *
 * Understands the handful of commands GitRepositoryManagerImpl issues and
 * keeps remotes and clones in memory. `clone` also creates the target
 * directory on disk so filesystem checks behave as with a real clone.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import type { GitRunner, GitSpawnResult, SpawnOptions } from '../../src/modules/git/git-utils.js'

interface FakeRemote {
  head: string
  branches: Map<string, string>
}

interface FakeClone {
  origin: string
  current: string
  local: Map<string, string>
  remote: Map<string, string>
}

export interface FakeGitCall {
  args: string[]
  cwd: string | undefined
}

const OK: GitSpawnResult = { stdout: '', stderr: '', code: 0, timedOut: false }

function fail(stderr: string, code = 128): GitSpawnResult {
  return { stdout: '', stderr, code, timedOut: false }
}

export class FakeGit {
  readonly calls: FakeGitCall[] = []
  version = '2.43.0'
  /** Delay applied to clone, to widen race windows in tests */
  cloneDelayMs = 0

  private readonly _remotes = new Map<string, FakeRemote>()
  private readonly _clones = new Map<string, FakeClone>()
  private readonly _parents = new Map<string, string | null>()
  private readonly _scripted: Array<{ command: string; result: GitSpawnResult }> = []

  /** Register a reachable remote whose default branch holds one commit */
  addRemote(url: string, head = 'main', sha = 'c0'): void {
    this._parents.set(sha, null)
    this._remotes.set(url, { head, branches: new Map([[head, sha]]) })
  }

  /** Add a commit on top of `parent` and point `branch` of the remote at it */
  commitOnRemote(url: string, branch: string, sha: string, parent: string): void {
    this._parents.set(sha, parent)
    this._remotes.get(url)?.branches.set(branch, sha)
  }

  /** Add a commit on a local branch of a clone */
  commitInClone(dir: string, branch: string, sha: string, parent: string): void {
    this._parents.set(sha, parent)
    this._clones.get(resolve(dir))?.local.set(branch, sha)
  }

  /** Point a local branch of a clone at an existing commit */
  setLocalBranch(dir: string, branch: string, sha: string): void {
    this._clones.get(resolve(dir))?.local.set(branch, sha)
  }

  /** Make a clone see the current state of its remote, as a fetch would */
  syncClone(dir: string): void {
    const clone = this._clones.get(resolve(dir))
    const remote = clone !== undefined ? this._remotes.get(clone.origin) : undefined
    if (clone !== undefined && remote !== undefined) {
      clone.remote = new Map(remote.branches)
    }
  }

  /** Answer the next invocation of `command` (first arg) with `result` */
  scriptNext(command: string, result: Partial<GitSpawnResult>): void {
    this._scripted.push({ command, result: { ...OK, ...result } })
  }

  currentBranch(dir: string): string | undefined {
    return this._clones.get(resolve(dir))?.current
  }

  localSha(dir: string, branch: string): string | undefined {
    return this._clones.get(resolve(dir))?.local.get(branch)
  }

  commandCount(command: string): number {
    return this.calls.filter((c) => c.args[0] === command).length
  }

  readonly runner: GitRunner = async (args: string[], options?: SpawnOptions) => {
    this.calls.push({ args, cwd: options?.cwd })
    const command = args[0] ?? ''

    const scriptedIndex = this._scripted.findIndex((s) => s.command === command)
    if (scriptedIndex !== -1) {
      const [scripted] = this._scripted.splice(scriptedIndex, 1)
      if (scripted !== undefined) return scripted.result
    }

    switch (command) {
      case '--version':
        return { ...OK, stdout: `git version ${this.version}` }
      case 'clone':
        return this._clone(args)
      case 'fetch':
        return this._fetch(options?.cwd)
      case 'rev-parse':
        return this._revParse(args, options?.cwd)
      case 'config':
        return this._config(options?.cwd)
      case 'merge-base':
        return this._mergeBase(args)
      case 'checkout':
        return this._checkout(args, options?.cwd)
      case 'merge':
        return this._merge(args, options?.cwd)
      default:
        return fail(`fake git: unsupported command ${command}`, 1)
    }
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  private async _clone(args: string[]): Promise<GitSpawnResult> {
    const url = args[2]
    const dir = args[3]
    if (url === undefined || dir === undefined) return fail('usage: git clone -- <url> <dir>', 129)
    const remote = this._remotes.get(url)
    if (remote === undefined) {
      return fail(`remote: Repository not found.\nfatal: repository '${url}' not found`)
    }
    if (this.cloneDelayMs > 0) {
      await new Promise((r) => setTimeout(r, this.cloneDelayMs))
    }
    await mkdir(join(dir, '.git'), { recursive: true })
    await writeFile(join(dir, '.git', 'HEAD'), `ref: refs/heads/${remote.head}\n`)
    const headSha = remote.branches.get(remote.head) ?? 'c0'
    this._clones.set(resolve(dir), {
      origin: url,
      current: remote.head,
      local: new Map([[remote.head, headSha]]),
      remote: new Map(remote.branches),
    })
    return OK
  }

  private _fetch(cwd: string | undefined): GitSpawnResult {
    const clone = this._cloneAt(cwd)
    if (clone === undefined) return fail('fatal: not a git repository')
    this.syncClone(cwd ?? '')
    return OK
  }

  private _revParse(args: string[], cwd: string | undefined): GitSpawnResult {
    const clone = this._cloneAt(cwd)
    if (clone === undefined) return fail('fatal: not a git repository (or any of the parent directories): .git')
    if (args[1] === '--show-toplevel') return { ...OK, stdout: resolve(cwd ?? '') }

    const ref = args[args.length - 1] ?? ''
    const sha = ref.startsWith('refs/heads/')
      ? clone.local.get(ref.slice('refs/heads/'.length))
      : ref.startsWith('refs/remotes/origin/')
        ? clone.remote.get(ref.slice('refs/remotes/origin/'.length))
        : undefined
    return sha !== undefined ? { ...OK, stdout: sha } : fail('', 1)
  }

  private _config(cwd: string | undefined): GitSpawnResult {
    const clone = this._cloneAt(cwd)
    return clone !== undefined ? { ...OK, stdout: clone.origin } : fail('', 1)
  }

  private _mergeBase(args: string[]): GitSpawnResult {
    const ancestor = args[2]
    let cursor: string | null | undefined = args[3]
    while (cursor !== null && cursor !== undefined) {
      if (cursor === ancestor) return OK
      cursor = this._parents.get(cursor)
    }
    return fail('', 1)
  }

  private _checkout(args: string[], cwd: string | undefined): GitSpawnResult {
    const clone = this._cloneAt(cwd)
    if (clone === undefined) return fail('fatal: not a git repository')

    const createIndex = args.indexOf('-b')
    if (createIndex === -1) {
      const branch = args[1] ?? ''
      if (!clone.local.has(branch)) return fail(`error: pathspec '${branch}' did not match`, 1)
      clone.current = branch
      return OK
    }

    const branch = args[createIndex + 1] ?? ''
    const startPoint = args[args.length - 1] ?? ''
    const remoteName = startPoint.replace(/^origin\//, '')
    const remote = this._remotes.get(clone.origin)
    const resolvedName = remoteName === 'HEAD' ? (remote?.head ?? 'main') : remoteName
    const sha = clone.remote.get(resolvedName)
    if (sha === undefined) return fail(`fatal: '${startPoint}' is not a commit`)
    clone.local.set(branch, sha)
    clone.current = branch
    return OK
  }

  private _merge(args: string[], cwd: string | undefined): GitSpawnResult {
    const clone = this._cloneAt(cwd)
    if (clone === undefined) return fail('fatal: not a git repository')
    const source = (args[args.length - 1] ?? '').replace(/^origin\//, '')
    const sha = clone.remote.get(source)
    if (sha === undefined) return fail('merge: not something we can merge', 1)
    clone.local.set(clone.current, sha)
    return OK
  }

  private _cloneAt(cwd: string | undefined): FakeClone | undefined {
    return cwd !== undefined ? this._clones.get(resolve(cwd)) : undefined
  }
}
