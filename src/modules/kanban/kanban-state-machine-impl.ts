/**
 * KanbanStateMachineImpl — stage membership as symbolic links.
 *
 * A move runs under the story's lock:
 *   1. write the intent file (.locks/<id>.intent)
 *   2. symlink to a temp name inside the target stage, rename into place
 *   3. verify the new link resolves to the canonical story file
 *   4. unlink the old stage link
 *   5. remove the intent file
 *
 * A process killed between 2 and 4 leaves two links and an intent file;
 * the next currentStage() keeps the intent's target. Without an intent the
 * newest link wins, and on an mtime tie the later configured stage.
 */

import type { Stats } from 'node:fs'
import { lstat, mkdir, readFile, readdir, readlink, realpath, rename, symlink, unlink } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import { z } from 'zod'
import type { InvocationContext } from '../../core/context.js'
import type { KanbanProblem } from '../../core/event-bus.types.js'
import { StateConflictError, ValidationError } from '../../core/errors.js'
import type { ConflictPolicy } from '../config/config-schema.js'
import { writeFileAtomic } from '../../utils/atomic-write.js'
import { hasErrnoCode } from '../../utils/helpers.js'
import { withLock, type LockOptions } from '../../utils/lock.js'
import { kanbanDir, locksDir } from '../project-registry/project-registry-impl.js'
import { assertStoryId, isValidStoryId, parseStoryId } from '../project-registry/project-schema.js'
import type { Story, StoryRegistry } from '../story-registry/story-registry.js'
import type {
  KanbanStateMachine,
  StageListing,
  StageLookup,
  TransitionIntent,
  TransitionResult,
} from './kanban-state-machine.js'

const TransitionIntentSchema = z.object({
  storyId: z.string(),
  from: z.string().nullable(),
  to: z.string(),
  startedAt: z.string(),
})

/** What one stage entry turned out to be; `gone` when it vanished mid-read */
type EntryState = { kind: 'healthy'; story: Story } | { kind: 'gone' } | { kind: 'problem'; problem: KanbanProblem }

interface FoundLink {
  stage: string
  mtimeNs: bigint
}

export interface KanbanStateMachineOptions {
  /** Project root */
  root: string
  stages: readonly string[]
  conflictPolicy: ConflictPolicy
  locks: LockOptions
  stories: StoryRegistry
}

/** Link target, relative to `kanban/<stage>/` */
export function linkTarget(id: string): string {
  return `../../stories/${id}.md`
}

export class KanbanStateMachineImpl implements KanbanStateMachine {
  readonly stages: readonly string[]
  private readonly _root: string
  private readonly _policy: ConflictPolicy
  private readonly _locks: LockOptions
  private readonly _stories: StoryRegistry

  constructor(options: KanbanStateMachineOptions) {
    this.stages = options.stages
    this._root = options.root
    this._policy = options.conflictPolicy
    this._locks = options.locks
    this._stories = options.stories
  }

  // -------------------------------------------------------------------------
  // Paths
  // -------------------------------------------------------------------------

  private _linkPath(stage: string, id: string): string {
    return join(kanbanDir(this._root), stage, id)
  }

  private _lockPath(id: string): string {
    return join(locksDir(this._root), id)
  }

  private _intentPath(id: string): string {
    return join(locksDir(this._root), `${id}.intent`)
  }

  private _withStoryLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
    return withLock(this._lockPath(id), `story ${id}`, this._locks, fn)
  }

  // -------------------------------------------------------------------------
  // currentStage
  // -------------------------------------------------------------------------

  async currentStage(ctx: InvocationContext, id: string): Promise<StageLookup> {
    assertStoryId(id)
    if (!(await this._stories.exists(id))) return { status: 'not-found' }

    const links = await this._findLinks(id)
    if (links.length === 0) return { status: 'unstaged' }
    if (links.length === 1 && links[0] !== undefined) {
      return { status: 'staged', stage: links[0].stage, repaired: false }
    }

    this._assertRepairAllowed(id, links)
    return this._withStoryLock(id, async () => {
      const resolved = await this._resolveLocked(ctx, id)
      return resolved.stage === null
        ? { status: 'unstaged' }
        : { status: 'staged', stage: resolved.stage, repaired: resolved.repaired }
    })
  }

  /**
   * Current stage while holding the story lock, collapsing duplicate links
   * to one.
   */
  private async _resolveLocked(
    ctx: InvocationContext,
    id: string,
  ): Promise<{ stage: string | null; repaired: boolean }> {
    const links = await this._findLinks(id)
    const only = links.length === 1 ? links[0] : undefined
    if (links.length === 0) return { stage: null, repaired: false }
    if (only !== undefined) return { stage: only.stage, repaired: false }

    this._assertRepairAllowed(id, links)

    const intent = await this._readIntent(id)
    const kept = this._chooseSurvivor(links, intent)
    const removed = links.filter((l) => l.stage !== kept).map((l) => l.stage)
    for (const stage of removed) {
      await unlinkIfPresent(this._linkPath(stage, id))
    }
    await unlinkIfPresent(this._intentPath(id))

    ctx.logger.warn({ storyId: id, kept, removed, intent: intent?.to ?? null }, 'Repaired duplicate stage links')
    ctx.events.emit('kanban:repaired', { storyId: id, kept, removed })
    return { stage: kept, repaired: true }
  }

  private _assertRepairAllowed(id: string, links: FoundLink[]): void {
    if (this._policy === 'repair') return
    const stages = links.map((l) => l.stage)
    throw new StateConflictError(
      `Story ${id} is linked from more than one stage: ${stages.join(', ')}`,
      `Remove all but one of: ${stages.map((s) => `kanban/${s}/${id}`).join(', ')}`,
      { storyId: id, stages },
    )
  }

  /** intent target, else newest link, else the later configured stage */
  private _chooseSurvivor(links: FoundLink[], intent: TransitionIntent | null): string {
    if (intent !== null && links.some((l) => l.stage === intent.to)) {
      return intent.to
    }
    const order = (stage: string): number => this.stages.indexOf(stage)
    const [best] = [...links].sort((a, b) => {
      if (a.mtimeNs !== b.mtimeNs) return a.mtimeNs > b.mtimeNs ? -1 : 1
      return order(b.stage) - order(a.stage)
    })
    // links is never empty here
    return best?.stage ?? ''
  }

  // -------------------------------------------------------------------------
  // transition
  // -------------------------------------------------------------------------

  async transition(
    ctx: InvocationContext,
    id: string,
    toStage: string,
    fromStage?: string,
  ): Promise<TransitionResult> {
    assertStoryId(id)
    this._assertStage(toStage)
    if (fromStage !== undefined) this._assertStage(fromStage)

    return this._withStoryLock(id, async () => {
      if (!(await this._stories.exists(id))) {
        throw new ValidationError(`Story ${id} not found`, { storyId: id })
      }

      const { stage: current } = await this._resolveLocked(ctx, id)

      if (fromStage !== undefined && current !== fromStage) {
        throw new StateConflictError(
          `Story ${id} is in ${current ?? 'no stage'}, not ${fromStage}`,
          `Check the stage with "storyloom story show ${id}", then move it without --from`,
          { storyId: id, expected: fromStage, actual: current },
        )
      }

      if (current === toStage) {
        await unlinkIfPresent(this._intentPath(id))
        ctx.logger.debug({ storyId: id, stage: toStage }, 'Story already in target stage')
        return { storyId: id, from: current, to: toStage, changed: false }
      }

      const intent: TransitionIntent = {
        storyId: id,
        from: current,
        to: toStage,
        startedAt: new Date().toISOString(),
      }
      await writeFileAtomic(this._intentPath(id), JSON.stringify(intent, null, 2))

      const linkPath = this._linkPath(toStage, id)
      const stageDir = dirname(linkPath)
      await mkdir(stageDir, { recursive: true })
      await this._removeTempLinks(stageDir, id)

      const tempPath = join(stageDir, `.${id}.${String(process.pid)}.${Math.random().toString(36).slice(2)}.tmp`)
      await symlink(linkTarget(id), tempPath)
      await rename(tempPath, linkPath)

      await this._verifyLink(linkPath, id)

      if (current !== null) {
        await unlinkIfPresent(this._linkPath(current, id))
      }
      await unlinkIfPresent(this._intentPath(id))

      ctx.logger.info({ storyId: id, from: current, to: toStage }, 'Story moved')
      ctx.events.emit('story:moved', { storyId: id, from: current, to: toStage })
      return { storyId: id, from: current, to: toStage, changed: true }
    })
  }

  private async _verifyLink(linkPath: string, id: string): Promise<void> {
    const canonical = this._stories.pathOf(id)
    let resolved: string | null = null
    try {
      resolved = await realpath(linkPath)
    } catch (err) {
      if (!hasErrnoCode(err, 'ENOENT')) throw err
    }
    if (resolved !== null && resolved === (await realpath(canonical))) return

    await unlinkIfPresent(linkPath)
    await unlinkIfPresent(this._intentPath(id))
    throw new StateConflictError(
      `New link ${linkPath} does not resolve to ${canonical}`,
      `Check that ${dirname(canonical)} is not itself a symbolic link, then move the story again`,
      { storyId: id, linkPath },
    )
  }

  /** Temp links left by a move that died before its rename */
  private async _removeTempLinks(stageDir: string, id: string): Promise<void> {
    const names = await readdir(stageDir)
    for (const name of names) {
      if (name.startsWith(`.${id}.`) && name.endsWith('.tmp')) {
        await unlinkIfPresent(join(stageDir, name))
      }
    }
  }

  // -------------------------------------------------------------------------
  // Listing
  // -------------------------------------------------------------------------

  async listStage(ctx: InvocationContext, stage: string): Promise<StageListing> {
    this._assertStage(stage)
    const stageDir = join(kanbanDir(this._root), stage)

    let names: string[]
    try {
      names = await readdir(stageDir)
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return { stage, stories: [], problems: [] }
      throw err
    }

    const stories: Story[] = []
    const problems: KanbanProblem[] = []

    for (const entry of names) {
      if (entry.startsWith('.')) continue
      const state = await this._inspectEntry(stage, stageDir, entry)
      if (state.kind === 'healthy') {
        stories.push(state.story)
      } else if (state.kind === 'problem') {
        problems.push(state.problem)
        ctx.logger.warn({ ...state.problem }, 'Skipping corrupt kanban entry')
        ctx.events.emit('kanban:corruption', state.problem)
      }
    }

    stories.sort((a, b) => (parseStoryId(a.id)?.number ?? 0) - (parseStoryId(b.id)?.number ?? 0))
    return { stage, stories, problems }
  }

  async board(ctx: InvocationContext): Promise<StageListing[]> {
    const listings: StageListing[] = []
    for (const stage of this.stages) {
      listings.push(await this.listStage(ctx, stage))
    }
    return listings
  }

  private async _inspectEntry(stage: string, stageDir: string, entry: string): Promise<EntryState> {
    const entryPath = join(stageDir, entry)
    const problem = (kind: KanbanProblem['kind'], detail: string): EntryState => ({
      kind: 'problem',
      problem: { stage, entry, kind, detail },
    })

    if (!isValidStoryId(entry)) {
      return problem('invalid-name', `${entryPath} is not named after a story id`)
    }

    const info = await lstatIfPresent(entryPath)
    if (info === null) return { kind: 'gone' }
    if (!info.isSymbolicLink()) {
      return problem('not-a-link', `${entryPath} is not a symbolic link`)
    }

    const target = await readlinkIfPresent(entryPath)
    if (target === null) return { kind: 'gone' }
    if (resolve(stageDir, target) !== resolve(this._stories.pathOf(entry))) {
      return problem('foreign-target', `${entryPath} points to ${target}`)
    }

    let story: Story | null
    try {
      story = await this._stories.get(entry)
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err
      return problem('unreadable-story', err.message)
    }
    if (story !== null) return { kind: 'healthy', story }

    // no story file: a dangling link, unless the link went away as well
    if ((await lstatIfPresent(entryPath)) === null) return { kind: 'gone' }
    return problem('dangling-link', `${entryPath} points to a missing story file`)
  }

  // -------------------------------------------------------------------------
  // unlink
  // -------------------------------------------------------------------------

  async unlink(ctx: InvocationContext, id: string): Promise<string[]> {
    assertStoryId(id)
    return this._withStoryLock(id, async () => {
      const links = await this._findLinks(id)
      for (const link of links) {
        await unlinkIfPresent(this._linkPath(link.stage, id))
      }
      await unlinkIfPresent(this._intentPath(id))
      const stages = links.map((l) => l.stage)
      if (stages.length > 0) {
        ctx.logger.info({ storyId: id, stages }, 'Story unlinked from board')
      }
      return stages
    })
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _assertStage(stage: string): void {
    if (!this.stages.includes(stage)) {
      throw new ValidationError(`Unknown stage "${stage}"; configured stages: ${this.stages.join(', ')}`, {
        stage,
      })
    }
  }

  /** Every configured stage holding a symbolic link named after the story */
  private async _findLinks(id: string): Promise<FoundLink[]> {
    const found: FoundLink[] = []
    for (const stage of this.stages) {
      try {
        const info = await lstat(this._linkPath(stage, id), { bigint: true })
        if (info.isSymbolicLink()) found.push({ stage, mtimeNs: info.mtimeNs })
      } catch (err) {
        if (!hasErrnoCode(err, 'ENOENT')) throw err
      }
    }
    return found
  }

  private async _readIntent(id: string): Promise<TransitionIntent | null> {
    let raw: string
    try {
      raw = await readFile(this._intentPath(id), 'utf-8')
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return null
      throw err
    }
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      // a torn intent file carries no usable target
      return null
    }
    const result = TransitionIntentSchema.safeParse(parsed)
    return result.success ? result.data : null
  }
}

async function lstatIfPresent(path: string): Promise<Stats | null> {
  try {
    return await lstat(path)
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return null
    throw err
  }
}

async function readlinkIfPresent(path: string): Promise<string | null> {
  try {
    return await readlink(path)
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return null
    throw err
  }
}

async function unlinkIfPresent(path: string): Promise<void> {
  try {
    await unlink(path)
  } catch (err) {
    if (!hasErrnoCode(err, 'ENOENT')) throw err
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createKanbanStateMachine(options: KanbanStateMachineOptions): KanbanStateMachine {
  return new KanbanStateMachineImpl(options)
}
