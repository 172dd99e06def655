/**
 * WorkspaceProvisionerImpl — clone, branch and scaffold one workspace per
 * story, recording progress so an interrupted run can be resumed.
 *
 * Record transitions:
 *   (none | unprovisioned) → cloning → ready
 *                                    → failed   (GitError, conflict)
 *                                    ↺ cloning  (TimeoutError, killed process)
 *   failed | cloning  → directory removed → cloning → ...
 */

import { readdir, rm } from 'node:fs/promises'
import { join } from 'node:path'
import type { InvocationContext } from '../../core/context.js'
import { BusyError, StateConflictError, TimeoutError, ValidationError } from '../../core/errors.js'
import { redactUrl } from '../../cli/utils/masking.js'
import { hasErrnoCode } from '../../utils/helpers.js'
import { withLock, type LockOptions } from '../../utils/lock.js'
import type { GitRepositoryManager } from '../git/git-repository-manager.js'
import { renderBranchName } from '../git/git-utils.js'
import type { Story, StoryRegistry } from '../story-registry/story-registry.js'
import { assertStoryId } from '../project-registry/project-schema.js'
import { renderScaffold } from './scaffold.js'
import {
  deleteRecord,
  listRecordIds,
  readRecord,
  recordsDir,
  writeRecord,
  type WorkspaceRecord,
} from './workspace-record.js'
import type { ProvisionOptions, WorkspaceProvisioner } from './workspace-provisioner.js'

export interface WorkspaceProvisionerOptions {
  workspaceRoot: string
  /** Directory whose files are rendered into every new workspace */
  templatesDir: string
  projectName: string
  /** Branch new story branches start from; remote HEAD when absent */
  baseBranch?: string
  locks: LockOptions
  git: GitRepositoryManager
  stories: StoryRegistry
}

type PathState = 'missing' | 'empty' | 'occupied'

export class WorkspaceProvisionerImpl implements WorkspaceProvisioner {
  private readonly _options: WorkspaceProvisionerOptions

  constructor(options: WorkspaceProvisionerOptions) {
    this._options = options
  }

  private _workspacePath(storyId: string): string {
    return join(this._options.workspaceRoot, storyId)
  }

  private _lockPath(storyId: string): string {
    return join(recordsDir(this._options.workspaceRoot), storyId)
  }

  // -------------------------------------------------------------------------
  // provision
  // -------------------------------------------------------------------------

  async provision(
    ctx: InvocationContext,
    storyId: string,
    options: ProvisionOptions = {},
  ): Promise<WorkspaceRecord> {
    assertStoryId(storyId)
    const story = await this._options.stories.get(storyId)
    if (story === null) {
      throw new ValidationError(`Story ${storyId} not found`, { storyId })
    }
    const repository = story.repository
    if (repository === undefined) {
      throw new ValidationError(
        `Story ${storyId} has no repository; recreate it with --repo to get a workspace`,
        { storyId },
      )
    }

    const lockOptions: LockOptions = { ...this._options.locks, wait: options.wait ?? true }
    return withLock(this._lockPath(storyId), `workspace ${storyId}`, lockOptions, async () => {
      const { workspaceRoot } = this._options
      const path = this._workspacePath(storyId)
      const previous = await readRecord(workspaceRoot, storyId)

      if (previous?.status === 'ready') {
        ctx.logger.debug({ storyId, path }, 'Workspace already ready')
        return previous
      }

      if (previous?.status === 'failed' || previous?.status === 'cloning') {
        // we hold the lock, so nobody is still cloning into this directory
        ctx.logger.info({ storyId, path, previous: previous.status }, 'Discarding incomplete workspace')
        await rm(path, { recursive: true, force: true })
      } else {
        await this._claimPath(ctx, path, repository.url, options.force === true)
      }

      const branch = renderBranchName(repository.branch_strategy, storyId)
      const cloning: WorkspaceRecord = {
        storyId,
        path,
        remote: repository.url,
        branch,
        status: 'cloning',
        attempts: (previous?.attempts ?? 0) + 1,
        updatedAt: new Date().toISOString(),
      }
      await writeRecord(workspaceRoot, cloning)
      ctx.events.emit('workspace:provisioning', { storyId, path, previous: previous?.status ?? null })

      try {
        await this._populate(ctx, story, path, repository.url, branch)
      } catch (err) {
        if (err instanceof TimeoutError || err instanceof BusyError) {
          ctx.logger.warn({ storyId, path, err: err.message }, 'Provisioning interrupted; record left as cloning')
          throw err
        }
        const message = err instanceof Error ? err.message : String(err)
        await writeRecord(workspaceRoot, {
          ...cloning,
          status: 'failed',
          updatedAt: new Date().toISOString(),
          lastError: message,
        })
        ctx.logger.error({ storyId, path, err: message }, 'Provisioning failed')
        ctx.events.emit('workspace:failed', { storyId, path, error: message })
        throw err
      }

      const ready: WorkspaceRecord = { ...cloning, status: 'ready', updatedAt: new Date().toISOString() }
      await writeRecord(workspaceRoot, ready)
      ctx.logger.info({ storyId, path, branch }, 'Workspace ready')
      ctx.events.emit('workspace:ready', { storyId, path, branch })
      return ready
    })
  }

  /**
   * Make sure the workspace slot is free or already holds this story's
   * clone. Anything else is refused unless `force` is set.
   */
  private async _claimPath(ctx: InvocationContext, path: string, url: string, force: boolean): Promise<void> {
    const state = await pathState(path)
    if (state !== 'occupied') return

    const { git } = this._options
    if ((await git.isWorkTree(path)) && (await git.remoteUrl(path)) === url) {
      ctx.logger.info({ path }, 'Adopting existing clone')
      return
    }

    if (force) {
      ctx.logger.warn({ path }, 'Replacing foreign directory in workspace slot')
      await rm(path, { recursive: true, force: true })
      return
    }

    throw new StateConflictError(
      `${path} already exists and is not a clone of ${redactUrl(url)}`,
      `Move ${path} aside, or run "storyloom workspace provision --force" to replace it`,
      { path },
    )
  }

  private async _populate(
    ctx: InvocationContext,
    story: Story,
    path: string,
    url: string,
    branch: string,
  ): Promise<void> {
    const { git } = this._options
    const outcome = await git.cloneIfAbsent(ctx, url, path)
    // an adopted clone may hold stale remote-tracking refs
    if (outcome === 'present') await git.fetch(ctx, path)
    await git.checkoutOrCreateBranch(ctx, path, branch, this._options.baseBranch)
    const written = await renderScaffold(this._options.templatesDir, path, {
      story_id: story.id,
      title: story.title,
      branch,
      repo_url: redactUrl(url),
      project: this._options.projectName,
    })
    if (written.length > 0) {
      ctx.logger.debug({ storyId: story.id, files: written }, 'Scaffold rendered')
    }
  }

  // -------------------------------------------------------------------------
  // status / teardown / list
  // -------------------------------------------------------------------------

  async status(storyId: string): Promise<WorkspaceRecord | null> {
    assertStoryId(storyId)
    return readRecord(this._options.workspaceRoot, storyId)
  }

  async teardown(ctx: InvocationContext, storyId: string): Promise<boolean> {
    assertStoryId(storyId)
    return withLock(this._lockPath(storyId), `workspace ${storyId}`, this._options.locks, async () => {
      const path = this._workspacePath(storyId)
      const hadDirectory = (await pathState(path)) !== 'missing'
      await rm(path, { recursive: true, force: true })
      const hadRecord = await deleteRecord(this._options.workspaceRoot, storyId)

      if (!hadDirectory && !hadRecord) return false
      ctx.logger.info({ storyId, path }, 'Workspace removed')
      ctx.events.emit('workspace:removed', { storyId, path })
      return true
    })
  }

  async list(): Promise<WorkspaceRecord[]> {
    const records: WorkspaceRecord[] = []
    for (const id of await listRecordIds(this._options.workspaceRoot)) {
      const record = await readRecord(this._options.workspaceRoot, id)
      if (record !== null) records.push(record)
    }
    return records.sort((a, b) => a.storyId.localeCompare(b.storyId))
  }
}

async function pathState(path: string): Promise<PathState> {
  try {
    const entries = await readdir(path)
    return entries.length === 0 ? 'empty' : 'occupied'
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return 'missing'
    // a regular file in the slot
    if (hasErrnoCode(err, 'ENOTDIR')) return 'occupied'
    throw err
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createWorkspaceProvisioner(options: WorkspaceProvisionerOptions): WorkspaceProvisioner {
  return new WorkspaceProvisionerImpl(options)
}
