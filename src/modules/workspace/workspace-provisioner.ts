/**
 * WorkspaceProvisioner — interface and types for per-story git workspaces.
 *
 * Responsible for:
 *  - Cloning the story repository into `<workspace-root>/<id>` and checking
 *    out the story branch
 *  - Rendering project scaffold files into the new workspace
 *  - Persisting a WorkspaceRecord that says how far provisioning got
 *  - Tearing workspaces down
 *
 * Provisioning of one story is serialised by a lock; provisioning of
 * different stories runs in parallel.
 *
 * Implementation: WorkspaceProvisionerImpl (workspace-provisioner-impl.ts)
 */

import type { InvocationContext } from '../../core/context.js'
import type { WorkspaceRecord } from './workspace-record.js'

export interface ProvisionOptions {
  /** Replace a directory in the workspace slot that is not this story's clone */
  force?: boolean
  /** false: fail with BusyError at once when another invocation holds the lock */
  wait?: boolean
}

export interface WorkspaceProvisioner {
  /**
   * Bring the story workspace to `ready`. A workspace that already is
   * `ready` is returned unchanged without running git.
   *
   * @throws {ValidationError} unknown story, or a story without repository
   * @throws {BusyError} the workspace lock is held past the lock timeout
   * @throws {StateConflictError} the workspace path holds something else
   * @throws {BranchConflictError} the story branch diverged from origin
   * @throws {GitError} clone or checkout failed; the record says `failed`
   * @throws {TimeoutError} clone exceeded the network timeout; the record says `cloning`
   */
  provision(ctx: InvocationContext, storyId: string, options?: ProvisionOptions): Promise<WorkspaceRecord>

  /** The story's record, or null when none exists */
  status(storyId: string): Promise<WorkspaceRecord | null>

  /**
   * Remove the working tree and the record. Idempotent.
   *
   * @returns false when there was nothing to remove
   */
  teardown(ctx: InvocationContext, storyId: string): Promise<boolean>

  /** Every record under the workspace root */
  list(): Promise<WorkspaceRecord[]>
}
