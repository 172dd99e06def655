/**
 * KanbanStateMachine — interface and types for stage membership.
 *
 * A story is in stage S exactly when `<project-root>/kanban/S/<id>` is a
 * relative symbolic link to `../../stories/<id>.md`. The state machine is
 * the only component that creates or removes those links.
 *
 * Implementation: KanbanStateMachineImpl (kanban-state-machine-impl.ts)
 */

import type { InvocationContext } from '../../core/context.js'
import type { KanbanProblem } from '../../core/event-bus.types.js'
import type { Story } from '../story-registry/story-registry.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StageLookup =
  | { status: 'staged'; stage: string; repaired: boolean }
  | { status: 'unstaged' }
  | { status: 'not-found' }

export interface StageListing {
  stage: string
  /** Stories with a healthy link and a readable file, ordered by number */
  stories: Story[]
  problems: KanbanProblem[]
}

export interface TransitionResult {
  storyId: string
  from: string | null
  to: string
  /** false when the story already was in the target stage */
  changed: boolean
}

/** Contents of `<project-root>/.locks/<id>.intent` while a move is in flight */
export interface TransitionIntent {
  storyId: string
  from: string | null
  to: string
  startedAt: string
}

// ---------------------------------------------------------------------------
// KanbanStateMachine interface
// ---------------------------------------------------------------------------

export interface KanbanStateMachine {
  /** Configured stages, in order */
  readonly stages: readonly string[]

  /**
   * Stage of a story, derived from its links.
   *
   * A story linked from several stages is repaired down to one link under
   * the `repair` policy.
   *
   * @throws {StateConflictError} several links under the `fail` policy
   * @throws {BusyError} repair needed but the story lock is held
   */
  currentStage(ctx: InvocationContext, id: string): Promise<StageLookup>

  /**
   * Move a story into `toStage`. Moving a story to the stage it is already
   * in succeeds without touching the filesystem.
   *
   * @throws {ValidationError} unknown stage or story
   * @throws {StateConflictError} `fromStage` given and the story is elsewhere
   * @throws {BusyError} the story lock is held past the lock timeout
   */
  transition(
    ctx: InvocationContext,
    id: string,
    toStage: string,
    fromStage?: string,
  ): Promise<TransitionResult>

  /**
   * Stories linked from one stage. Takes no lock; corrupt entries are
   * reported in `problems` and emitted as `kanban:corruption`. An entry
   * removed by a concurrent move while the stage is read is left out.
   *
   * @throws {ValidationError} unknown stage
   */
  listStage(ctx: InvocationContext, stage: string): Promise<StageListing>

  /** listStage() for every configured stage, in order */
  board(ctx: InvocationContext): Promise<StageListing[]>

  /**
   * Remove every link of a story.
   *
   * @returns the stages links were removed from
   */
  unlink(ctx: InvocationContext, id: string): Promise<string[]>
}
