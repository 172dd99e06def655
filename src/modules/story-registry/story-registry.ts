/**
 * StoryRegistry — interface and types for canonical story files.
 *
 * The registry owns `<project-root>/stories/<id>.md`. It never touches
 * kanban links; deleting a story goes through the state machine first.
 *
 * Implementation: StoryRegistryImpl (story-registry-impl.ts)
 */

import type { InvocationContext } from '../../core/context.js'
import type { StoryRepository } from './story-format.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Story {
  id: string
  title: string
  createdAt: string
  description: string | undefined
  repository: StoryRepository | undefined
  /** Absolute path of the canonical file */
  path: string
  /** Markdown after the front matter */
  body: string
}

export interface CreateStoryInput {
  id: string
  title: string
  description?: string
  repository?: StoryRepository
}

// ---------------------------------------------------------------------------
// StoryRegistry interface
// ---------------------------------------------------------------------------

export interface StoryRegistry {
  /** Project root the registry reads from */
  readonly root: string

  /**
   * Reserve the next story id (`<prefix>-<n>`) under the project lock.
   *
   * @throws {BusyError} the project lock is held past the lock timeout
   */
  allocateId(ctx: InvocationContext): Promise<string>

  /**
   * Write the canonical file.
   *
   * @throws {ValidationError} invalid id, or a story with this id exists
   */
  create(ctx: InvocationContext, input: CreateStoryInput): Promise<Story>

  /** The story, or null when there is no canonical file */
  get(id: string): Promise<Story | null>

  exists(id: string): Promise<boolean>

  /** Path of the canonical file, whether or not it exists */
  pathOf(id: string): string

  /**
   * Every readable story, ordered by number. Files that do not parse are
   * skipped with a warning on `ctx.logger`.
   */
  list(ctx: InvocationContext): Promise<Story[]>

  /**
   * Delete the canonical file.
   *
   * @returns false when there was nothing to delete
   */
  remove(ctx: InvocationContext, id: string): Promise<boolean>
}
