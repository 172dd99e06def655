/**
 * StoryloomEvents interface — defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "story:moved", "workspace:ready")
 * Payloads are defined inline with JSDoc for each event.
 */

import type { WorkspaceStatus } from '../modules/workspace/workspace-record.js'

/** A problem found while reading the board; reported, never thrown */
export interface KanbanProblem {
  stage: string
  entry: string
  kind: 'dangling-link' | 'not-a-link' | 'foreign-target' | 'invalid-name' | 'unreadable-story'
  detail: string
}

/**
 * Complete typed map of all events emitted on the invocation event bus.
 * Use `keyof StoryloomEvents` to constrain event keys.
 */
export interface StoryloomEvents {
  // -------------------------------------------------------------------------
  // Story lifecycle
  // -------------------------------------------------------------------------

  /** A canonical story file was written */
  'story:created': { storyId: string; title: string }

  /** A story and all of its links were removed */
  'story:deleted': { storyId: string; stages: string[] }

  /** A story link moved between stages (from is null on first placement) */
  'story:moved': { storyId: string; from: string | null; to: string }

  // -------------------------------------------------------------------------
  // Projects
  // -------------------------------------------------------------------------

  /** A project tree was removed and its prefix released */
  'project:deleted': { root: string; prefix: string; storyFiles: number }

  // -------------------------------------------------------------------------
  // Board consistency
  // -------------------------------------------------------------------------

  /** Duplicate links were collapsed to one */
  'kanban:repaired': { storyId: string; kept: string; removed: string[] }

  /** A listing skipped a corrupt entry */
  'kanban:corruption': KanbanProblem

  // -------------------------------------------------------------------------
  // Workspaces
  // -------------------------------------------------------------------------

  'workspace:provisioning': { storyId: string; path: string; previous: WorkspaceStatus | null }

  'workspace:ready': { storyId: string; path: string; branch: string }

  'workspace:failed': { storyId: string; path: string; error: string }

  'workspace:removed': { storyId: string; path: string }

  // -------------------------------------------------------------------------
  // Git
  // -------------------------------------------------------------------------

  /** A transient git failure is about to be retried */
  'git:retry': { operation: string; attempt: number; delayMs: number; stderr: string }
}
