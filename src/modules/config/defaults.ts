/**
 * Built-in default values for the storyloom configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → workspace config → environment → CLI flags
 */

import { join } from 'node:path'
import type { StoryloomConfig, KanbanConfig, GitConfig, LocksConfig } from './config-schema.js'

export const DEFAULT_STAGES: readonly string[] = ['planning', 'in-progress', 'testing', 'pr', 'complete']

export const DEFAULT_KANBAN: KanbanConfig = {
  stages: [...DEFAULT_STAGES],
  initial_stage: 'planning',
  conflict_policy: 'repair',
}

export const DEFAULT_BRANCH_TEMPLATE = 'story/{id}'

export const DEFAULT_GIT: GitConfig = {
  clone_retry_count: 3,
  retry_base_delay_ms: 500,
  network_timeout_seconds: 300,
}

export const DEFAULT_LOCKS: LocksConfig = {
  timeout_seconds: 30,
  stale_seconds: 60,
}

/**
 * Full default config document. The workspace root lives under the global
 * directory so that story ids, unique per installation, never collide there.
 */
export function createDefaultConfig(globalDir: string): StoryloomConfig {
  return {
    config_format_version: '1',
    kanban: { ...DEFAULT_KANBAN, stages: [...DEFAULT_KANBAN.stages] },
    workspace: {
      root: join(globalDir, 'workspaces'),
      branch_template: DEFAULT_BRANCH_TEMPLATE,
    },
    git: { ...DEFAULT_GIT },
    locks: { ...DEFAULT_LOCKS },
    cli: { non_interactive: false },
  }
}
