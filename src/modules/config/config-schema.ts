/**
 * Zod validation schemas for the storyloom configuration system.
 *
 * Defines schemas for all config sections:
 *  - kanban stages and conflict policy
 *  - workspace root and branch naming
 *  - git retry / timeout settings
 *  - lock timing
 *  - CLI behaviour
 *  - full config document and its partial (per-layer) form
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Kanban
// ---------------------------------------------------------------------------

/** Stage names become directory names, so they are restricted to a safe alphabet */
export const StageNameSchema = z
  .string()
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'stage names are lowercase letters, digits, "-" or "_"')

/** What currentStage() does when a story is linked from more than one stage */
export const ConflictPolicySchema = z.enum(['repair', 'fail'])
export type ConflictPolicy = z.infer<typeof ConflictPolicySchema>

export const KanbanConfigSchema = z
  .object({
    /** Ordered list of stage names */
    stages: z
      .array(StageNameSchema)
      .min(1)
      .refine((stages) => new Set(stages).size === stages.length, 'stage names must be unique'),
    /** Stage a newly created story enters */
    initial_stage: StageNameSchema,
    conflict_policy: ConflictPolicySchema,
  })
  .strict()
  .refine((k) => k.stages.includes(k.initial_stage), {
    message: 'initial_stage must be one of stages',
    path: ['initial_stage'],
  })

export type KanbanConfig = z.infer<typeof KanbanConfigSchema>

// ---------------------------------------------------------------------------
// Workspace
// ---------------------------------------------------------------------------

export const WorkspaceConfigSchema = z
  .object({
    /** Directory holding one working tree per story */
    root: z.string().min(1),
    /** Branch name template; tokens: {id}, {prefix}, {number} */
    branch_template: z.string().includes('{id}', { message: 'branch_template must contain {id}' }),
    /** Branch new story branches start from; remote HEAD when absent */
    base_branch: z.string().min(1).optional(),
  })
  .strict()

export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>

// ---------------------------------------------------------------------------
// Git
// ---------------------------------------------------------------------------

export const GitConfigSchema = z
  .object({
    /** Extra attempts after a transient clone/fetch failure */
    clone_retry_count: z.number().int().min(0).max(10),
    retry_base_delay_ms: z.number().int().min(0),
    /** Wall-clock limit for one network operation (clone, fetch) */
    network_timeout_seconds: z.number().positive(),
  })
  .strict()

export type GitConfig = z.infer<typeof GitConfigSchema>

// ---------------------------------------------------------------------------
// Locks
// ---------------------------------------------------------------------------

export const LocksConfigSchema = z
  .object({
    timeout_seconds: z.number().min(0),
    stale_seconds: z.number().min(2),
  })
  .strict()

export type LocksConfig = z.infer<typeof LocksConfigSchema>

// ---------------------------------------------------------------------------
// CLI
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const CliConfigSchema = z
  .object({
    /** Disables every interactive prompt (retry, delete confirmation) */
    non_interactive: z.boolean(),
    log_level: LogLevelSchema.optional(),
  })
  .strict()

export type CliConfig = z.infer<typeof CliConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const StoryloomConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    kanban: KanbanConfigSchema,
    workspace: WorkspaceConfigSchema,
    git: GitConfigSchema,
    locks: LocksConfigSchema,
    cli: CliConfigSchema,
  })
  .strict()

export type StoryloomConfig = z.infer<typeof StoryloomConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (one layer, before merging)
// ---------------------------------------------------------------------------

export const PartialStoryloomConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    kanban: z
      .object({
        stages: z.array(StageNameSchema).min(1),
        initial_stage: StageNameSchema,
        conflict_policy: ConflictPolicySchema,
      })
      .strict()
      .partial()
      .optional(),
    workspace: WorkspaceConfigSchema.partial().optional(),
    git: GitConfigSchema.partial().optional(),
    locks: LocksConfigSchema.partial().optional(),
    cli: CliConfigSchema.partial().optional(),
  })
  .strict()

export type PartialStoryloomConfig = z.infer<typeof PartialStoryloomConfigSchema>
