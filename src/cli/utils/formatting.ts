/**
 * CLI output formatting utilities
 *
 * Renders command outputs as human-readable text or as the JSON envelope
 * used by every `--json` flag, and formats pipeline failures for stderr.
 * Remote URLs are redacted in everything produced here.
 */

import { StateConflictError } from '../../core/errors.js'
import type { CommandOutput } from '../../modules/pipeline/commands.js'
import type { PipelineFailure } from '../../modules/pipeline/pipeline.js'
import type { StageListing, StageLookup } from '../../modules/kanban/kanban-state-machine.js'
import type { WorkspaceRecord } from '../../modules/workspace/workspace-record.js'
import { deepMask, redactUrl } from './masking.js'

/**
 * Format a table from an array of row objects.
 *
 * Computes column widths from headers + data, then renders aligned columns
 * separated by ` | ` with a header separator row.
 *
 * @param headers - Column header names (in order)
 * @param rows    - Array of row objects (values indexed by key)
 * @param keys    - Object keys to read from each row (in column order)
 * @returns Formatted string ready for console output
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  // Compute column widths as max of header and data lengths
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => {
      const val = row[key] ?? ''
      return Math.max(max, val.length)
    }, 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ').trimEnd()

  const dataRows = rows.map((row) =>
    keys.map((key, i) => {
      const val = row[key] ?? ''
      return val.padEnd(widths[i] ?? val.length)
    }).join(' | ').trimEnd()
  )

  return [headerRow, separator, ...dataRows].join('\n')
}

// ---------------------------------------------------------------------------
// JSON envelope
// ---------------------------------------------------------------------------

/**
 * CLIJsonOutput wrapper type for machine-consumable JSON responses.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  /** storyloom version string */
  version: string
  /** The CLI command that was executed */
  command: string
  /** The actual data payload, credentials masked */
  data: T
}

/**
 * Build a CLIJsonOutput wrapper around data.
 */
export function buildJsonOutput(command: string, data: unknown, version: string): CLIJsonOutput<unknown> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data: deepMask(data),
  }
}

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

/**
 * `Error in <step>: <message>`, followed by the repair suggestion when the
 * failure is a state conflict and the pipeline's hint when it left one.
 */
export function formatFailure(failure: PipelineFailure): string {
  const lines = [`Error in ${failure.step}: ${failure.error.message}`]
  if (failure.error instanceof StateConflictError) {
    lines.push(`  Repair: ${failure.error.repair}`)
  }
  if (failure.hint !== undefined) {
    lines.push(`  Next: ${failure.hint}`)
  }
  return lines.join('\n') + '\n'
}

/** Corrupt board entries found while listing, one warning line each */
export function formatProblems(stages: StageListing[]): string {
  return stages
    .flatMap((listing) => listing.problems)
    .map((p) => `Warning: kanban/${p.stage}/${p.entry}: ${p.detail} (${p.kind})\n`)
    .join('')
}

// ---------------------------------------------------------------------------
// Human-readable output
// ---------------------------------------------------------------------------

function describeStage(lookup: StageLookup): string {
  switch (lookup.status) {
    case 'staged':
      return lookup.repaired ? `${lookup.stage} (duplicate links repaired)` : lookup.stage
    case 'unstaged':
      return 'unstaged'
    case 'not-found':
      return 'not found'
  }
}

function describeWorkspace(record: WorkspaceRecord): string[] {
  const lines = [
    `  Status:   ${record.status}`,
    `  Path:     ${record.path}`,
    `  Remote:   ${redactUrl(record.remote)}`,
    `  Branch:   ${record.branch}`,
    `  Attempts: ${String(record.attempts)}`,
    `  Updated:  ${record.updatedAt}`,
  ]
  if (record.lastError !== undefined) {
    lines.push(`  Error:    ${record.lastError}`)
  }
  return lines
}

/** Render a successful command's output for a terminal */
export function renderCommandOutput(output: CommandOutput): string {
  const lines: string[] = []

  switch (output.kind) {
    case 'story.create': {
      lines.push(`Created ${output.story.id} "${output.story.title}" in ${output.stage}`)
      if (output.workspace !== null) {
        lines.push(`Workspace ready at ${output.workspace.path} on branch ${output.workspace.branch}`)
      }
      break
    }
    case 'story.move': {
      const { storyId, from, to, changed } = output.transition
      if (!changed) lines.push(`${storyId} is already in ${to}`)
      else if (from === null) lines.push(`Moved ${storyId} to ${to}`)
      else lines.push(`Moved ${storyId} from ${from} to ${to}`)
      break
    }
    case 'story.list': {
      const rows = output.stages.map((listing) => ({
        stage: listing.stage,
        count: String(listing.stories.length),
      }))
      lines.push(formatTable(['Stage', 'Count'], rows, ['stage', 'count']))
      const single = output.stages.length === 1
      const stories = output.stages.flatMap((listing) =>
        listing.stories.map((story) => `${story.id}: ${story.title}${single ? '' : ` [${listing.stage}]`}`),
      )
      if (stories.length > 0) lines.push('', ...stories)
      break
    }
    case 'story.show': {
      const { story } = output
      lines.push(`${story.id}: ${story.title}`)
      lines.push(`  Stage:      ${describeStage(output.stage)}`)
      lines.push(`  Created:    ${story.createdAt}`)
      if (story.repository !== undefined) {
        lines.push(`  Repository: ${redactUrl(story.repository.url)} (${story.repository.branch_strategy})`)
      }
      lines.push(`  File:       ${story.path}`)
      lines.push(output.workspace !== null ? 'Workspace:' : 'Workspace: none')
      if (output.workspace !== null) lines.push(...describeWorkspace(output.workspace))
      lines.push('', story.body.trimEnd())
      break
    }
    case 'story.delete': {
      const unlinked = output.stages.length > 0 ? `unlinked from ${output.stages.join(', ')}` : 'not on the board'
      const workspace = output.workspaceRemoved ? 'workspace removed' : 'no workspace'
      lines.push(`Deleted ${output.storyId} (${unlinked}; ${workspace})`)
      break
    }
    case 'workspace.provision': {
      const { record } = output
      lines.push(`Workspace for ${record.storyId} is ready at ${record.path} on branch ${record.branch}`)
      break
    }
    case 'workspace.status': {
      if (output.record === null) {
        lines.push(`No workspace for ${output.storyId}`)
      } else {
        lines.push(`Workspace for ${output.storyId}:`, ...describeWorkspace(output.record))
      }
      break
    }
    case 'workspace.teardown': {
      lines.push(
        output.removed ? `Removed workspace of ${output.storyId}` : `No workspace to remove for ${output.storyId}`,
      )
      break
    }
    case 'project.create': {
      const { document, root } = output.project
      lines.push(`Created project ${document.name} (prefix ${document.prefix}) at ${root}`)
      break
    }
    case 'project.info': {
      const s = output.summary
      lines.push(`Project:     ${s.name}`)
      lines.push(`Prefix:      ${s.prefix}`)
      lines.push(`Root:        ${s.root}`)
      lines.push(`Created:     ${s.createdAt}`)
      lines.push(`Remotes:     ${s.remotes.length > 0 ? s.remotes.map((r) => `${r.name}=${redactUrl(r.url)}`).join(', ') : '-'}`)
      lines.push(`Maintainers: ${s.maintainers.length > 0 ? s.maintainers.join(', ') : '-'}`)
      lines.push(`Stories:     ${String(s.totalStories)} (next id ${s.nextStoryId})`)
      lines.push('')
      lines.push(
        formatTable(
          ['Stage', 'Count'],
          s.stageCounts.map((c) => ({ stage: c.stage, count: String(c.count) })),
          ['stage', 'count'],
        ),
      )
      break
    }
    case 'project.delete': {
      const { project, workspacesRemoved } = output
      const stories = project.storyFiles === 1 ? '1 story' : `${String(project.storyFiles)} stories`
      lines.push(`Deleted project ${project.name} (prefix ${project.prefix}) at ${project.root} with ${stories}`)
      if (workspacesRemoved.length > 0) {
        lines.push(`Removed workspaces: ${workspacesRemoved.join(', ')}`)
      }
      break
    }
  }

  return lines.join('\n') + '\n'
}
