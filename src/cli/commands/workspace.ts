/**
 * `storyloom workspace` command group
 *
 * Subcommands:
 *   - `storyloom workspace provision <id>` — clone and check out the story branch
 *   - `storyloom workspace status <id>`    — show the workspace record
 *   - `storyloom workspace teardown <id>`  — remove the working tree and record
 *
 * Exit codes:
 *   0 - Success
 *   1 - Validation error (no repository, malformed id)
 *   2 - State conflict (foreign directory, diverged branch)
 *   3 - Git failure
 *   4 - Workspace locked by another invocation, or git timed out
 */

import type { Command } from 'commander'
import { BusyError, GitError, type StoryloomError } from '../../core/errors.js'
import { executeCommand } from '../../modules/pipeline/execute-command.js'
import { formatFailure } from '../utils/formatting.js'
import { confirm, isInteractive, readlinePrompter, type Prompter } from '../utils/prompt.js'
import { printResult, withSession } from '../utils/run.js'
import { globalOptions, type GlobalOptions } from '../utils/session.js'

/** Failures worth offering a second attempt for */
export function isRetryable(error: StoryloomError): boolean {
  return error instanceof BusyError || (error instanceof GitError && error.transient)
}

export interface WorkspaceProvisionOptions {
  force: boolean
  /** false with `--no-wait`: fail at once when the workspace is locked */
  wait: boolean
  json: boolean
  /** Override stdin TTY detection (tests) */
  isTTY?: boolean
  prompter?: Prompter
}

export async function runWorkspaceProvision(
  globals: GlobalOptions,
  id: string,
  opts: WorkspaceProvisionOptions,
  version: string,
): Promise<number> {
  return withSession(globals, async ({ services, ctx, config }) => {
    const provision = () =>
      executeCommand(services, ctx, { kind: 'workspace.provision', id, force: opts.force, wait: opts.wait })

    let result = await provision()
    if (!result.ok && isRetryable(result.error.error) && isInteractive(config.cli.non_interactive, opts.isTTY)) {
      process.stderr.write(formatFailure(result.error))
      if (await confirm('Retry provisioning?', opts.prompter ?? readlinePrompter)) {
        result = await provision()
      } else {
        return result.error.error.exitCode
      }
    }
    return printResult('workspace provision', result, { json: opts.json, version })
  })
}

export async function runWorkspaceStatus(
  globals: GlobalOptions,
  id: string,
  opts: { json: boolean },
  version: string,
): Promise<number> {
  return withSession(globals, async ({ services, ctx }) => {
    const result = await executeCommand(services, ctx, { kind: 'workspace.status', id })
    return printResult('workspace status', result, { json: opts.json, version })
  })
}

export async function runWorkspaceTeardown(
  globals: GlobalOptions,
  id: string,
  opts: { json: boolean },
  version: string,
): Promise<number> {
  return withSession(globals, async ({ services, ctx }) => {
    const result = await executeCommand(services, ctx, { kind: 'workspace.teardown', id })
    return printResult('workspace teardown', result, { json: opts.json, version })
  })
}

// ---------------------------------------------------------------------------
// registerWorkspaceCommand
// ---------------------------------------------------------------------------

export function registerWorkspaceCommand(program: Command, version = '0.0.0'): void {
  const workspace = program.command('workspace').description('Manage per-story git workspaces')

  workspace
    .command('provision <id>')
    .description('Clone the story repository and check out its branch')
    .option('--force', 'Replace a directory that is not this story\'s clone', false)
    .option('--no-wait', 'Fail immediately when the workspace is locked')
    .option('--json', 'Output JSON', false)
    .action(async (id: string, opts: { force: boolean; wait: boolean; json: boolean }) => {
      process.exitCode = await runWorkspaceProvision(globalOptions(program), id, opts, version)
    })

  workspace
    .command('status <id>')
    .description('Show the workspace record of a story')
    .option('--json', 'Output JSON', false)
    .action(async (id: string, opts: { json: boolean }) => {
      process.exitCode = await runWorkspaceStatus(globalOptions(program), id, opts, version)
    })

  workspace
    .command('teardown <id>')
    .description('Remove the working tree and record of a story')
    .option('--json', 'Output JSON', false)
    .action(async (id: string, opts: { json: boolean }) => {
      process.exitCode = await runWorkspaceTeardown(globalOptions(program), id, opts, version)
    })
}
