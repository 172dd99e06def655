/**
 * `storyloom story` command group
 *
 * Subcommands:
 *   - `storyloom story create <title>`   — create a story, optionally with a workspace
 *   - `storyloom story move <id> <stage>` — move a story between stages
 *   - `storyloom story list`             — list the board
 *   - `storyloom story show <id>`        — show a story, its stage and workspace
 *   - `storyloom story delete <id>`      — delete a story (asks first when interactive)
 */

import type { Command } from 'commander'
import { EXIT_SUCCESS } from '../../core/errors.js'
import { executeCommand } from '../../modules/pipeline/execute-command.js'
import { confirm, isInteractive, readlinePrompter, type Prompter } from '../utils/prompt.js'
import { printResult, withSession } from '../utils/run.js'
import { globalOptions, type GlobalOptions } from '../utils/session.js'

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export interface StoryCreateOptions {
  description?: string
  repo?: string
  branchStrategy?: string
  stage?: string
  json: boolean
}

export async function runStoryCreate(
  globals: GlobalOptions,
  title: string,
  opts: StoryCreateOptions,
  version: string,
): Promise<number> {
  return withSession(globals, async ({ services, ctx }) => {
    const result = await executeCommand(services, ctx, {
      kind: 'story.create',
      title,
      ...(opts.description !== undefined ? { description: opts.description } : {}),
      ...(opts.repo !== undefined ? { repo: opts.repo } : {}),
      ...(opts.branchStrategy !== undefined ? { branchStrategy: opts.branchStrategy } : {}),
      ...(opts.stage !== undefined ? { stage: opts.stage } : {}),
    })
    return printResult('story create', result, { json: opts.json, version })
  })
}

export async function runStoryMove(
  globals: GlobalOptions,
  id: string,
  stage: string,
  opts: { from?: string; json: boolean },
  version: string,
): Promise<number> {
  return withSession(globals, async ({ services, ctx }) => {
    const result = await executeCommand(services, ctx, {
      kind: 'story.move',
      id,
      to: stage,
      ...(opts.from !== undefined ? { from: opts.from } : {}),
    })
    return printResult('story move', result, { json: opts.json, version })
  })
}

export async function runStoryList(
  globals: GlobalOptions,
  opts: { stage?: string; json: boolean },
  version: string,
): Promise<number> {
  return withSession(globals, async ({ services, ctx }) => {
    const result = await executeCommand(services, ctx, {
      kind: 'story.list',
      ...(opts.stage !== undefined ? { stage: opts.stage } : {}),
    })
    return printResult('story list', result, { json: opts.json, version })
  })
}

export async function runStoryShow(
  globals: GlobalOptions,
  id: string,
  opts: { json: boolean },
  version: string,
): Promise<number> {
  return withSession(globals, async ({ services, ctx }) => {
    const result = await executeCommand(services, ctx, { kind: 'story.show', id })
    return printResult('story show', result, { json: opts.json, version })
  })
}

export interface StoryDeleteOptions {
  force: boolean
  json: boolean
  /** Override stdin TTY detection (tests) */
  isTTY?: boolean
  prompter?: Prompter
}

/**
 * Delete a story. Without `--force` an interactive invocation asks first;
 * a non-interactive one proceeds.
 */
export async function runStoryDelete(
  globals: GlobalOptions,
  id: string,
  opts: StoryDeleteOptions,
  version: string,
): Promise<number> {
  return withSession(globals, async ({ services, ctx, config }) => {
    if (!opts.force && isInteractive(config.cli.non_interactive, opts.isTTY)) {
      const confirmed = await confirm(
        `Delete story ${id} and its workspace?`,
        opts.prompter ?? readlinePrompter,
      )
      if (!confirmed) {
        process.stdout.write('Aborted\n')
        return EXIT_SUCCESS
      }
    }

    const result = await executeCommand(services, ctx, { kind: 'story.delete', id })
    return printResult('story delete', result, { json: opts.json, version })
  })
}

// ---------------------------------------------------------------------------
// registerStoryCommand
// ---------------------------------------------------------------------------

export function registerStoryCommand(program: Command, version = '0.0.0'): void {
  const story = program.command('story').description('Create, move and inspect stories')

  story
    .command('create <title>')
    .description('Create a story in the initial stage')
    .option('--description <text>', 'Story description')
    .option('--repo <repo>', 'Repository URL or project remote name')
    .option('--branch-strategy <template>', 'Branch template, e.g. story/{id}')
    .option('--stage <stage>', 'Stage to enter instead of the initial one')
    .option('--json', 'Output JSON', false)
    .action(async (title: string, opts: StoryCreateOptions) => {
      process.exitCode = await runStoryCreate(globalOptions(program), title, opts, version)
    })

  story
    .command('move <id> <stage>')
    .description('Move a story to a stage')
    .option('--from <stage>', 'Only move when the story is currently in this stage')
    .option('--json', 'Output JSON', false)
    .action(async (id: string, stage: string, opts: { from?: string; json: boolean }) => {
      process.exitCode = await runStoryMove(globalOptions(program), id, stage, opts, version)
    })

  story
    .command('list')
    .description('List stories by stage')
    .option('--stage <stage>', 'Only this stage')
    .option('--json', 'Output JSON', false)
    .action(async (opts: { stage?: string; json: boolean }) => {
      process.exitCode = await runStoryList(globalOptions(program), opts, version)
    })

  story
    .command('show <id>')
    .description('Show a story with its stage and workspace')
    .option('--json', 'Output JSON', false)
    .action(async (id: string, opts: { json: boolean }) => {
      process.exitCode = await runStoryShow(globalOptions(program), id, opts, version)
    })

  story
    .command('delete <id>')
    .description('Delete a story, its stage link and its workspace')
    .option('--force', 'Do not ask for confirmation', false)
    .option('--json', 'Output JSON', false)
    .action(async (id: string, opts: { force: boolean; json: boolean }) => {
      process.exitCode = await runStoryDelete(globalOptions(program), id, opts, version)
    })
}
