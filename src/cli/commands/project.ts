/**
 * `storyloom project` command group
 *
 * Subcommands:
 *   - `storyloom project create [dir]`   — create a project (default dir: --project)
 *   - `storyloom project info`           — show project metadata and stage counts
 *   - `storyloom project delete [dir]`   — delete a project; with stories only under --force
 *
 * Exit codes:
 *   0 - Success
 *   1 - Validation error (prefix already used, project exists, stories remain, bad config)
 *   4 - Installation registry locked by another invocation
 */

import type { Command } from 'commander'
import { basename, dirname, resolve } from 'node:path'
import { EXIT_SUCCESS, ValidationError } from '../../core/errors.js'
import { executeCommand } from '../../modules/pipeline/execute-command.js'
import type { ProjectRemote } from '../../modules/project-registry/project-schema.js'
import { formatFailure } from '../utils/formatting.js'
import { confirm, isInteractive, readlinePrompter, type Prompter } from '../utils/prompt.js'
import { printResult, withSession } from '../utils/run.js'
import { globalOptions, type GlobalOptions } from '../utils/session.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

/**
 * Parse `--remote` values: `name=url`, or a bare URL named `origin` for the
 * first one and `remote<n>` after that.
 */
export function parseRemotes(values: string[]): ProjectRemote[] {
  const remotes: ProjectRemote[] = []
  for (const value of values) {
    const match = /^([A-Za-z0-9_.-]+)=(.+)$/.exec(value)
    const name = match?.[1] ?? (remotes.length === 0 ? 'origin' : `remote${String(remotes.length + 1)}`)
    const url = match?.[2] ?? value
    if (remotes.some((r) => r.name === name)) {
      throw new ValidationError(`Remote "${name}" given more than once`, { name })
    }
    remotes.push({ name, url })
  }
  return remotes
}

/**
 * Default project name: the directory holding the project root when the
 * root itself is a dot-directory (`app/.storyloom` → `app`).
 */
export function defaultProjectName(root: string): string {
  const abs = resolve(root)
  const own = basename(abs)
  return own.startsWith('.') ? basename(dirname(abs)) : own
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export interface ProjectCreateOptions {
  name?: string
  prefix?: string
  remote: string[]
  maintainer: string[]
  json: boolean
}

export async function runProjectCreate(
  globals: GlobalOptions,
  dir: string | undefined,
  opts: ProjectCreateOptions,
  version: string,
): Promise<number> {
  const root = resolve(dir ?? globals.project)
  return withSession(
    globals,
    async ({ services, ctx }) => {
      let remotes: ProjectRemote[]
      try {
        remotes = parseRemotes(opts.remote)
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err
        process.stderr.write(formatFailure({ step: 'parse-arguments', error: err }))
        return err.exitCode
      }

      const result = await executeCommand(services, ctx, {
        kind: 'project.create',
        name: opts.name ?? defaultProjectName(root),
        ...(opts.prefix !== undefined ? { prefix: opts.prefix } : {}),
        remotes,
        maintainers: opts.maintainer,
      })
      return printResult('project create', result, { json: opts.json, version })
    },
    root,
  )
}

export async function runProjectInfo(
  globals: GlobalOptions,
  opts: { json: boolean },
  version: string,
): Promise<number> {
  return withSession(globals, async ({ services, ctx }) => {
    const result = await executeCommand(services, ctx, { kind: 'project.info' })
    return printResult('project info', result, { json: opts.json, version })
  })
}

export interface ProjectDeleteOptions {
  force: boolean
  json: boolean
  /** Overrides process.stdin.isTTY */
  isTTY?: boolean
  prompter?: Prompter
}

export async function runProjectDelete(
  globals: GlobalOptions,
  dir: string | undefined,
  opts: ProjectDeleteOptions,
  version: string,
): Promise<number> {
  const root = resolve(dir ?? globals.project)
  return withSession(
    globals,
    async ({ services, ctx, config }) => {
      if (!opts.force && isInteractive(config.cli.non_interactive, opts.isTTY)) {
        const confirmed = await confirm(`Delete the project at ${root}?`, opts.prompter ?? readlinePrompter)
        if (!confirmed) {
          process.stdout.write('Aborted\n')
          return EXIT_SUCCESS
        }
      }

      const result = await executeCommand(services, ctx, { kind: 'project.delete', force: opts.force })
      return printResult('project delete', result, { json: opts.json, version })
    },
    root,
  )
}

// ---------------------------------------------------------------------------
// registerProjectCommand
// ---------------------------------------------------------------------------

export function registerProjectCommand(program: Command, version = '0.0.0'): void {
  const project = program.command('project').description('Create and inspect projects')

  project
    .command('create [dir]')
    .description('Create a project (dir defaults to --project)')
    .option('--name <name>', 'Project name (default: derived from the directory)')
    .option('--prefix <prefix>', 'Story id prefix (default: derived from the name)')
    .option('--remote <url>', 'Remote repository, as url or name=url (repeatable)', collect, [])
    .option('--maintainer <name>', 'Maintainer (repeatable)', collect, [])
    .option('--json', 'Output JSON', false)
    .action(async (dir: string | undefined, opts: ProjectCreateOptions) => {
      process.exitCode = await runProjectCreate(globalOptions(program), dir, opts, version)
    })

  project
    .command('info')
    .description('Show project metadata and stage counts')
    .option('--json', 'Output JSON', false)
    .action(async (opts: { json: boolean }) => {
      process.exitCode = await runProjectInfo(globalOptions(program), opts, version)
    })

  project
    .command('delete [dir]')
    .description('Delete a project (dir defaults to --project)')
    .option('--force', 'Delete even when the project has stories, without asking', false)
    .option('--json', 'Output JSON', false)
    .action(async (dir: string | undefined, opts: ProjectDeleteOptions) => {
      process.exitCode = await runProjectDelete(globalOptions(program), dir, opts, version)
    })
}
