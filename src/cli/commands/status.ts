/**
 * `storyloom status` command
 *
 * Reports whether git is usable, which project `--project` points at and
 * where workspaces live.
 *
 * Exit codes:
 *   0 - git is installed and new enough
 *   3 - git is missing or older than 2.20
 */

import type { Command } from 'commander'
import { EXIT_SUCCESS, GitError, ValidationError } from '../../core/errors.js'
import { buildJsonOutput } from '../utils/formatting.js'
import { withSession } from '../utils/run.js'
import { globalOptions, type GlobalOptions } from '../utils/session.js'

export interface StatusReport {
  git: { version: string | null; error: string | null }
  project: { root: string; name: string | null; prefix: string | null }
  registeredProjects: number
  workspaceRoot: string
}

export async function runStatus(globals: GlobalOptions, opts: { json: boolean }, version: string): Promise<number> {
  return withSession(globals, async ({ services }) => {
    const report: StatusReport = {
      git: { version: null, error: null },
      project: { root: services.projectRoot, name: null, prefix: null },
      registeredProjects: (await services.projects.list()).length,
      workspaceRoot: services.config.workspace.root,
    }

    let exitCode = EXIT_SUCCESS
    try {
      report.git.version = await services.git.verifyGitVersion()
    } catch (err) {
      if (!(err instanceof GitError)) throw err
      report.git.error = err.message
      exitCode = err.exitCode
    }

    try {
      const { document } = await services.projects.open(services.projectRoot)
      report.project.name = document.name
      report.project.prefix = document.prefix
    } catch (err) {
      // no project yet is a normal state for `status`
      if (!(err instanceof ValidationError)) throw err
    }

    if (opts.json) {
      process.stdout.write(JSON.stringify(buildJsonOutput('status', report, version), null, 2) + '\n')
      return exitCode
    }

    const project =
      report.project.name !== null
        ? `${report.project.name} (prefix ${report.project.prefix ?? '-'}) at ${report.project.root}`
        : `none at ${report.project.root}`
    process.stdout.write(
      [
        `git:        ${report.git.version ?? `unavailable (${report.git.error ?? 'unknown'})`}`,
        `project:    ${project}`,
        `registered: ${String(report.registeredProjects)} project(s)`,
        `workspaces: ${report.workspaceRoot}`,
      ].join('\n') + '\n',
    )
    return exitCode
  })
}

export function registerStatusCommand(program: Command, version = '0.0.0'): void {
  program
    .command('status')
    .description('Check git and show the current project')
    .option('--json', 'Output JSON', false)
    .action(async (opts: { json: boolean }) => {
      process.exitCode = await runStatus(globalOptions(program), opts, version)
    })
}
