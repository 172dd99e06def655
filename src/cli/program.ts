/**
 * storyloom CLI program definition
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { hasErrnoCode } from '../utils/helpers.js'
import { registerConfigCommand } from './commands/config.js'
import { registerProjectCommand } from './commands/project.js'
import { registerStatusCommand } from './commands/status.js'
import { registerStoryCommand } from './commands/story.js'
import { registerWorkspaceCommand } from './commands/workspace.js'

/** Default `--project`: a dot-directory in the current working directory */
export const DEFAULT_PROJECT_DIR = './.storyloom'

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string() })

/** Resolve the package version relative to this file (src/ or dist/) */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    let raw: string
    try {
      raw = await readFile(pkgPath, 'utf-8')
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) continue
      throw err
    }
    const parsed = PackageJsonSchema.safeParse(JSON.parse(raw))
    if (parsed.success && parsed.data.name === 'storyloom') return parsed.data.version
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(version?: string): Promise<Command> {
  const resolvedVersion = version ?? (await getPackageVersion())

  const program = new Command()

  program
    .name('storyloom')
    .description('storyloom - filesystem kanban with per-story git workspaces')
    .version(resolvedVersion, '-v, --version', 'Output the current version')
    .option('--project <dir>', 'Project root', DEFAULT_PROJECT_DIR)

  registerProjectCommand(program, resolvedVersion)
  registerStoryCommand(program, resolvedVersion)
  registerWorkspaceCommand(program, resolvedVersion)
  registerConfigCommand(program)
  registerStatusCommand(program, resolvedVersion)

  return program
}
