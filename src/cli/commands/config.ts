/**
 * `storyloom config` command group
 *
 * Subcommands:
 *   - `storyloom config show`       — display merged config (URLs redacted)
 *   - `storyloom config get <key>`  — read one dot-notation key
 */

import { InvalidArgumentError, type Command } from 'commander'
import yaml from 'js-yaml'
import { EXIT_SUCCESS, EXIT_VALIDATION } from '../../core/errors.js'
import { deepMask } from '../utils/masking.js'
import { withSession } from '../utils/run.js'
import { globalOptions, type GlobalOptions } from '../utils/session.js'

export type ConfigFormat = 'yaml' | 'json'

function render(value: unknown, format: ConfigFormat): string {
  if (format === 'json') return JSON.stringify(value, null, 2) + '\n'
  if (value === null || typeof value !== 'object') return `${String(value)}\n`
  return yaml.dump(value)
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export async function runConfigShow(globals: GlobalOptions, opts: { format: ConfigFormat }): Promise<number> {
  return withSession(globals, async ({ configSystem }) => {
    const masked = configSystem.getMasked()

    if (opts.format === 'json') {
      process.stdout.write(render(masked, 'json'))
      return EXIT_SUCCESS
    }

    const layers = configSystem.sources.map((s) => (s.path !== undefined ? `${s.layer} (${s.path})` : s.layer))
    process.stdout.write('# storyloom configuration (credentials masked)\n')
    process.stdout.write(`# layers: ${layers.join(' < ')}\n\n`)
    process.stdout.write(render(masked, 'yaml'))
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(
  globals: GlobalOptions,
  key: string,
  opts: { format: ConfigFormat },
): Promise<number> {
  return withSession(globals, async ({ configSystem }) => {
    const value = configSystem.get(key)
    if (value === undefined) {
      process.stderr.write(`Unknown config key "${key}"\n`)
      return EXIT_VALIDATION
    }
    process.stdout.write(render(deepMask(value), opts.format))
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// registerConfigCommand
// ---------------------------------------------------------------------------

function parseFormat(value: string): ConfigFormat {
  if (value !== 'yaml' && value !== 'json') {
    throw new InvalidArgumentError('Expected yaml or json.')
  }
  return value
}

export function registerConfigCommand(program: Command): void {
  const config = program.command('config').description('Inspect the merged configuration')

  config
    .command('show')
    .description('Show the merged configuration')
    .option('--format <format>', 'yaml or json', parseFormat, 'yaml')
    .action(async (opts: { format: ConfigFormat }) => {
      process.exitCode = await runConfigShow(globalOptions(program), opts)
    })

  config
    .command('get <key>')
    .description('Show one value by dot-notation key (e.g. kanban.stages)')
    .option('--format <format>', 'yaml or json', parseFormat, 'yaml')
    .action(async (key: string, opts: { format: ConfigFormat }) => {
      process.exitCode = await runConfigGet(globalOptions(program), key, opts)
    })
}
