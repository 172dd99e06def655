/**
 * Shared plumbing for command actions: open a session, execute an intent,
 * print the outcome and map it to an exit code.
 */

import { EXIT_SUCCESS, toStoryloomError } from '../../core/errors.js'
import type { CommandOutput } from '../../modules/pipeline/commands.js'
import type { PipelineResult } from '../../modules/pipeline/pipeline.js'
import { buildJsonOutput, formatFailure, formatProblems, renderCommandOutput } from './formatting.js'
import { openSession, type CliSession, type GlobalOptions } from './session.js'

export interface OutputOptions {
  json: boolean
  version: string
}

/**
 * Open a session and hand it to `fn`. A configuration error is printed as
 * a failure of the `load-config` step.
 */
export async function withSession(
  globals: GlobalOptions,
  fn: (session: CliSession) => Promise<number>,
  projectRoot?: string,
): Promise<number> {
  let session: CliSession
  try {
    session = await openSession(globals, projectRoot)
  } catch (err) {
    const error = toStoryloomError(err)
    process.stderr.write(formatFailure({ step: 'load-config', error }))
    return error.exitCode
  }
  return fn(session)
}

/** Print a command result; returns the exit code it maps to */
export function printResult(
  command: string,
  result: PipelineResult<CommandOutput>,
  options: OutputOptions,
): number {
  if (!result.ok) {
    process.stderr.write(formatFailure(result.error))
    return result.error.error.exitCode
  }

  const output = result.value
  if (options.json) {
    process.stdout.write(JSON.stringify(buildJsonOutput(command, output, options.version), null, 2) + '\n')
  } else {
    process.stdout.write(renderCommandOutput(output))
  }
  if (output.kind === 'story.list') {
    process.stderr.write(formatProblems(output.stages))
  }
  return EXIT_SUCCESS
}
