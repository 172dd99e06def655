#!/usr/bin/env node
/**
 * storyloom CLI - Main entry point
 */

import { createLogger } from '../utils/logger.js'
import { createProgram } from './program.js'

const logger = createLogger('cli')

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`)
    process.exitCode = 1
  }
}

void main()
