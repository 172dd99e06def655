/**
 * Interactive prompts. Every prompt is skipped when the invocation is not
 * interactive: stdin is not a TTY, or `cli.non_interactive` is set
 * (STORYLOOM_NON_INTERACTIVE=1).
 */

import * as readline from 'node:readline'

/** Answer source; tests substitute a canned one */
export type Prompter = (question: string) => Promise<string>

export const readlinePrompter: Prompter = (question) =>
  new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stderr,
    })

    rl.question(question, (answer) => {
      rl.close()
      resolve(answer)
    })
  })

/**
 * Ask a yes/no question.
 * Returns true if the user confirms (y/yes), false otherwise.
 */
export async function confirm(question: string, prompter: Prompter = readlinePrompter): Promise<boolean> {
  const normalised = (await prompter(`${question} [y/N] `)).trim().toLowerCase()
  return normalised === 'y' || normalised === 'yes'
}

export function isInteractive(nonInteractive: boolean, isTTY: boolean = process.stdin.isTTY === true): boolean {
  return !nonInteractive && isTTY
}
