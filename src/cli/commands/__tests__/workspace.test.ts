/**
 * Tests for the `storyloom workspace` command group, including the retry
 * prompt offered after a transient failure.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import { runProjectCreate } from '../project.js'
import { runStoryCreate } from '../story.js'
import { isRetryable, runWorkspaceProvision, runWorkspaceStatus, runWorkspaceTeardown } from '../workspace.js'
import { captureOutput, createCliFixture, REMOTE, VERSION, type CapturedOutput, type CliFixture } from '../../../../test/helpers/cli.js'
import { BusyError, GitError, ValidationError } from '../../../core/errors.js'

const UNREACHABLE =
  "fatal: unable to access 'https://example.com/org/widget.git/': Could not resolve host: example.com"
const FAILURE_LINE = `Error in provision-workspace: git clone failed: ${UNREACHABLE}\n`

let fx: CliFixture
let out: CapturedOutput

/** Create widge-1 bound to REMOTE whose first clone fails transiently */
async function createFailedStory(): Promise<void> {
  fx.git.scriptNext('clone', { code: 128, stderr: UNREACHABLE })
  await runStoryCreate(fx.globals, 'Flaky', { repo: 'origin', json: false }, VERSION)
  out.restore()
  out = captureOutput()
}

beforeEach(async () => {
  fx = await createCliFixture()
  out = captureOutput()
  await runProjectCreate(fx.globals, undefined, { remote: [REMOTE], maintainer: [], json: false }, VERSION)
  out.restore()
  out = captureOutput()
})

afterEach(async () => {
  out.restore()
  await rm(fx.testDir, { recursive: true, force: true })
})

describe('isRetryable', () => {
  it('accepts busy and transient git failures only', () => {
    const gitError = (transient: boolean): GitError =>
      new GitError('git clone failed', { operation: 'clone', exitCode: 128, stderr: '', transient })

    expect(isRetryable(new BusyError('workspace widge-1', 5000))).toBe(true)
    expect(isRetryable(gitError(true))).toBe(true)
    expect(isRetryable(gitError(false))).toBe(false)
    expect(isRetryable(new ValidationError('bad'))).toBe(false)
  })
})

describe('runWorkspaceProvision', () => {
  it('retries once when the prompt is accepted', async () => {
    await createFailedStory()
    fx.git.scriptNext('clone', { code: 128, stderr: UNREACHABLE })
    const questions: string[] = []

    const code = await runWorkspaceProvision(
      fx.globals,
      'widge-1',
      {
        force: false,
        wait: true,
        json: false,
        isTTY: true,
        prompter: async (q) => {
          questions.push(q)
          return 'y'
        },
      },
      VERSION,
    )

    expect(code).toBe(0)
    expect(questions).toEqual(['Retry provisioning? [y/N] '])
    expect(out.stderr()).toBe(FAILURE_LINE)
    expect(out.stdout()).toBe(
      `Workspace for widge-1 is ready at ${join(fx.home, 'workspaces', 'widge-1')} on branch story/widge-1\n`,
    )
  })

  it('exits 3 when the retry is declined', async () => {
    await createFailedStory()
    fx.git.scriptNext('clone', { code: 128, stderr: UNREACHABLE })

    const code = await runWorkspaceProvision(
      fx.globals,
      'widge-1',
      { force: false, wait: true, json: false, isTTY: true, prompter: async () => '' },
      VERSION,
    )

    expect(code).toBe(3)
    expect(out.stderr()).toBe(FAILURE_LINE)
    expect(out.stdout()).toBe('')
  })

  it('does not prompt when STORYLOOM_NON_INTERACTIVE is set', async () => {
    fx.globals = { ...fx.globals, env: { ...fx.globals.env, STORYLOOM_NON_INTERACTIVE: '1' } }
    await createFailedStory()
    fx.git.scriptNext('clone', { code: 128, stderr: UNREACHABLE })

    const code = await runWorkspaceProvision(
      fx.globals,
      'widge-1',
      {
        force: false,
        wait: true,
        json: false,
        isTTY: true,
        prompter: async () => {
          throw new Error('prompted')
        },
      },
      VERSION,
    )

    expect(code).toBe(3)
    expect(out.stderr()).toBe(FAILURE_LINE)
  })
})

describe('runWorkspaceStatus / runWorkspaceTeardown', () => {
  it('shows a failed record, then removes it', async () => {
    await createFailedStory()

    expect(await runWorkspaceStatus(fx.globals, 'widge-1', { json: false }, VERSION)).toBe(0)
    const lines = out.stdout().split('\n')
    expect(lines[0]).toBe('Workspace for widge-1:')
    expect(lines).toContain('  Status:   failed')
    expect(lines).toContain('  Attempts: 1')
    expect(lines).toContain(`  Error:    git clone failed: ${UNREACHABLE}`)

    expect(await runWorkspaceTeardown(fx.globals, 'widge-1', { json: false }, VERSION)).toBe(0)
    expect(await runWorkspaceStatus(fx.globals, 'widge-1', { json: false }, VERSION)).toBe(0)
    expect(out.stdout().endsWith('Removed workspace of widge-1\nNo workspace for widge-1\n')).toBe(true)
  })
})
