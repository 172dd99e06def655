import { describe, it, expect } from 'vitest'
import { getGitVersion, isGitVersionSupported, isTransientGitFailure, renderBranchName } from '../git-utils.js'
import { FakeGit } from '../../../../test/helpers/fake-git.js'

describe('isTransientGitFailure', () => {
  it.each([
    ["fatal: unable to access 'https://example.com/r.git/': Could not resolve host: example.com", true],
    ['fatal: the remote end hung up unexpectedly', true],
    ['error: RPC failed; curl 56 Connection reset by peer', true],
    ["fatal: Authentication failed for 'https://example.com/r.git/'", false],
    ["remote: Repository not found.\nfatal: repository 'https://example.com/r.git/' not found", false],
    ['fatal: destination path already exists and is not an empty directory', false],
  ])('%j → %s', (stderr, expected) => {
    expect(isTransientGitFailure(stderr)).toBe(expected)
  })
})

describe('isGitVersionSupported', () => {
  it('gates at 2.20', () => {
    expect(isGitVersionSupported('2.20.0')).toBe(true)
    expect(isGitVersionSupported('2.43')).toBe(true)
    expect(isGitVersionSupported('3.0.1')).toBe(true)
    expect(isGitVersionSupported('2.19.9')).toBe(false)
    expect(isGitVersionSupported('1.9')).toBe(false)
  })
})

describe('getGitVersion', () => {
  it('extracts the number from git --version', async () => {
    const git = new FakeGit()
    git.version = '2.39.3'
    await expect(getGitVersion(git.runner)).resolves.toBe('2.39.3')
  })
})

describe('renderBranchName', () => {
  it('substitutes id, prefix and number', () => {
    expect(renderBranchName('story/{id}', 'filte-12')).toBe('story/filte-12')
    expect(renderBranchName('{prefix}/task-{number}', 'api-3')).toBe('api/task-3')
  })
})
