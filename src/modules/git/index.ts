/**
 * git module — public API exports.
 */

export type {
  GitRepositoryManager,
  GitRepositoryManagerOptions,
  GitRetryPolicy,
  BranchOutcome,
  CloneOutcome,
} from './git-repository-manager.js'

export {
  GitRepositoryManagerImpl,
  createGitRepositoryManager,
  withGitRetry,
} from './git-repository-manager-impl.js'

export {
  spawnGit,
  getGitVersion,
  isGitVersionSupported,
  isTransientGitFailure,
  renderBranchName,
  MIN_GIT_VERSION,
} from './git-utils.js'

export type { GitRunner, GitSpawnResult, SpawnOptions } from './git-utils.js'
