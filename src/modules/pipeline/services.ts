/**
 * Component wiring for one command invocation.
 *
 * CommandServices is what the CLI builds from the loaded configuration.
 * The story, kanban and workspace components are bound to one project, so
 * they are created by openProject() once the project has been resolved.
 */

import { join } from 'node:path'
import { ValidationError } from '../../core/errors.js'
import type { StoryloomConfig } from '../config/config-schema.js'
import type { GitRepositoryManager } from '../git/git-repository-manager.js'
import { createKanbanStateMachine } from '../kanban/kanban-state-machine-impl.js'
import type { KanbanStateMachine } from '../kanban/kanban-state-machine.js'
import type { Project, ProjectRegistry } from '../project-registry/project-registry.js'
import { createStoryRegistry } from '../story-registry/story-registry-impl.js'
import type { StoryRegistry } from '../story-registry/story-registry.js'
import type { StoryRepository } from '../story-registry/story-format.js'
import { createWorkspaceProvisioner } from '../workspace/workspace-provisioner-impl.js'
import type { WorkspaceProvisioner } from '../workspace/workspace-provisioner.js'
import type { LockOptions } from '../../utils/lock.js'

export interface CommandServices {
  config: StoryloomConfig
  projects: ProjectRegistry
  git: GitRepositoryManager
  /** Project the story and workspace commands act on */
  projectRoot: string
}

export interface ProjectServices {
  project: Project
  stories: StoryRegistry
  kanban: KanbanStateMachine
  workspaces: WorkspaceProvisioner
}

export function lockOptionsFromConfig(config: StoryloomConfig): LockOptions {
  return {
    timeoutMs: config.locks.timeout_seconds * 1000,
    staleMs: config.locks.stale_seconds * 1000,
  }
}

/**
 * Load project.yaml and bind the per-project components to it.
 *
 * @throws {ValidationError} no project at `services.projectRoot`
 */
export async function openProject(services: CommandServices): Promise<ProjectServices> {
  const { config, projectRoot } = services
  const project = await services.projects.open(projectRoot)
  const locks = lockOptionsFromConfig(config)

  const stories = createStoryRegistry({ root: project.root, locks })
  const kanban = createKanbanStateMachine({
    root: project.root,
    stages: config.kanban.stages,
    conflictPolicy: config.kanban.conflict_policy,
    locks,
    stories,
  })
  const workspaces = createWorkspaceProvisioner({
    workspaceRoot: config.workspace.root,
    templatesDir: join(project.root, 'templates'),
    projectName: project.document.name,
    ...(config.workspace.base_branch !== undefined ? { baseBranch: config.workspace.base_branch } : {}),
    locks,
    git: services.git,
    stories,
  })

  return { project, stories, kanban, workspaces }
}

// something git can clone: scheme://..., user@host:path, or a filesystem path
const URL_LIKE = /^(?:[a-z][a-z0-9+.-]*:\/\/|[^\s@/]+@[^\s:]+:|\/|\.{1,2}\/)/i

/**
 * Turn `--repo` into a repository reference. A value naming one of the
 * project's remotes resolves to that remote's URL.
 *
 * @throws {ValidationError} neither a remote name nor a URL
 */
export function resolveRepository(
  project: Project,
  repo: string,
  branchStrategy: string,
): StoryRepository {
  const remote = project.document.remotes.find((r) => r.name === repo)
  if (remote !== undefined) {
    return { url: remote.url, branch_strategy: branchStrategy }
  }
  if (URL_LIKE.test(repo)) {
    return { url: repo, branch_strategy: branchStrategy }
  }
  const known = project.document.remotes.map((r) => r.name)
  throw new ValidationError(
    `Unknown remote "${repo}"; project remotes: ${known.length > 0 ? known.join(', ') : '(none)'}`,
    { repo },
  )
}
