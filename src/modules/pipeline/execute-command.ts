/**
 * executeCommand — runs the pipeline behind each CLI command.
 *
 * Every command starts with `resolve-project`; the remaining steps are
 * command specific. Step names show up in CLI errors
 * ("Error in provision-workspace: ...") and say how far a command got.
 */

import { withBindings, type InvocationContext } from '../../core/context.js'
import { ValidationError } from '../../core/errors.js'
import { assertProjectDeletable, countStoryFiles } from '../project-registry/project-registry-impl.js'
import { assertStoryId, parseStoryId } from '../project-registry/project-schema.js'
import type { StoryRepository } from '../story-registry/story-format.js'
import type { Story } from '../story-registry/story-registry.js'
import type { WorkspaceRecord } from '../workspace/workspace-record.js'
import type {
  CommandIntent,
  CommandOutput,
  ProjectCreateIntent,
  ProjectDeleteIntent,
  StoryCreateIntent,
  StoryDeleteIntent,
  StoryListIntent,
  StoryMoveIntent,
  StoryShowIntent,
  WorkspaceProvisionIntent,
  WorkspaceStatusIntent,
  WorkspaceTeardownIntent,
} from './commands.js'
import { err } from '../../core/result.js'
import { pipeline, type Pipeline, type PipelineResult } from './pipeline.js'
import { openProject, resolveRepository, type CommandServices, type ProjectServices } from './services.js'

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export function executeCommand(
  services: CommandServices,
  invocation: InvocationContext,
  intent: CommandIntent,
): Promise<PipelineResult<CommandOutput>> {
  const ctx = withBindings(invocation, { command: intent.kind })
  ctx.logger.debug('Executing command')
  switch (intent.kind) {
    case 'story.create':
      return createStory(services, ctx, intent)
    case 'story.move':
      return moveStory(services, ctx, intent)
    case 'story.list':
      return listStories(services, ctx, intent)
    case 'story.show':
      return showStory(services, ctx, intent)
    case 'story.delete':
      return deleteStory(services, ctx, intent)
    case 'workspace.provision':
      return provisionWorkspace(services, ctx, intent)
    case 'workspace.status':
      return workspaceStatus(services, ctx, intent)
    case 'workspace.teardown':
      return teardownWorkspace(services, ctx, intent)
    case 'project.create':
      return createProject(services, ctx, intent)
    case 'project.info':
      return projectInfo(services, ctx)
    case 'project.delete':
      return deleteProject(services, ctx, intent)
  }
}

function resolveProject(services: CommandServices): Pipeline<void, ProjectServices> {
  return pipeline<void>().step('resolve-project', () => openProject(services))
}

// ---------------------------------------------------------------------------
// story.create
// ---------------------------------------------------------------------------

interface PlannedStory {
  p: ProjectServices
  stage: string
  repository: StoryRepository | undefined
}

async function createStory(
  services: CommandServices,
  ctx: InvocationContext,
  intent: StoryCreateIntent,
): Promise<PipelineResult<CommandOutput>> {
  const { config } = services
  // set once the story file exists; a later failure leaves it off the board
  const created: { story?: { id: string; stage: string } } = {}
  const result = await resolveProject(services)
    .step('validate-input', async (p): Promise<PlannedStory> => {
      if (intent.title.trim() === '') {
        throw new ValidationError('Story title must not be empty')
      }
      const stage = intent.stage ?? config.kanban.initial_stage
      if (!p.kanban.stages.includes(stage)) {
        throw new ValidationError(
          `Unknown stage "${stage}"; configured stages: ${p.kanban.stages.join(', ')}`,
          { stage },
        )
      }
      const branchStrategy = intent.branchStrategy ?? config.workspace.branch_template
      if (branchStrategy.trim() === '') {
        throw new ValidationError('Branch strategy must not be empty')
      }
      const repository =
        intent.repo !== undefined ? resolveRepository(p.project, intent.repo, branchStrategy) : undefined
      return { p, stage, repository }
    })
    .step('allocate-id', async (plan) => ({ ...plan, id: await plan.p.stories.allocateId(ctx) }))
    .step('create-story', async (plan) => {
      const story = await plan.p.stories.create(ctx, {
        id: plan.id,
        title: intent.title.trim(),
        ...(intent.description !== undefined ? { description: intent.description } : {}),
        ...(plan.repository !== undefined ? { repository: plan.repository } : {}),
      })
      created.story = { id: story.id, stage: plan.stage }
      return { ...plan, story }
    })
    .step('provision-workspace', async (plan) => {
      const workspace: WorkspaceRecord | null =
        plan.repository !== undefined ? await plan.p.workspaces.provision(ctx, plan.story.id) : null
      return { ...plan, workspace }
    })
    .step('enter-initial-stage', async (plan): Promise<CommandOutput> => {
      await plan.p.kanban.transition(ctx, plan.story.id, plan.stage)
      return { kind: 'story.create', story: plan.story, stage: plan.stage, workspace: plan.workspace }
    })
    .run(ctx, undefined)

  if (result.ok || created.story === undefined) return result
  const { id, stage } = created.story
  const move = `storyloom story move ${id} ${stage}`
  const hint =
    result.error.step === 'provision-workspace'
      ? `${id} was created but is on no stage; run "storyloom workspace provision ${id}", then "${move}"`
      : `${id} was created but is on no stage; run "${move}"`
  return err({ ...result.error, hint })
}

// ---------------------------------------------------------------------------
// story.move / story.list / story.show
// ---------------------------------------------------------------------------

function moveStory(
  services: CommandServices,
  ctx: InvocationContext,
  intent: StoryMoveIntent,
): Promise<PipelineResult<CommandOutput>> {
  return resolveProject(services)
    .step('transition', async (p): Promise<CommandOutput> => {
      assertStoryId(intent.id)
      const transition = await p.kanban.transition(ctx, intent.id, intent.to, intent.from)
      return { kind: 'story.move', transition }
    })
    .run(ctx, undefined)
}

function listStories(
  services: CommandServices,
  ctx: InvocationContext,
  intent: StoryListIntent,
): Promise<PipelineResult<CommandOutput>> {
  return resolveProject(services)
    .step('list-stages', async (p): Promise<CommandOutput> => {
      const stages =
        intent.stage !== undefined ? [await p.kanban.listStage(ctx, intent.stage)] : await p.kanban.board(ctx)
      return { kind: 'story.list', stages }
    })
    .run(ctx, undefined)
}

function showStory(
  services: CommandServices,
  ctx: InvocationContext,
  intent: StoryShowIntent,
): Promise<PipelineResult<CommandOutput>> {
  return resolveProject(services)
    .step('load-story', async (p) => ({ p, story: await requireStory(p, intent.id) }))
    .step('current-stage', async ({ p, story }) => ({
      p,
      story,
      stage: await p.kanban.currentStage(ctx, story.id),
    }))
    .step('workspace-status', async ({ p, story, stage }): Promise<CommandOutput> => ({
      kind: 'story.show',
      story,
      stage,
      workspace: await p.workspaces.status(story.id),
    }))
    .run(ctx, undefined)
}

async function requireStory(p: ProjectServices, id: string): Promise<Story> {
  assertStoryId(id)
  const story = await p.stories.get(id)
  if (story === null) {
    throw new ValidationError(`Story ${id} not found`, { storyId: id })
  }
  return story
}

// ---------------------------------------------------------------------------
// story.delete
// ---------------------------------------------------------------------------

function deleteStory(
  services: CommandServices,
  ctx: InvocationContext,
  intent: StoryDeleteIntent,
): Promise<PipelineResult<CommandOutput>> {
  return resolveProject(services)
    .step('find-story', async (p) => {
      await requireStory(p, intent.id)
      return p
    })
    .step('unlink-stages', async (p) => ({ p, stages: await p.kanban.unlink(ctx, intent.id) }))
    .step('teardown-workspace', async ({ p, stages }) => ({
      p,
      stages,
      workspaceRemoved: await p.workspaces.teardown(ctx, intent.id),
    }))
    .step('remove-story', async ({ p, stages, workspaceRemoved }): Promise<CommandOutput> => {
      await p.stories.remove(ctx, intent.id)
      ctx.logger.info({ storyId: intent.id, stages }, 'Story deleted')
      ctx.events.emit('story:deleted', { storyId: intent.id, stages })
      return { kind: 'story.delete', storyId: intent.id, stages, workspaceRemoved }
    })
    .run(ctx, undefined)
}

// ---------------------------------------------------------------------------
// workspace.*
// ---------------------------------------------------------------------------

function provisionWorkspace(
  services: CommandServices,
  ctx: InvocationContext,
  intent: WorkspaceProvisionIntent,
): Promise<PipelineResult<CommandOutput>> {
  return resolveProject(services)
    .step('provision-workspace', async (p): Promise<CommandOutput> => {
      const record = await p.workspaces.provision(ctx, intent.id, {
        ...(intent.force !== undefined ? { force: intent.force } : {}),
        ...(intent.wait !== undefined ? { wait: intent.wait } : {}),
      })
      return { kind: 'workspace.provision', record }
    })
    .run(ctx, undefined)
}

function workspaceStatus(
  services: CommandServices,
  ctx: InvocationContext,
  intent: WorkspaceStatusIntent,
): Promise<PipelineResult<CommandOutput>> {
  return resolveProject(services)
    .step('workspace-status', async (p): Promise<CommandOutput> => ({
      kind: 'workspace.status',
      storyId: intent.id,
      record: await p.workspaces.status(intent.id),
    }))
    .run(ctx, undefined)
}

function teardownWorkspace(
  services: CommandServices,
  ctx: InvocationContext,
  intent: WorkspaceTeardownIntent,
): Promise<PipelineResult<CommandOutput>> {
  return resolveProject(services)
    .step('teardown-workspace', async (p): Promise<CommandOutput> => ({
      kind: 'workspace.teardown',
      storyId: intent.id,
      removed: await p.workspaces.teardown(ctx, intent.id),
    }))
    .run(ctx, undefined)
}

// ---------------------------------------------------------------------------
// project.*
// ---------------------------------------------------------------------------

function createProject(
  services: CommandServices,
  ctx: InvocationContext,
  intent: ProjectCreateIntent,
): Promise<PipelineResult<CommandOutput>> {
  return pipeline<void>()
    .step('create-project', async (): Promise<CommandOutput> => {
      const project = await services.projects.create(ctx, {
        root: services.projectRoot,
        name: intent.name,
        ...(intent.prefix !== undefined ? { prefix: intent.prefix } : {}),
        ...(intent.remotes !== undefined ? { remotes: intent.remotes } : {}),
        ...(intent.maintainers !== undefined ? { maintainers: intent.maintainers } : {}),
        stages: services.config.kanban.stages,
      })
      return { kind: 'project.create', project }
    })
    .run(ctx, undefined)
}

function projectInfo(services: CommandServices, ctx: InvocationContext): Promise<PipelineResult<CommandOutput>> {
  return resolveProject(services)
    .step('read-board', async (p) => ({
      p,
      stories: await p.stories.list(ctx),
      board: await p.kanban.board(ctx),
    }))
    .step('summarize', async ({ p, stories, board }): Promise<CommandOutput> => ({
      kind: 'project.info',
      summary: services.projects.summarize(p.project, { stories, board }),
    }))
    .run(ctx, undefined)
}

/**
 * The story check runs before any workspace is touched, so a refused delete
 * changes nothing. The registry checks again under its lock.
 */
function deleteProject(
  services: CommandServices,
  ctx: InvocationContext,
  intent: ProjectDeleteIntent,
): Promise<PipelineResult<CommandOutput>> {
  const force = intent.force === true
  return resolveProject(services)
    .step('check-stories', async (p) => {
      assertProjectDeletable(p.project, await countStoryFiles(p.project.root), force)
      return p
    })
    .step('teardown-workspaces', async (p) => {
      const removed: string[] = []
      for (const record of await p.workspaces.list()) {
        if (parseStoryId(record.storyId)?.prefix !== p.project.document.prefix) continue
        if (await p.workspaces.teardown(ctx, record.storyId)) removed.push(record.storyId)
      }
      return { p, removed }
    })
    .step('remove-project', async ({ p, removed }): Promise<CommandOutput> => ({
      kind: 'project.delete',
      project: await services.projects.remove(ctx, p.project.root, { force }),
      workspacesRemoved: removed,
    }))
    .run(ctx, undefined)
}
