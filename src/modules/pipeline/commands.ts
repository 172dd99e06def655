/**
 * Command intents and their outputs.
 *
 * The CLI parses arguments into a CommandIntent; executeCommand() runs the
 * matching pipeline and returns the CommandOutput with the same `kind`.
 */

import type { Project, ProjectSummary, RemovedProject } from '../project-registry/project-registry.js'
import type { ProjectRemote } from '../project-registry/project-schema.js'
import type { StageListing, StageLookup, TransitionResult } from '../kanban/kanban-state-machine.js'
import type { Story } from '../story-registry/story-registry.js'
import type { WorkspaceRecord } from '../workspace/workspace-record.js'

// ---------------------------------------------------------------------------
// Intents
// ---------------------------------------------------------------------------

export interface StoryCreateIntent {
  kind: 'story.create'
  title: string
  description?: string
  /** Remote URL, or the name of one of the project's remotes */
  repo?: string
  /** Branch template for the workspace; config workspace.branch_template when absent */
  branchStrategy?: string
  /** Stage to enter; config kanban.initial_stage when absent */
  stage?: string
}

export interface StoryMoveIntent {
  kind: 'story.move'
  id: string
  to: string
  from?: string
}

export interface StoryListIntent {
  kind: 'story.list'
  /** Every stage when absent */
  stage?: string
}

export interface StoryShowIntent {
  kind: 'story.show'
  id: string
}

export interface StoryDeleteIntent {
  kind: 'story.delete'
  id: string
}

export interface WorkspaceProvisionIntent {
  kind: 'workspace.provision'
  id: string
  force?: boolean
  wait?: boolean
}

export interface WorkspaceStatusIntent {
  kind: 'workspace.status'
  id: string
}

export interface WorkspaceTeardownIntent {
  kind: 'workspace.teardown'
  id: string
}

export interface ProjectCreateIntent {
  kind: 'project.create'
  name: string
  prefix?: string
  remotes?: ProjectRemote[]
  maintainers?: string[]
}

export interface ProjectInfoIntent {
  kind: 'project.info'
}

export interface ProjectDeleteIntent {
  kind: 'project.delete'
  /** Delete even when stories remain */
  force?: boolean
}

export type CommandIntent =
  | StoryCreateIntent
  | StoryMoveIntent
  | StoryListIntent
  | StoryShowIntent
  | StoryDeleteIntent
  | WorkspaceProvisionIntent
  | WorkspaceStatusIntent
  | WorkspaceTeardownIntent
  | ProjectCreateIntent
  | ProjectInfoIntent
  | ProjectDeleteIntent

export type CommandKind = CommandIntent['kind']

// ---------------------------------------------------------------------------
// Outputs
// ---------------------------------------------------------------------------

export type CommandOutput =
  | { kind: 'story.create'; story: Story; stage: string; workspace: WorkspaceRecord | null }
  | { kind: 'story.move'; transition: TransitionResult }
  | { kind: 'story.list'; stages: StageListing[] }
  | { kind: 'story.show'; story: Story; stage: StageLookup; workspace: WorkspaceRecord | null }
  | { kind: 'story.delete'; storyId: string; stages: string[]; workspaceRemoved: boolean }
  | { kind: 'workspace.provision'; record: WorkspaceRecord }
  | { kind: 'workspace.status'; storyId: string; record: WorkspaceRecord | null }
  | { kind: 'workspace.teardown'; storyId: string; removed: boolean }
  | { kind: 'project.create'; project: Project }
  | { kind: 'project.info'; summary: ProjectSummary }
  | { kind: 'project.delete'; project: RemovedProject; workspacesRemoved: string[] }
