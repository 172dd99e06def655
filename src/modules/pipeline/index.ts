/**
 * pipeline module — public API exports.
 */

export { Pipeline, pipeline } from './pipeline.js'
export type { PipelineFailure, PipelineResult } from './pipeline.js'
export { executeCommand } from './execute-command.js'
export { openProject, resolveRepository, lockOptionsFromConfig } from './services.js'
export type { CommandServices, ProjectServices } from './services.js'
export type {
  CommandIntent,
  CommandKind,
  CommandOutput,
  StoryCreateIntent,
  StoryMoveIntent,
  StoryListIntent,
  StoryShowIntent,
  StoryDeleteIntent,
  WorkspaceProvisionIntent,
  WorkspaceStatusIntent,
  WorkspaceTeardownIntent,
  ProjectCreateIntent,
  ProjectInfoIntent,
} from './commands.js'
