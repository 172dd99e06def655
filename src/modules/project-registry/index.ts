/**
 * project-registry module — public API exports.
 */

export type {
  ProjectRegistry,
  Project,
  CreateProjectInput,
  ProjectSummary,
  ProjectContents,
  RemoveProjectOptions,
  RemovedProject,
} from './project-registry.js'

export {
  ProjectRegistryImpl,
  createProjectRegistry,
  readProjectDocument,
  writeProjectDocument,
  countStoryFiles,
  assertProjectDeletable,
  projectFilePath,
  projectLockPath,
  storiesDir,
  kanbanDir,
  templatesDir,
  locksDir,
  PROJECT_FILE_NAME,
  REGISTRY_FILE_NAME,
} from './project-registry-impl.js'

export type { ProjectRegistryOptions } from './project-registry-impl.js'

export {
  generatePrefix,
  isValidPrefix,
  isValidStoryId,
  assertStoryId,
  TimestampSchema,
  parseStoryId,
  PREFIX_PATTERN,
  STORY_ID_PATTERN,
  ProjectDocumentSchema,
  ProjectRemoteSchema,
  RegistryDocumentSchema,
} from './project-schema.js'

export type { ProjectDocument, ProjectRemote, ProjectEntry } from './project-schema.js'
