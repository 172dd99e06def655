/**
 * ProjectRegistry — interface and types for projects and the
 * installation-wide prefix registry.
 *
 * Responsible for:
 *  - Creating the on-disk layout of a project (project.yaml, stories/,
 *    kanban/<stage>/, templates/, README.md)
 *  - Keeping story prefixes unique across the installation
 *  - Reading project.yaml and summarising a project for `project info`
 *  - Deleting a project and releasing its prefix
 *
 * Implementation: ProjectRegistryImpl (project-registry-impl.ts)
 */

import type { InvocationContext } from '../../core/context.js'
import type { StageListing } from '../kanban/kanban-state-machine.js'
import type { Story } from '../story-registry/story-registry.js'
import type { ProjectDocument, ProjectEntry, ProjectRemote } from './project-schema.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A loaded project: where it lives and what project.yaml says */
export interface Project {
  root: string
  document: ProjectDocument
}

export interface CreateProjectInput {
  /** Project root (the directory that will hold project.yaml) */
  root: string
  name: string
  /** Explicit prefix; generated from the name when absent */
  prefix?: string
  remotes?: ProjectRemote[]
  maintainers?: string[]
  /** Stage directories to create under kanban/ */
  stages: readonly string[]
}

export interface RemoveProjectOptions {
  /** Delete even when story files remain */
  force?: boolean
}

export interface RemovedProject {
  root: string
  name: string
  prefix: string
  /** Story files deleted along with the project */
  storyFiles: number
}

/** What a project holds right now, as the story registry and board see it */
export interface ProjectContents {
  stories: readonly Story[]
  board: readonly StageListing[]
}

export interface ProjectSummary {
  name: string
  prefix: string
  root: string
  createdAt: string
  remotes: ProjectRemote[]
  maintainers: string[]
  /** Readable story files */
  totalStories: number
  /** Healthy links per configured stage, in stage order */
  stageCounts: Array<{ stage: string; count: number }>
  nextStoryId: string
}

// ---------------------------------------------------------------------------
// ProjectRegistry interface
// ---------------------------------------------------------------------------

export interface ProjectRegistry {
  /**
   * Create a project and register its prefix.
   *
   * @throws {ValidationError} invalid or already-registered prefix, or a
   *   project already exists at `root`
   * @throws {BusyError} the installation registry is locked
   */
  create(ctx: InvocationContext, input: CreateProjectInput): Promise<Project>

  /**
   * Load the project at `root`.
   *
   * @throws {ValidationError} no project.yaml at `root`
   */
  open(root: string): Promise<Project>

  /**
   * Delete the project tree at `root` and release its prefix. A project
   * with story files is only deleted with `force`.
   *
   * @throws {ValidationError} no project at `root`, or story files remain
   *   and `force` is not set
   * @throws {BusyError} the installation registry is locked
   */
  remove(ctx: InvocationContext, root: string, options?: RemoveProjectOptions): Promise<RemovedProject>

  /** Every registered project */
  list(): Promise<ProjectEntry[]>

  /** Counts and metadata for `project info` */
  summarize(project: Project, contents: ProjectContents): ProjectSummary
}
