/**
 * ProjectRegistryImpl — project layout on disk plus the installation-wide
 * prefix registry at <global-dir>/projects.yaml.
 *
 * The registry is read-modify-written under its own lock so two concurrent
 * `project create` runs cannot both claim one prefix.
 */

import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import yaml from 'js-yaml'
import type { InvocationContext } from '../../core/context.js'
import { ConfigError, ValidationError } from '../../core/errors.js'
import { writeFileAtomic } from '../../utils/atomic-write.js'
import { hasErrnoCode } from '../../utils/helpers.js'
import { withLock, type LockOptions } from '../../utils/lock.js'
import {
  ProjectDocumentSchema,
  RegistryDocumentSchema,
  generatePrefix,
  isValidPrefix,
  type ProjectDocument,
  type ProjectEntry,
} from './project-schema.js'
import type {
  CreateProjectInput,
  Project,
  ProjectContents,
  ProjectRegistry,
  ProjectSummary,
  RemovedProject,
  RemoveProjectOptions,
} from './project-registry.js'

export const PROJECT_FILE_NAME = 'project.yaml'
export const REGISTRY_FILE_NAME = 'projects.yaml'

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function projectFilePath(root: string): string {
  return join(root, PROJECT_FILE_NAME)
}

export function storiesDir(root: string): string {
  return join(root, 'stories')
}

export function kanbanDir(root: string): string {
  return join(root, 'kanban')
}

export function templatesDir(root: string): string {
  return join(root, 'templates')
}

export function locksDir(root: string): string {
  return join(root, '.locks')
}

/** Guards last_story_number */
export function projectLockPath(root: string): string {
  return join(locksDir(root), 'project')
}

// ---------------------------------------------------------------------------
// project.yaml I/O
// ---------------------------------------------------------------------------

/**
 * Read and validate project.yaml.
 *
 * @throws {ValidationError} no project at `root`, or project.yaml is invalid
 */
export async function readProjectDocument(root: string): Promise<ProjectDocument> {
  const filePath = projectFilePath(root)
  let raw: string
  try {
    raw = await readFile(filePath, 'utf-8')
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) {
      throw new ValidationError(
        `No storyloom project at ${root}; run "storyloom project create" first`,
        { root },
      )
    }
    throw err
  }

  let parsed: unknown
  try {
    parsed = yaml.load(raw)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ValidationError(`Invalid YAML in ${filePath}: ${message}`, { filePath })
  }

  const result = ProjectDocumentSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  • ${i.path.join('.')}: ${i.message}`).join('\n')
    throw new ValidationError(`Invalid project file at ${filePath}:\n${issues}`, { filePath })
  }
  return result.data
}

export async function writeProjectDocument(root: string, document: ProjectDocument): Promise<void> {
  await writeFileAtomic(projectFilePath(root), yaml.dump(document, { sortKeys: false }))
}

// ---------------------------------------------------------------------------
// Deletion guard
// ---------------------------------------------------------------------------

/** Markdown files under stories/, readable or not */
export async function countStoryFiles(root: string): Promise<number> {
  try {
    const names = await readdir(storiesDir(root))
    return names.filter((name) => name.endsWith('.md')).length
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return 0
    throw err
  }
}

/**
 * @throws {ValidationError} story files remain and `force` is not set
 */
export function assertProjectDeletable(project: Project, storyFiles: number, force: boolean): void {
  if (storyFiles === 0 || force) return
  throw new ValidationError(
    `Project ${project.document.name} at ${project.root} contains ${String(storyFiles)} ${storyFiles === 1 ? 'story' : 'stories'}; use --force to delete it anyway`,
    { root: project.root, storyFiles },
  )
}

// ---------------------------------------------------------------------------
// README
// ---------------------------------------------------------------------------

function renderReadme(name: string, prefix: string, stages: readonly string[]): string {
  const stageLines = stages.map((stage) => `  - \`${stage}/\``).join('\n')
  return `# ${name}

A storyloom project. Story ids use the prefix \`${prefix}\`.

## Directory Structure

- \`project.yaml\` - project metadata and the story counter
- \`stories/\` - one markdown file per story
- \`kanban/\` - one directory per stage, holding links to stories
${stageLines}
- \`templates/\` - files copied into every new story workspace

## Usage

\`\`\`bash
storyloom story create "Story title"
storyloom story move ${prefix}-1 ${stages[1] ?? stages[0] ?? 'planning'}
storyloom story list
\`\`\`
`
}

// ---------------------------------------------------------------------------
// ProjectRegistryImpl
// ---------------------------------------------------------------------------

export interface ProjectRegistryOptions {
  globalDir: string
  locks: LockOptions
}

export class ProjectRegistryImpl implements ProjectRegistry {
  private readonly _globalDir: string
  private readonly _locks: LockOptions

  constructor(options: ProjectRegistryOptions) {
    this._globalDir = options.globalDir
    this._locks = options.locks
  }

  private get _registryPath(): string {
    return join(this._globalDir, REGISTRY_FILE_NAME)
  }

  private _withRegistryLock<T>(fn: () => Promise<T>): Promise<T> {
    return withLock(join(this._globalDir, '.locks', 'projects'), 'project registry', this._locks, fn)
  }

  private async _writeRegistry(entries: ProjectEntry[]): Promise<void> {
    await writeFileAtomic(this._registryPath, yaml.dump({ projects: entries }))
  }

  async create(ctx: InvocationContext, input: CreateProjectInput): Promise<Project> {
    const root = resolve(input.root)
    const prefix = input.prefix ?? generatePrefix(input.name)
    if (!isValidPrefix(prefix)) {
      throw new ValidationError(
        `Invalid prefix "${prefix}": use a lowercase letter followed by 1-9 lowercase letters or digits`,
        { prefix },
      )
    }

    return this._withRegistryLock(async () => {
      if (await this._projectExists(root)) {
        throw new ValidationError(`A project already exists at ${root}`, { root })
      }

      const entries = await this.list()
      const owner = entries.find((e) => e.prefix === prefix && e.root !== root)
      if (owner !== undefined) {
        throw new ValidationError(
          `Prefix "${prefix}" is already used by project "${owner.name}" at ${owner.root}; choose another with --prefix`,
          { prefix, owner: owner.root },
        )
      }

      const document: ProjectDocument = {
        name: input.name,
        prefix,
        remotes: input.remotes ?? [],
        maintainers: input.maintainers ?? [],
        last_story_number: 0,
        created_at: new Date().toISOString(),
      }

      await mkdir(storiesDir(root), { recursive: true })
      await mkdir(templatesDir(root), { recursive: true })
      await mkdir(locksDir(root), { recursive: true })
      for (const stage of input.stages) {
        await mkdir(join(kanbanDir(root), stage), { recursive: true })
      }
      await writeProjectDocument(root, document)
      await this._writeReadme(root, renderReadme(input.name, prefix, input.stages))

      // a stale entry for this root (project directory removed by hand) is replaced
      const next: ProjectEntry[] = [
        ...entries.filter((e) => e.root !== root),
        { name: input.name, prefix, root },
      ]
      await this._writeRegistry(next)

      ctx.logger.info({ root, prefix }, 'Project created')
      return { root, document }
    })
  }

  async remove(ctx: InvocationContext, root: string, options: RemoveProjectOptions = {}): Promise<RemovedProject> {
    const project = await this.open(root)
    return this._withRegistryLock(async () => {
      const storyFiles = await countStoryFiles(project.root)
      assertProjectDeletable(project, storyFiles, options.force === true)

      await rm(project.root, { recursive: true, force: true })
      const entries = await this.list()
      const next = entries.filter((e) => e.root !== project.root)
      if (next.length !== entries.length) await this._writeRegistry(next)

      const { name, prefix } = project.document
      ctx.logger.info({ root: project.root, prefix, storyFiles }, 'Project deleted')
      ctx.events.emit('project:deleted', { root: project.root, prefix, storyFiles })
      return { root: project.root, name, prefix, storyFiles }
    })
  }

  async open(root: string): Promise<Project> {
    const resolved = resolve(root)
    return { root: resolved, document: await readProjectDocument(resolved) }
  }

  async list(): Promise<ProjectEntry[]> {
    let raw: string
    try {
      raw = await readFile(this._registryPath, 'utf-8')
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return []
      throw err
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw) ?? {}
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Invalid YAML in ${this._registryPath}: ${message}`)
    }

    const result = RegistryDocumentSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid project registry at ${this._registryPath}`, {
        issues: result.error.issues,
      })
    }
    return result.data.projects
  }

  summarize(project: Project, contents: ProjectContents): ProjectSummary {
    const { document } = project
    return {
      name: document.name,
      prefix: document.prefix,
      root: project.root,
      createdAt: document.created_at,
      remotes: document.remotes,
      maintainers: document.maintainers,
      totalStories: contents.stories.length,
      stageCounts: contents.board.map((listing) => ({ stage: listing.stage, count: listing.stories.length })),
      nextStoryId: `${document.prefix}-${String(document.last_story_number + 1)}`,
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _projectExists(root: string): Promise<boolean> {
    try {
      await readFile(projectFilePath(root))
      return true
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return false
      throw err
    }
  }

  private async _writeReadme(root: string, content: string): Promise<void> {
    try {
      await writeFile(join(root, 'README.md'), content, { flag: 'wx' })
    } catch (err) {
      // keep a README the user already has
      if (!hasErrnoCode(err, 'EEXIST')) throw err
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createProjectRegistry(options: ProjectRegistryOptions): ProjectRegistry {
  return new ProjectRegistryImpl(options)
}
