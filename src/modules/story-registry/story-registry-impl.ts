/**
 * StoryRegistryImpl — canonical story files under <project-root>/stories/.
 */

import { readFile, readdir, unlink, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { InvocationContext } from '../../core/context.js'
import { ValidationError } from '../../core/errors.js'
import { hasErrnoCode } from '../../utils/helpers.js'
import { withLock, type LockOptions } from '../../utils/lock.js'
import {
  projectLockPath,
  readProjectDocument,
  storiesDir,
  writeProjectDocument,
} from '../project-registry/project-registry-impl.js'
import { assertStoryId, parseStoryId } from '../project-registry/project-schema.js'
import {
  parseStoryFile,
  renderStoryBody,
  renderStoryFile,
  type StoryFrontMatter,
} from './story-format.js'
import type { CreateStoryInput, Story, StoryRegistry } from './story-registry.js'

export interface StoryRegistryOptions {
  /** Project root */
  root: string
  locks: LockOptions
}

export class StoryRegistryImpl implements StoryRegistry {
  readonly root: string
  private readonly _locks: LockOptions

  constructor(options: StoryRegistryOptions) {
    this.root = options.root
    this._locks = options.locks
  }

  pathOf(id: string): string {
    return join(storiesDir(this.root), `${id}.md`)
  }

  async allocateId(ctx: InvocationContext): Promise<string> {
    return withLock(projectLockPath(this.root), 'project story counter', this._locks, async () => {
      const document = await readProjectDocument(this.root)
      let next = document.last_story_number + 1
      // a counter edited back by hand must not hand out an id that is taken
      while (await this.exists(`${document.prefix}-${String(next)}`)) {
        next += 1
      }
      await writeProjectDocument(this.root, { ...document, last_story_number: next })
      const id = `${document.prefix}-${String(next)}`
      ctx.logger.debug({ storyId: id }, 'Story id allocated')
      return id
    })
  }

  async create(ctx: InvocationContext, input: CreateStoryInput): Promise<Story> {
    assertStoryId(input.id)
    const title = input.title.trim()
    if (title === '') {
      throw new ValidationError('Story title must not be empty')
    }

    const frontMatter: StoryFrontMatter = {
      id: input.id,
      title,
      created_at: new Date().toISOString(),
      ...(input.description !== undefined && input.description !== '' ? { description: input.description } : {}),
      ...(input.repository !== undefined ? { repository: input.repository } : {}),
    }
    const body = renderStoryBody(input.id, title, input.description)
    const path = this.pathOf(input.id)

    try {
      await writeFile(path, renderStoryFile(frontMatter, body), { flag: 'wx' })
    } catch (err) {
      if (hasErrnoCode(err, 'EEXIST')) {
        throw new ValidationError(`Story ${input.id} already exists`, { storyId: input.id })
      }
      if (hasErrnoCode(err, 'ENOENT')) {
        throw new ValidationError(`No stories directory under ${this.root}; is this a storyloom project?`, {
          root: this.root,
        })
      }
      throw err
    }

    ctx.logger.info({ storyId: input.id }, 'Story created')
    ctx.events.emit('story:created', { storyId: input.id, title })
    return toStory(frontMatter, body, path)
  }

  async get(id: string): Promise<Story | null> {
    assertStoryId(id)
    const path = this.pathOf(id)
    let content: string
    try {
      content = await readFile(path, 'utf-8')
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return null
      throw err
    }
    const { frontMatter, body } = parseStoryFile(content, path)
    return toStory(frontMatter, body, path)
  }

  async exists(id: string): Promise<boolean> {
    assertStoryId(id)
    try {
      await readFile(this.pathOf(id))
      return true
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return false
      throw err
    }
  }

  async list(ctx: InvocationContext): Promise<Story[]> {
    let names: string[]
    try {
      names = await readdir(storiesDir(this.root))
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return []
      throw err
    }

    const stories: Story[] = []
    for (const name of names) {
      if (!name.endsWith('.md')) continue
      const id = name.slice(0, -'.md'.length)
      if (parseStoryId(id) === null) continue
      try {
        const story = await this.get(id)
        if (story !== null) stories.push(story)
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err
        ctx.logger.warn({ file: name, err: err.message }, 'Skipping unreadable story file')
      }
    }

    return stories.sort((a, b) => (parseStoryId(a.id)?.number ?? 0) - (parseStoryId(b.id)?.number ?? 0))
  }

  async remove(ctx: InvocationContext, id: string): Promise<boolean> {
    assertStoryId(id)
    try {
      await unlink(this.pathOf(id))
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return false
      throw err
    }
    ctx.logger.info({ storyId: id }, 'Story file removed')
    return true
  }
}

function toStory(frontMatter: StoryFrontMatter, body: string, path: string): Story {
  return {
    id: frontMatter.id,
    title: frontMatter.title,
    createdAt: frontMatter.created_at,
    description: frontMatter.description,
    repository: frontMatter.repository,
    path,
    body,
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createStoryRegistry(options: StoryRegistryOptions): StoryRegistry {
  return new StoryRegistryImpl(options)
}
