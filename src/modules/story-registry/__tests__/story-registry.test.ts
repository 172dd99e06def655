/**
 * Unit tests for StoryRegistryImpl and the story file format.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { StoryRegistryImpl } from '../story-registry-impl.js'
import { parseStoryFile } from '../story-format.js'
import { ProjectRegistryImpl, readProjectDocument } from '../../project-registry/project-registry-impl.js'
import { createInvocationContext, type InvocationContext } from '../../../core/context.js'
import { ValidationError } from '../../../core/errors.js'
import type { StoryloomEvents } from '../../../core/event-bus.types.js'
import { captureLogs } from '../../../../test/helpers/logs.js'

const LOCKS = { timeoutMs: 5000, staleMs: 10_000, pollMs: 5 }

let testDir: string
let root: string
let ctx: InvocationContext
let registry: StoryRegistryImpl

beforeEach(async () => {
  testDir = join(tmpdir(), `storyloom-stories-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  root = join(testDir, 'project')
  await mkdir(testDir, { recursive: true })
  ctx = createInvocationContext()
  await new ProjectRegistryImpl({ globalDir: join(testDir, 'home'), locks: LOCKS }).create(ctx, {
    root,
    name: 'filter',
    stages: ['planning', 'complete'],
  })
  registry = new StoryRegistryImpl({ root, locks: LOCKS })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// allocateId
// ---------------------------------------------------------------------------

describe('allocateId()', () => {
  it('hands out sequential ids and persists the counter', async () => {
    await expect(registry.allocateId(ctx)).resolves.toBe('filte-1')
    await expect(registry.allocateId(ctx)).resolves.toBe('filte-2')
    expect((await readProjectDocument(root)).last_story_number).toBe(2)
  })

  it('never hands out the same id to concurrent callers', async () => {
    const ids = await Promise.all(Array.from({ length: 5 }, () => registry.allocateId(ctx)))
    expect(new Set(ids).size).toBe(5)
    expect((await readProjectDocument(root)).last_story_number).toBe(5)
  })

  it('skips ids whose story file already exists', async () => {
    await registry.create(ctx, { id: 'filte-1', title: 'Made by hand' })
    await expect(registry.allocateId(ctx)).resolves.toBe('filte-2')
  })
})

// ---------------------------------------------------------------------------
// create / get
// ---------------------------------------------------------------------------

describe('create() / get()', () => {
  it('writes front matter and a markdown body', async () => {
    const created: StoryloomEvents['story:created'][] = []
    ctx.events.on('story:created', (payload) => created.push(payload))

    const story = await registry.create(ctx, {
      id: 'filte-1',
      title: 'Add retry to uploads',
      description: 'Uploads fail on flaky links.',
      repository: { url: 'https://example.com/org/filter.git', branch_strategy: 'story/{id}' },
    })

    expect(story.path).toBe(join(root, 'stories', 'filte-1.md'))
    expect(created).toEqual([{ storyId: 'filte-1', title: 'Add retry to uploads' }])

    const content = await readFile(story.path, 'utf-8')
    expect(content.startsWith('---\nid: filte-1\ntitle: Add retry to uploads\n')).toBe(true)
    expect(content).toContain('\n# filte-1: Add retry to uploads\n')
    expect(content).toContain('\nUploads fail on flaky links.\n')

    const loaded = await registry.get('filte-1')
    expect(loaded).toEqual(story)
  })

  it('rejects a duplicate id', async () => {
    await registry.create(ctx, { id: 'filte-1', title: 'One' })
    await expect(registry.create(ctx, { id: 'filte-1', title: 'Two' })).rejects.toThrow('Story filte-1 already exists')
  })

  it('rejects malformed ids and empty titles', async () => {
    await expect(registry.create(ctx, { id: '../etc', title: 'x' })).rejects.toBeInstanceOf(ValidationError)
    await expect(registry.create(ctx, { id: 'filte-1', title: '   ' })).rejects.toBeInstanceOf(ValidationError)
  })

  it('returns null for an unknown story', async () => {
    await expect(registry.get('filte-9')).resolves.toBeNull()
    await expect(registry.exists('filte-9')).resolves.toBe(false)
  })

  it('reads a hand-written story with an unquoted timestamp', async () => {
    await writeFile(
      join(root, 'stories', 'filte-4.md'),
      '---\nid: filte-4\ntitle: Hand made\ncreated_at: 2026-01-04T10:00:00.000Z\n---\n\n# filte-4: Hand made\n',
    )
    const story = await registry.get('filte-4')
    expect(story?.createdAt).toBe('2026-01-04T10:00:00.000Z')
    expect(story?.body).toBe('# filte-4: Hand made\n')
  })
})

// ---------------------------------------------------------------------------
// list / remove
// ---------------------------------------------------------------------------

describe('list() / remove()', () => {
  it('orders stories by number and skips unreadable files', async () => {
    await registry.create(ctx, { id: 'filte-10', title: 'Ten' })
    await registry.create(ctx, { id: 'filte-2', title: 'Two' })
    await writeFile(join(root, 'stories', 'filte-3.md'), 'no front matter\n')
    await writeFile(join(root, 'stories', 'notes.txt'), 'ignored\n')

    const stories = await registry.list(ctx)
    expect(stories.map((s) => s.id)).toEqual(['filte-2', 'filte-10'])
  })

  it('warns about unreadable files on the invocation logger', async () => {
    const logs = captureLogs()
    const logged = createInvocationContext({ logger: logs.logger, correlationId: 'inv-list' })
    await writeFile(join(root, 'stories', 'filte-3.md'), 'no front matter\n')

    await expect(registry.list(logged)).resolves.toEqual([])

    expect(logs.records()).toEqual([
      expect.objectContaining({
        level: 'warn',
        correlationId: 'inv-list',
        file: 'filte-3.md',
        msg: 'Skipping unreadable story file',
      }),
    ])
  })

  it('removes the canonical file once', async () => {
    await registry.create(ctx, { id: 'filte-1', title: 'One' })
    await expect(registry.remove(ctx, 'filte-1')).resolves.toBe(true)
    await expect(registry.remove(ctx, 'filte-1')).resolves.toBe(false)
    await expect(registry.exists('filte-1')).resolves.toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Format
// ---------------------------------------------------------------------------

describe('parseStoryFile', () => {
  it('rejects unterminated front matter', () => {
    expect(() => parseStoryFile('---\nid: a-1\n', 'a-1.md')).toThrow('unterminated front matter')
  })

  it('rejects front matter missing required keys', () => {
    expect(() => parseStoryFile('---\nid: a-1\n---\n', 'a-1.md')).toThrow(/Invalid front matter/)
  })
})
