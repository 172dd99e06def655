/**
 * Story file format: YAML front matter followed by a markdown body.
 *
 *   ---
 *   id: filte-3
 *   title: Add retry to uploads
 *   created_at: '2026-01-04T10:00:00.000Z'
 *   repository:
 *     url: https://example.com/org/filter.git
 *     branch_strategy: story/{id}
 *   ---
 *
 *   # filte-3: Add retry to uploads
 *   ...
 *
 * The current stage is never stored here; it is derived from kanban links.
 */

import yaml from 'js-yaml'
import { z } from 'zod'
import { ValidationError } from '../../core/errors.js'
import { TimestampSchema } from '../project-registry/project-schema.js'

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const StoryRepositorySchema = z.object({
  url: z.string().min(1),
  /** Branch name template for this story's workspace */
  branch_strategy: z.string().min(1),
})

export type StoryRepository = z.infer<typeof StoryRepositorySchema>

export const StoryFrontMatterSchema = z.object({
  id: z.string(),
  title: z.string(),
  created_at: TimestampSchema,
  description: z.string().optional(),
  repository: StoryRepositorySchema.optional(),
})

export type StoryFrontMatter = z.infer<typeof StoryFrontMatterSchema>

const DELIMITER = '---'

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function renderStoryBody(id: string, title: string, description: string | undefined): string {
  return `# ${id}: ${title}

## Description

${description !== undefined && description !== '' ? description : 'No description provided.'}

## Acceptance Criteria

- [ ] Define acceptance criteria for this story

## Notes

<!-- Add any additional notes or updates here -->
`
}

export function renderStoryFile(frontMatter: StoryFrontMatter, body: string): string {
  return `${DELIMITER}\n${yaml.dump(frontMatter, { sortKeys: false, lineWidth: -1 })}${DELIMITER}\n\n${body}`
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export interface ParsedStoryFile {
  frontMatter: StoryFrontMatter
  body: string
}

/**
 * Split and validate a story file.
 *
 * @throws {ValidationError} missing or invalid front matter
 */
export function parseStoryFile(content: string, filePath: string): ParsedStoryFile {
  const lines = content.split('\n')
  if (lines[0]?.trim() !== DELIMITER) {
    throw new ValidationError(`Story file ${filePath} has no front matter`, { filePath })
  }
  const end = lines.findIndex((line, index) => index > 0 && line.trim() === DELIMITER)
  if (end === -1) {
    throw new ValidationError(`Story file ${filePath} has unterminated front matter`, { filePath })
  }

  let parsed: unknown
  try {
    parsed = yaml.load(lines.slice(1, end).join('\n'))
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ValidationError(`Invalid front matter in ${filePath}: ${message}`, { filePath })
  }

  const result = StoryFrontMatterSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ValidationError(`Invalid front matter in ${filePath}: ${issues}`, { filePath })
  }

  return {
    frontMatter: result.data,
    body: lines.slice(end + 1).join('\n').replace(/^\n/, ''),
  }
}
