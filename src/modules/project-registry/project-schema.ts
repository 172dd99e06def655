/**
 * Zod schemas for project.yaml and the installation-wide projects.yaml,
 * plus story prefix rules.
 */

import { z } from 'zod'
import { ValidationError } from '../../core/errors.js'

// ---------------------------------------------------------------------------
// Prefixes and story ids
// ---------------------------------------------------------------------------

/** Explicit prefixes: a letter, then 1-9 letters or digits */
export const PREFIX_PATTERN = /^[a-z][a-z0-9]{1,9}$/

/** `<prefix>-<n>` */
export const STORY_ID_PATTERN = /^[a-z][a-z0-9]*-[0-9]+$/

const GENERATED_PREFIX_LENGTH = 5

/**
 * Derive a story prefix from a project name.
 *
 * Lowercases the name, strips a trailing run of `-`, `_` and digits, keeps
 * letters and digits (dropping leading digits), then takes five characters,
 * right-padding with `x`.
 *
 * @example
 * generatePrefix('filter')     // 'filte'
 * generatePrefix('api')        // 'apixx'
 * generatePrefix('Web-App_2')  // 'webap'
 */
export function generatePrefix(projectName: string): string {
  const clean = projectName
    .toLowerCase()
    .replace(/[-_0-9]+$/, '')
    .replace(/[^a-z0-9]/g, '')
    .replace(/^[0-9]+/, '')
  return clean.slice(0, GENERATED_PREFIX_LENGTH).padEnd(GENERATED_PREFIX_LENGTH, 'x')
}

export function isValidPrefix(prefix: string): boolean {
  return PREFIX_PATTERN.test(prefix)
}

export function isValidStoryId(id: string): boolean {
  return STORY_ID_PATTERN.test(id)
}

/** @throws {ValidationError} when `id` is not `<prefix>-<n>` */
export function assertStoryId(id: string): void {
  if (!isValidStoryId(id)) {
    throw new ValidationError(`Invalid story id "${id}": expected <prefix>-<number>, e.g. filte-1`, { id })
  }
}

/** Split `filte-12` into its prefix and number */
export function parseStoryId(id: string): { prefix: string; number: number } | null {
  if (!isValidStoryId(id)) return null
  const dash = id.lastIndexOf('-')
  return { prefix: id.slice(0, dash), number: Number(id.slice(dash + 1)) }
}

/** Timestamps written by hand may be loaded by js-yaml as Date */
export const TimestampSchema = z.union([z.string(), z.date().transform((d) => d.toISOString())])

// ---------------------------------------------------------------------------
// project.yaml
// ---------------------------------------------------------------------------

export const ProjectRemoteSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
})

export type ProjectRemote = z.infer<typeof ProjectRemoteSchema>

export const ProjectDocumentSchema = z.object({
  name: z.string().min(1),
  prefix: z.string().regex(PREFIX_PATTERN),
  remotes: z.array(ProjectRemoteSchema).default([]),
  maintainers: z.array(z.string()).default([]),
  last_story_number: z.number().int().min(0),
  created_at: TimestampSchema,
})

export type ProjectDocument = z.infer<typeof ProjectDocumentSchema>

// ---------------------------------------------------------------------------
// <global-dir>/projects.yaml
// ---------------------------------------------------------------------------

export const ProjectEntrySchema = z.object({
  name: z.string(),
  prefix: z.string(),
  root: z.string(),
})

export type ProjectEntry = z.infer<typeof ProjectEntrySchema>

export const RegistryDocumentSchema = z.object({
  projects: z.array(ProjectEntrySchema).default([]),
})

export type RegistryDocument = z.infer<typeof RegistryDocumentSchema>
