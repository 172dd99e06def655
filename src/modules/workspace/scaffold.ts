/**
 * Scaffold rendering: every file under `<project-root>/templates/` is
 * copied into a new workspace with `{{name}}` placeholders filled in.
 * Files already present in the workspace are left alone.
 */

import type { Dirent } from 'node:fs'
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises'
import { dirname, join, relative } from 'node:path'
import { hasErrnoCode } from '../../utils/helpers.js'

export interface ScaffoldVariables {
  story_id: string
  title: string
  branch: string
  /** Redacted remote URL */
  repo_url: string
  project: string
}

const PLACEHOLDER = /\{\{\s*([a-z_]+)\s*\}\}/g

/** Replace known `{{name}}` placeholders; unknown ones are kept verbatim */
export function renderTemplate(template: string, variables: ScaffoldVariables): string {
  const values = new Map<string, string>(Object.entries(variables))
  return template.replace(PLACEHOLDER, (match, name: string) => values.get(name) ?? match)
}

/**
 * Render the templates directory into `targetDir`.
 *
 * @returns paths (relative to `targetDir`) of the files written
 */
export async function renderScaffold(
  templatesDir: string,
  targetDir: string,
  variables: ScaffoldVariables,
): Promise<string[]> {
  const files = await walk(templatesDir)
  const written: string[] = []

  for (const source of files) {
    const rel = relative(templatesDir, source)
    const dest = join(targetDir, rel)
    const content = renderTemplate(await readFile(source, 'utf-8'), variables)
    await mkdir(dirname(dest), { recursive: true })
    try {
      await writeFile(dest, content, { flag: 'wx' })
      written.push(rel)
    } catch (err) {
      if (!hasErrnoCode(err, 'EEXIST')) throw err
    }
  }

  return written.sort()
}

async function walk(dir: string): Promise<string[]> {
  let entries: Dirent[]
  try {
    entries = await readdir(dir, { withFileTypes: true })
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return []
    throw err
  }

  const files: string[] = []
  for (const entry of entries) {
    const full = join(dir, entry.name)
    if (entry.isDirectory()) {
      files.push(...(await walk(full)))
    } else if (entry.isFile()) {
      files.push(full)
    }
  }
  return files
}
