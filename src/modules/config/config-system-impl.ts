/**
 * ConfigSystem implementation — loads configuration in hierarchy order and
 * exposes get/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global config     (~/.storyloom/config.yaml)
 *     → project config    (<project-root>/config.yaml)
 *     → workspace config  (.storyloom.yaml where the CLI runs)
 *     → environment vars  (STORYLOOM_LOCK_TIMEOUT, STORYLOOM_NON_INTERACTIVE)
 *     → CLI flag overrides (ConfigSystemOptions.cliOverrides)
 */

import { readFile } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import type pino from 'pino'
import { logger as rootLogger } from '../../utils/logger.js'
import { hasErrnoCode } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import {
  StoryloomConfigSchema,
  PartialStoryloomConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  type StoryloomConfig,
  type PartialStoryloomConfig,
} from './config-schema.js'
import { createDefaultConfig } from './defaults.js'
import type { ConfigLayerSource, ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../cli/utils/masking.js'

export const CONFIG_FILE_NAME = 'config.yaml'
export const WORKSPACE_CONFIG_FILE_NAME = '.storyloom.yaml'

// ---------------------------------------------------------------------------
// Global directory
// ---------------------------------------------------------------------------

/** $STORYLOOM_HOME, else ~/.storyloom */
export function resolveGlobalDir(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.STORYLOOM_HOME
  return home !== undefined && home !== '' ? resolve(home) : join(homedir(), '.storyloom')
}

// ---------------------------------------------------------------------------
// Ordered merge
// ---------------------------------------------------------------------------

/**
 * Apply one partial layer on top of a complete config. Objects merge per
 * key, arrays (kanban.stages) are replaced whole.
 */
export function mergeConfig(base: StoryloomConfig, layer: PartialStoryloomConfig): StoryloomConfig {
  return {
    config_format_version: base.config_format_version,
    kanban: { ...base.kanban, ...layer.kanban },
    workspace: { ...base.workspace, ...layer.workspace },
    git: { ...base.git, ...layer.git },
    locks: { ...base.locks, ...layer.locks },
    cli: { ...base.cli, ...layer.cli },
  }
}

/** Merge layers left to right; later layers win */
export function mergeLayers(
  base: StoryloomConfig,
  layers: readonly PartialStoryloomConfig[],
): StoryloomConfig {
  return layers.reduce(mergeConfig, base)
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Read the two environment inputs the core honours and return them as a
 * partial config layer. Invalid values are ignored with a warning.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv, logger: pino.Logger = rootLogger): PartialStoryloomConfig {
  const overrides: PartialStoryloomConfig = {}

  const lockTimeout = env.STORYLOOM_LOCK_TIMEOUT
  if (lockTimeout !== undefined && lockTimeout !== '') {
    const seconds = Number(lockTimeout)
    if (Number.isFinite(seconds) && seconds >= 0) {
      overrides.locks = { timeout_seconds: seconds }
    } else {
      logger.warn({ value: lockTimeout }, 'Ignoring invalid STORYLOOM_LOCK_TIMEOUT')
    }
  }

  const nonInteractive = env.STORYLOOM_NON_INTERACTIVE
  if (nonInteractive !== undefined && nonInteractive !== '') {
    overrides.cli = { non_interactive: ['1', 'true', 'yes'].includes(nonInteractive.toLowerCase()) }
  }

  return overrides
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (cursor === null || typeof cursor !== 'object' || Array.isArray(cursor)) return undefined
    cursor = Object.entries(cursor).find(([key]) => key === part)?.[1]
  }
  return cursor
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: StoryloomConfig | null = null
  private _sources: ConfigLayerSource[] = []
  private readonly _globalDir: string
  private readonly _projectRoot: string | undefined
  private readonly _workspaceConfigPath: string | undefined
  private readonly _cliOverrides: PartialStoryloomConfig
  private readonly _env: NodeJS.ProcessEnv
  private readonly _logger: pino.Logger

  constructor(options: ConfigSystemOptions = {}) {
    this._env = options.env ?? process.env
    this._globalDir = options.globalDir ? resolve(options.globalDir) : resolveGlobalDir(this._env)
    this._projectRoot = options.projectRoot ? resolve(options.projectRoot) : undefined
    this._workspaceConfigPath = options.workspaceConfigPath
    this._cliOverrides = options.cliOverrides ?? {}
    this._logger = options.logger ?? rootLogger
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get globalDir(): string {
    return this._globalDir
  }

  get sources(): readonly ConfigLayerSource[] {
    return this._sources
  }

  async load(): Promise<void> {
    const sources: ConfigLayerSource[] = [{ layer: 'defaults' }]
    const layers: PartialStoryloomConfig[] = []

    const candidates: Array<{ layer: 'global' | 'project' | 'workspace'; path: string | undefined }> = [
      { layer: 'global', path: join(this._globalDir, CONFIG_FILE_NAME) },
      {
        layer: 'project',
        path: this._projectRoot !== undefined ? join(this._projectRoot, CONFIG_FILE_NAME) : undefined,
      },
      { layer: 'workspace', path: this._workspaceConfigPath },
    ]

    for (const { layer, path } of candidates) {
      if (path === undefined) continue
      const parsed = await this._loadYamlFile(path)
      if (parsed === null) continue
      layers.push(parsed)
      sources.push({ layer, path })
    }

    const envOverrides = readEnvOverrides(this._env, this._logger)
    if (Object.keys(envOverrides).length > 0) {
      layers.push(envOverrides)
      sources.push({ layer: 'env' })
    }

    if (Object.keys(this._cliOverrides).length > 0) {
      layers.push(this._cliOverrides)
      sources.push({ layer: 'cli' })
    }

    const merged = mergeLayers(createDefaultConfig(this._globalDir), layers)

    // Relative workspace roots are taken relative to the project root
    if (this._projectRoot !== undefined) {
      merged.workspace.root = resolve(this._projectRoot, merged.workspace.root)
    }

    const result = StoryloomConfigSchema.safeParse(merged)
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
        .join('\n')
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    this._sources = sources
    this._logger.debug({ sources }, 'Configuration loaded successfully')
  }

  getConfig(): StoryloomConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  getMasked(): unknown {
    return deepMask(this.getConfig())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<PartialStoryloomConfig | null> {
    let raw: string
    try {
      raw = await readFile(filePath, 'utf-8')
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return null
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Invalid YAML in ${filePath}: ${message}`, { filePath })
    }

    // An empty file is an empty layer
    if (parsed === undefined || parsed === null) return {}

    const result = PartialStoryloomConfigSchema.safeParse(parsed)
    if (!result.success) {
      const versionIssue = result.error.issues.find((i) => i.path[0] === 'config_format_version')
      if (versionIssue !== undefined) {
        throw new ConfigError(
          `Unsupported config_format_version in ${filePath}; this version of storyloom reads format ${CURRENT_CONFIG_FORMAT_VERSION}`,
          { filePath },
        )
      }
      const issues = result.error.issues
        .map((i) => `  • ${i.path.join('.')}: ${i.message}`)
        .join('\n')
      throw new ConfigError(`Invalid config file at ${filePath}:\n${issues}`, {
        filePath,
        issues: result.error.issues,
      })
    }

    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem({ projectRoot })
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
