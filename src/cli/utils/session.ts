/**
 * One CLI invocation: loaded configuration, wired components and the
 * InvocationContext every component call receives.
 */

import type { Command } from 'commander'
import { join, resolve } from 'node:path'
import { createInvocationContext, type InvocationContext } from '../../core/context.js'
import { createConfigSystem, WORKSPACE_CONFIG_FILE_NAME } from '../../modules/config/config-system-impl.js'
import type { StoryloomConfig } from '../../modules/config/config-schema.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { createGitRepositoryManager } from '../../modules/git/git-repository-manager-impl.js'
import type { GitRunner } from '../../modules/git/git-utils.js'
import { createProjectRegistry } from '../../modules/project-registry/project-registry-impl.js'
import { lockOptionsFromConfig, type CommandServices } from '../../modules/pipeline/services.js'
import { createLogger } from '../../utils/logger.js'

/** Options shared by every command */
export interface GlobalOptions {
  /** Project root (`--project`) */
  project: string
  /** Directory searched for `.storyloom.yaml`; process.cwd() when absent */
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** git stand-in; the real git CLI when absent */
  gitRunner?: GitRunner
}

/** Global options of a parsed program */
export function globalOptions(program: Command): GlobalOptions {
  return { project: program.opts<{ project: string }>().project }
}

export interface CliSession {
  configSystem: ConfigSystem
  config: StoryloomConfig
  services: CommandServices
  ctx: InvocationContext
}

/**
 * Load configuration for the project and wire the components.
 *
 * @param projectRoot - overrides `options.project` (project create <dir>)
 * @throws {ConfigError} invalid configuration
 */
export async function openSession(options: GlobalOptions, projectRoot?: string): Promise<CliSession> {
  const root = resolve(projectRoot ?? options.project)
  // config decides the log level, so loading it logs at the default level
  const loading = createInvocationContext()
  const configSystem = createConfigSystem({
    projectRoot: root,
    workspaceConfigPath: join(options.cwd ?? process.cwd(), WORKSPACE_CONFIG_FILE_NAME),
    logger: loading.logger,
    ...(options.env !== undefined ? { env: options.env } : {}),
  })
  await configSystem.load()
  const config = configSystem.getConfig()

  const ctx = createInvocationContext({
    correlationId: loading.correlationId,
    events: loading.events,
    ...(config.cli.log_level !== undefined ? { logger: createLogger('storyloom', { level: config.cli.log_level }) } : {}),
  })

  const locks = lockOptionsFromConfig(config)
  const services: CommandServices = {
    config,
    projects: createProjectRegistry({ globalDir: configSystem.globalDir, locks }),
    git: createGitRepositoryManager({
      ...(options.gitRunner !== undefined ? { runner: options.gitRunner } : {}),
      networkTimeoutMs: config.git.network_timeout_seconds * 1000,
      retry: { count: config.git.clone_retry_count, baseDelayMs: config.git.retry_base_delay_ms },
    }),
    projectRoot: root,
  }

  ctx.logger.debug({ projectRoot: root, sources: configSystem.sources }, 'Session opened')
  return { configSystem, config, services, ctx }
}
