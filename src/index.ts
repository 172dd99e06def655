/**
 * storyloom - Main module exports
 * Public API surface for embedding the kanban and workspace components
 */

// Core errors
export * from './core/errors.js'
export * from './core/result.js'

// Invocation context and events
export { createInvocationContext, withBindings } from './core/context.js'
export type { InvocationContext, InvocationContextOptions } from './core/context.js'
export type { TypedEventBus } from './core/event-bus.js'
export { createEventBus } from './core/event-bus.js'
export type { StoryloomEvents, KanbanProblem } from './core/event-bus.types.js'

// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export { withLock, acquireLock } from './utils/lock.js'
export type { LockOptions, ReleaseLock } from './utils/lock.js'
export { redactUrl, maskSecrets } from './cli/utils/masking.js'

// Components
export * from './modules/config/index.js'
export * from './modules/git/index.js'
export * from './modules/project-registry/index.js'
export * from './modules/story-registry/index.js'
export * from './modules/kanban/index.js'
export * from './modules/workspace/index.js'
export * from './modules/pipeline/index.js'
