/**
 * InvocationContext — explicit per-invocation state handed to every
 * component call: a correlation id, a logger bound to it, and the event
 * sink. Created once per CLI invocation and dropped when it ends.
 */

import type pino from 'pino'
import { createEventBus, type TypedEventBus } from './event-bus.js'
import { childLogger, logger as rootLogger } from '../utils/logger.js'
import { generateId } from '../utils/helpers.js'

export interface InvocationContext {
  readonly correlationId: string
  readonly logger: pino.Logger
  readonly events: TypedEventBus
}

export interface InvocationContextOptions {
  correlationId?: string
  logger?: pino.Logger
  events?: TypedEventBus
  /** Extra bindings added to every log line of this invocation */
  bindings?: Record<string, unknown>
}

export function createInvocationContext(options: InvocationContextOptions = {}): InvocationContext {
  const correlationId = options.correlationId ?? generateId('inv')
  return {
    correlationId,
    logger: childLogger(options.logger ?? rootLogger, { correlationId, ...options.bindings }),
    events: options.events ?? createEventBus(),
  }
}

/** Derive a context whose log lines carry extra bindings (e.g. the story id) */
export function withBindings(
  ctx: InvocationContext,
  bindings: Record<string, unknown>,
): InvocationContext {
  return { ...ctx, logger: childLogger(ctx.logger, bindings) }
}
