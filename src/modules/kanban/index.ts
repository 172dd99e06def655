/**
 * kanban module — public API exports.
 */

export type {
  KanbanStateMachine,
  StageLookup,
  StageListing,
  TransitionResult,
  TransitionIntent,
} from './kanban-state-machine.js'

export { KanbanStateMachineImpl, createKanbanStateMachine, linkTarget } from './kanban-state-machine-impl.js'
export type { KanbanStateMachineOptions } from './kanban-state-machine-impl.js'
