/**
 * workspace module — public API exports.
 */

export type { WorkspaceProvisioner, ProvisionOptions } from './workspace-provisioner.js'
export { WorkspaceProvisionerImpl, createWorkspaceProvisioner } from './workspace-provisioner-impl.js'
export type { WorkspaceProvisionerOptions } from './workspace-provisioner-impl.js'
export {
  WorkspaceRecordSchema,
  WorkspaceStatusSchema,
  readRecord,
  writeRecord,
  deleteRecord,
  listRecordIds,
  recordPath,
  recordsDir,
  RECORDS_DIR_NAME,
} from './workspace-record.js'
export type { WorkspaceRecord, WorkspaceStatus } from './workspace-record.js'
export { renderScaffold, renderTemplate } from './scaffold.js'
export type { ScaffoldVariables } from './scaffold.js'
