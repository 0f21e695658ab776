/**
 * Refactoring Module
 *
 * Field modification of generated services: request parsing, impact
 * analysis, safety checks, snapshots and file rewriting.
 */

export type {
  ServiceInfo,
  FieldValidation,
  DefaultValue,
  FieldDescriptor,
  FieldChanges,
  FieldAction,
  AddFieldOperation,
  UpdateFieldOperation,
  RemoveFieldOperation,
  FieldOperation,
  ModifyRequestOptions,
  ModifyRequest,
  MigrationChangeKind,
  MigrationChange,
  ImpactAnalysis,
  FieldUsage,
  SnapshotManifest,
  RewriteResult,
  ApplierState,
  ModifyOutcome,
  ModifyResult,
  ModifyOverrides,
  ConfirmationContext,
  ConfirmationGate,
  ProgressCallback,
} from './types.js';

export { createFieldOperation, operationFieldName, hasDestructiveOperations, FIELD_ACTIONS } from './field-operation.js';
export { parseModifyRequest, loadModifyRequest } from './request.js';
export { ServiceLayout, createServiceInfo, snapshotRootsFor, MIGRATION_DIR, FRONTEND_DIR, FRONTEND_API_DIR } from './layout.js';

// Rewriters
export * from './rewriters/index.js';

// Operations
export * from './operations/index.js';
