import type { ErrorCode } from '../core/errors.js';

// ============================================================================
// Service & Field Types
// ============================================================================

/** Immutable description of the service being modified */
export interface ServiceInfo {
  /** Logical service name, also the package segment (e.g. "portfolio") */
  readonly name: string;
  /** Backing table name */
  readonly table: string;
  /** Entity class name (defaults to the capitalized service name) */
  readonly entity: string;
  readonly description?: string;
}

export interface FieldValidation {
  required?: boolean;
  maxLength?: number;
  min?: number;
  max?: number;
}

export type DefaultValue = string | number | boolean | null;

/** Full descriptor of a field being added */
export interface FieldDescriptor {
  /** Column name in snake_case */
  name: string;
  /** SQL column type, e.g. "VARCHAR(100)" or "DECIMAL(5,2)" */
  type: string;
  /** Java type of the entity property */
  javaType: string;
  nullable?: boolean;
  default_value?: DefaultValue;
  primaryKey?: boolean;
  autoGenerated?: boolean;
  updateOnModify?: boolean;
  description?: string;
  validation?: FieldValidation;
}

/** Attributes an update may change */
export type FieldChanges = Partial<Omit<FieldDescriptor, 'name' | 'primaryKey' | 'autoGenerated'>>;

// ============================================================================
// Field Operations
// ============================================================================

export type FieldAction = 'add' | 'update' | 'remove';

export interface AddFieldOperation {
  action: 'add';
  field: FieldDescriptor;
}

export interface UpdateFieldOperation {
  action: 'update';
  fieldName: string;
  changes: FieldChanges;
}

export interface RemoveFieldOperation {
  action: 'remove';
  fieldName: string;
}

export type FieldOperation = AddFieldOperation | UpdateFieldOperation | RemoveFieldOperation;

export interface ModifyRequestOptions {
  dryRun: boolean;
  autoConfirm: boolean;
}

/** A validated operations request */
export interface ModifyRequest {
  service: ServiceInfo;
  operations: FieldOperation[];
  options: ModifyRequestOptions;
}

// ============================================================================
// Impact Analysis
// ============================================================================

export type MigrationChangeKind =
  | 'ADD_COLUMN'
  | 'MODIFY_COLUMN'
  | 'ALTER_NULLABILITY'
  | 'ALTER_DEFAULT'
  | 'DROP_COLUMN';

export interface MigrationChange {
  readonly kind: MigrationChangeKind;
  readonly fieldName: string;
  /** Generated SQL; commented out when it must not run automatically */
  readonly statement: string;
  readonly requiresManualConfirmation: boolean;
}

export interface ImpactAnalysis {
  readonly serviceName: string;
  readonly tableName: string;
  readonly operationsCount: number;
  readonly dependentFiles: readonly string[];
  readonly migrationChanges: readonly MigrationChange[];
  readonly risks: readonly string[];
  readonly breakingChanges: readonly string[];
  readonly validationResults: readonly string[];
}

/** Where a field name appears across the project */
export interface FieldUsage {
  fieldName: string;
  sourceFiles: string[];
  testFiles: string[];
  frontendFiles: string[];
  migrationFiles: string[];
}

// ============================================================================
// Snapshots
// ============================================================================

export interface SnapshotManifest {
  backup_id: string;
  service_name: string;
  timestamp: string;
  /** Project-relative paths that were copied */
  files_backed_up: string[];
  project_root: string;
  /** Project-relative paths that did not exist when the snapshot was taken */
  paths_absent: string[];
}

// ============================================================================
// Rewriting
// ============================================================================

/** Outcome of rewriting one file's content */
export interface RewriteResult {
  content: string;
  changed: boolean;
  /** Things the operator should review by hand */
  notes: string[];
}

// ============================================================================
// Applier
// ============================================================================

export type ApplierState =
  | 'validating'
  | 'analyzed'
  | 'safety-checked'
  | 'dry-run-reported'
  | 'confirmed'
  | 'snapshotted'
  | 'applying'
  | 'committed'
  | 'rolled-back';

export type ModifyOutcome =
  | 'committed'
  | 'dry-run'
  | 'invalid-request'
  | 'unsafe'
  | 'cancelled'
  | 'snapshot-failed'
  | 'rolled-back'
  | 'restore-failed';

export interface ModifyResult {
  success: boolean;
  outcome: ModifyOutcome;
  /** States visited, in order */
  states: ApplierState[];
  analysis?: ImpactAnalysis;
  backupId?: string;
  migrationFile?: string;
  /** Code of the error that ended a failed run */
  errorCode?: ErrorCode;
  changedFiles: string[];
  errors: string[];
  warnings: string[];
  notes: string[];
}

export interface ModifyOverrides {
  /** Force a dry run regardless of the request options */
  dryRun?: boolean;
  /** Skip the confirmation gate */
  autoConfirm?: boolean;
}

/** Context handed to the confirmation gate */
export interface ConfirmationContext {
  destructive: boolean;
  usages: FieldUsage[];
}

/** Resolves true to proceed, false to abort */
export type ConfirmationGate = (analysis: ImpactAnalysis, context: ConfirmationContext) => Promise<boolean>;

export type ProgressCallback = (phase: string, message: string, current?: number, total?: number) => void;
