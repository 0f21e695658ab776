export { OperationApplier, type OperationApplierOptions } from './apply.js';
export { ImpactAnalyzer } from './impact.js';
export { SafetyValidator, isPrimaryKeyName, isTypeChangeSafe } from './safety.js';
export { checkFieldUsage, describeUsage } from './dependencies.js';
export { SnapshotManager, SnapshotManifestSchema, type SnapshotManagerOptions } from './snapshot.js';
export {
  MigrationGenerator,
  MIGRATION_TEMPLATE,
  nextMigrationVersion,
  operationsSummary,
  migrationFileName,
  buildTemplateContext,
  type GeneratedMigration,
  type MigrationTemplateContext,
} from './migration.js';
export { createInteractiveGate, renderImpactAnalysis, renderDetailedAnalysis, colorize } from './confirmation.js';
