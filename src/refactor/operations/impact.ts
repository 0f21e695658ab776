/**
 * impact analysis - What a set of field operations will change
 *
 * Pure: the report depends only on the service and the operations.
 */

import { ServiceLayout } from '../layout.js';
import {
  addColumnStatement,
  alterDefaultStatement,
  alterNullabilityStatement,
  alterTypeStatement,
  dropColumnStatement,
} from '../sql.js';
import type { FieldOperation, ImpactAnalysis, MigrationChange, ServiceInfo } from '../types.js';

interface Accumulator {
  migrationChanges: MigrationChange[];
  risks: string[];
  breakingChanges: string[];
  validationResults: string[];
}

function describeAdd(operation: Extract<FieldOperation, { action: 'add' }>): string {
  const { field } = operation;
  const flags = [
    field.nullable === false ? 'NOT NULL' : 'NULL',
    field.primaryKey ? 'PRIMARY KEY' : undefined,
    field.autoGenerated ? 'auto-generated' : undefined,
    field.default_value !== undefined ? `default ${String(field.default_value)}` : undefined,
  ].filter((flag): flag is string => flag !== undefined);
  return `add ${field.name}: ${field.type} -> ${field.javaType} (${flags.join(', ')})`;
}

function describeUpdate(operation: Extract<FieldOperation, { action: 'update' }>): string {
  const changed = Object.keys(operation.changes);
  return `update ${operation.fieldName}: ${changed.length > 0 ? changed.join(', ') : 'no attribute changes'}`;
}

export class ImpactAnalyzer {
  constructor(private readonly basePackage: string) {}

  analyze(service: ServiceInfo, operations: readonly FieldOperation[]): ImpactAnalysis {
    const acc: Accumulator = {
      migrationChanges: [],
      risks: [],
      breakingChanges: [],
      validationResults: [],
    };

    for (const operation of operations) {
      this.analyzeOperation(acc, service, operation);
    }

    const layout = new ServiceLayout(service, this.basePackage);

    return Object.freeze({
      serviceName: service.name,
      tableName: service.table,
      operationsCount: operations.length,
      dependentFiles: Object.freeze(layout.dependentFiles()),
      migrationChanges: Object.freeze(acc.migrationChanges.map((change) => Object.freeze(change))),
      risks: Object.freeze(acc.risks),
      breakingChanges: Object.freeze(acc.breakingChanges),
      validationResults: Object.freeze(acc.validationResults),
    });
  }

  private analyzeOperation(acc: Accumulator, service: ServiceInfo, operation: FieldOperation): void {
    const table = service.table;

    switch (operation.action) {
      case 'add': {
        const { field } = operation;
        acc.migrationChanges.push({
          kind: 'ADD_COLUMN',
          fieldName: field.name,
          statement: addColumnStatement(table, field),
          requiresManualConfirmation: false,
        });
        if (field.nullable === false && field.default_value === undefined) {
          acc.risks.push(
            `Adding non-nullable field '${field.name}' without default value may fail if table has data`
          );
        }
        acc.validationResults.push(describeAdd(operation));
        break;
      }

      case 'update': {
        const { fieldName, changes } = operation;
        if (changes.type !== undefined) {
          acc.migrationChanges.push({
            kind: 'MODIFY_COLUMN',
            fieldName,
            statement: alterTypeStatement(table, fieldName, changes.type),
            requiresManualConfirmation: false,
          });
          acc.risks.push(`Changing type of field '${fieldName}' may cause data loss if incompatible`);
        }
        if (changes.nullable !== undefined) {
          acc.migrationChanges.push({
            kind: 'ALTER_NULLABILITY',
            fieldName,
            statement: alterNullabilityStatement(table, fieldName, changes.nullable),
            requiresManualConfirmation: false,
          });
          if (!changes.nullable) {
            acc.risks.push(`Making field '${fieldName}' non-nullable fails if existing rows contain NULL`);
          }
        }
        if (changes.default_value !== undefined) {
          acc.migrationChanges.push({
            kind: 'ALTER_DEFAULT',
            fieldName,
            statement: alterDefaultStatement(table, fieldName, changes.default_value),
            requiresManualConfirmation: false,
          });
        }
        acc.validationResults.push(describeUpdate(operation));
        break;
      }

      case 'remove': {
        const { fieldName } = operation;
        acc.migrationChanges.push({
          kind: 'DROP_COLUMN',
          fieldName,
          statement: dropColumnStatement(table, fieldName),
          requiresManualConfirmation: true,
        });
        acc.breakingChanges.push(`Removing field '${fieldName}' will break any code that references it`);
        acc.validationResults.push(`remove ${fieldName}: column drop left for manual confirmation`);
        break;
      }
    }
  }
}
