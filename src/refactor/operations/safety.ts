/**
 * safety checks - Heuristic guards against destructive field operations
 *
 * No schema introspection: primary keys are recognised by name and foreign
 * keys by scanning the migration scripts.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globSync } from 'glob';
import type { Logger } from '../../core/logger.js';
import { errorMessage } from '../../core/errors.js';
import { escapeRegex } from '../../utils/naming.js';
import { MIGRATION_DIR } from '../layout.js';
import type { FieldOperation, ServiceInfo } from '../types.js';

const PRIMARY_KEY_NAMES = new Set(['id', 'uuid']);

export function isPrimaryKeyName(fieldName: string): boolean {
  return PRIMARY_KEY_NAMES.has(fieldName.toLowerCase());
}

/** Widening or narrowing a VARCHAR is the only type change considered safe */
export function isTypeChangeSafe(newType: string): boolean {
  return newType.toUpperCase().includes('VARCHAR');
}

export class SafetyValidator {
  constructor(private readonly logger?: Logger) {}

  /**
   * Every rule is applied; an empty list means the operation may proceed.
   */
  validate(operation: FieldOperation, service: ServiceInfo, projectRoot: string): string[] {
    const errors: string[] = [];

    switch (operation.action) {
      case 'remove':
        if (isPrimaryKeyName(operation.fieldName)) {
          errors.push(`Cannot remove primary key field: ${operation.fieldName}`);
        }
        if (this.hasForeignKeyReferences(operation.fieldName, service, projectRoot)) {
          errors.push(`Field ${operation.fieldName} is referenced by foreign keys in other tables`);
        }
        break;

      case 'update':
        if (isPrimaryKeyName(operation.fieldName)) {
          errors.push(`Cannot modify primary key field: ${operation.fieldName}`);
        }
        if (operation.changes.type !== undefined && !isTypeChangeSafe(operation.changes.type)) {
          errors.push(`Type change for field ${operation.fieldName} may cause data loss`);
        }
        break;

      case 'add':
        break;
    }

    return errors;
  }

  validateAll(operations: readonly FieldOperation[], service: ServiceInfo, projectRoot: string): string[] {
    return operations.flatMap((operation) => this.validate(operation, service, projectRoot));
  }

  private hasForeignKeyReferences(fieldName: string, service: ServiceInfo, projectRoot: string): boolean {
    const migrationDir = path.join(projectRoot, ...MIGRATION_DIR.split('/'));
    if (!fs.existsSync(migrationDir)) return false;

    const reference = new RegExp(
      `REFERENCES\\s+${escapeRegex(service.table)}\\s*\\(\\s*${escapeRegex(fieldName)}\\s*\\)`,
      'i'
    );

    const scripts = globSync('*.sql', { cwd: migrationDir, absolute: true, nodir: true }).sort();
    for (const script of scripts) {
      let content: string;
      try {
        content = fs.readFileSync(script, 'utf-8');
      } catch (error) {
        this.logger?.warn(`Could not read ${path.basename(script)}: ${errorMessage(error)}`);
        continue;
      }
      if (reference.test(content)) return true;
    }

    return false;
  }
}
