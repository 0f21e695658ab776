/**
 * migration generation - Versioned SQL script for a set of field operations
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globSync } from 'glob';
import Handlebars from 'handlebars';
import type { Logger } from '../../core/logger.js';
import { formatDateTime } from '../../utils/dates.js';
import { MIGRATION_DIR } from '../layout.js';
import { addColumnStatement, dropColumnStatement, updateStatements } from '../sql.js';
import type { FieldAction, FieldOperation, ServiceInfo } from '../types.js';
import { operationFieldName } from '../field-operation.js';

export const MIGRATION_TEMPLATE = 'field_operations/migration_alter.sql.hbs';

const VERSION_PATTERN = /^V(\d+)__.*\.sql$/;

interface TemplateOperation {
  fieldName: string;
  description?: string;
  statements: string[];
}

export interface MigrationTemplateContext {
  migrationVersion: string;
  serviceName: string;
  tableName: string;
  serviceDescription: string;
  operationsSummary: string;
  generationDate: string;
  addOperations: TemplateOperation[];
  updateOperations: TemplateOperation[];
  removeOperations: TemplateOperation[];
  fieldsWithUpdatedAt: boolean;
}

export interface GeneratedMigration {
  /** Project-relative path of the written script */
  file: string;
  version: number;
}

/** Highest `V<n>__*.sql` version in the directory plus one; 1 when there is none */
export function nextMigrationVersion(migrationDir: string): number {
  if (!fs.existsSync(migrationDir)) return 1;

  const versions = globSync('V*.sql', { cwd: migrationDir, nodir: true })
    .map((name) => VERSION_PATTERN.exec(name))
    .filter((match): match is RegExpExecArray => match !== null)
    .map((match) => parseInt(match[1], 10));

  return versions.length > 0 ? Math.max(...versions) + 1 : 1;
}

/** "Add 1 field, Update 2 fields"; actions without operations are left out */
export function operationsSummary(operations: readonly FieldOperation[]): string {
  const labels: Array<[FieldAction, string]> = [
    ['add', 'Add'],
    ['update', 'Update'],
    ['remove', 'Remove'],
  ];
  return labels
    .map(([action, label]) => {
      const count = operations.filter((op) => op.action === action).length;
      return count > 0 ? `${label} ${count} field${count > 1 ? 's' : ''}` : undefined;
    })
    .filter((part): part is string => part !== undefined)
    .join(', ');
}

export function migrationFileName(version: number, service: ServiceInfo): string {
  return `V${version}__Update_${service.name}_${service.table}_fields.sql`;
}

export function buildTemplateContext(
  service: ServiceInfo,
  operations: readonly FieldOperation[],
  version: number,
  date: Date
): MigrationTemplateContext {
  const addOperations: TemplateOperation[] = [];
  const updateOperations: TemplateOperation[] = [];
  const removeOperations: TemplateOperation[] = [];

  for (const operation of operations) {
    switch (operation.action) {
      case 'add':
        addOperations.push({
          fieldName: operation.field.name,
          description: operation.field.description,
          statements: [addColumnStatement(service.table, operation.field)],
        });
        break;
      case 'update':
        updateOperations.push({
          fieldName: operation.fieldName,
          statements: updateStatements(service.table, operation.fieldName, operation.changes),
        });
        break;
      case 'remove':
        removeOperations.push({
          fieldName: operation.fieldName,
          statements: [dropColumnStatement(service.table, operation.fieldName)],
        });
        break;
    }
  }

  return {
    migrationVersion: `V${version}`,
    serviceName: service.name,
    tableName: service.table,
    serviceDescription: service.description ?? `${service.name} service`,
    operationsSummary: operationsSummary(operations),
    generationDate: formatDateTime(date),
    addOperations,
    updateOperations,
    removeOperations,
    fieldsWithUpdatedAt: operations.some(
      (op) => op.action === 'add' && operationFieldName(op) === 'updated_at'
    ),
  };
}

export interface MigrationGeneratorOptions {
  projectRoot: string;
  templatesDir: string;
  logger: Logger;
  now?: () => Date;
}

export class MigrationGenerator {
  private readonly now: () => Date;

  constructor(private readonly options: MigrationGeneratorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get migrationDir(): string {
    return path.join(this.options.projectRoot, ...MIGRATION_DIR.split('/'));
  }

  get templatePath(): string {
    return path.join(this.options.templatesDir, ...MIGRATION_TEMPLATE.split('/'));
  }

  /**
   * Render and write the next migration script.
   * Returns undefined, with a warning, when the template is missing.
   */
  generate(service: ServiceInfo, operations: readonly FieldOperation[]): GeneratedMigration | undefined {
    const { logger } = this.options;

    if (!fs.existsSync(this.templatePath)) {
      logger.warn('Migration template not found, skipping migration generation');
      return undefined;
    }

    fs.mkdirSync(this.migrationDir, { recursive: true });
    const version = nextMigrationVersion(this.migrationDir);
    const content = this.render(service, operations, version);
    const fileName = migrationFileName(version, service);

    fs.writeFileSync(path.join(this.migrationDir, fileName), content, 'utf-8');
    logger.success(`Migration file generated: ${fileName}`);

    return { file: `${MIGRATION_DIR}/${fileName}`, version };
  }

  render(service: ServiceInfo, operations: readonly FieldOperation[], version: number): string {
    const source = fs.readFileSync(this.templatePath, 'utf-8');
    const template = Handlebars.compile<MigrationTemplateContext>(source, { noEscape: true });
    return template(buildTemplateContext(service, operations, version, this.now()));
  }
}
