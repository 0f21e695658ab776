/**
 * field usage - Where a field's name appears across the generated project
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globSync } from 'glob';
import type { Logger } from '../../core/logger.js';
import { errorMessage } from '../../core/errors.js';
import { toCamelCase, toPascalCase } from '../../utils/naming.js';
import { FRONTEND_DIR, MIGRATION_DIR, ServiceLayout } from '../layout.js';
import type { FieldUsage, ServiceInfo } from '../types.js';

/**
 * Project-relative files under `directory` whose content contains any of `patterns`
 */
function searchDirectory(
  projectRoot: string,
  directory: string,
  patterns: string[],
  extensions: string[],
  logger?: Logger
): string[] {
  const absolute = path.join(projectRoot, ...directory.split('/'));
  if (!fs.existsSync(absolute)) return [];

  const pattern = extensions.length === 1 ? `**/*${extensions[0]}` : `**/*{${extensions.join(',')}}`;
  const files = globSync(pattern, { cwd: absolute, nodir: true, posix: true }).sort();

  const matches: string[] = [];
  for (const file of files) {
    let content: string;
    try {
      content = fs.readFileSync(path.join(absolute, file), 'utf-8');
    } catch (error) {
      logger?.warn(`Could not read ${directory}/${file}: ${errorMessage(error)}`);
      continue;
    }
    if (patterns.some((p) => content.includes(p))) {
      matches.push(`${directory}/${file}`);
    }
  }
  return matches;
}

/**
 * Search the service's source and test trees, the frontend directory and the
 * migration scripts for the snake, camel and Pascal spellings of a field.
 * Migration scripts are only searched for the column name itself.
 */
export function checkFieldUsage(
  service: ServiceInfo,
  fieldName: string,
  options: { projectRoot: string; basePackage: string; logger?: Logger }
): FieldUsage {
  const { projectRoot, basePackage, logger } = options;
  const layout = new ServiceLayout(service, basePackage);
  const spellings = Array.from(new Set([fieldName, toCamelCase(fieldName), toPascalCase(fieldName)]));

  logger?.debug(`Checking usage of field '${fieldName}' in service '${service.name}'`);

  return {
    fieldName,
    sourceFiles: searchDirectory(projectRoot, layout.mainTree, spellings, ['.java'], logger),
    testFiles: searchDirectory(projectRoot, layout.testTree, spellings, ['.java'], logger),
    frontendFiles: searchDirectory(projectRoot, FRONTEND_DIR, spellings, ['.js', '.ts'], logger),
    migrationFiles: searchDirectory(projectRoot, MIGRATION_DIR, [fieldName], ['.sql'], logger),
  };
}

/** One line per file category that references the field */
export function describeUsage(usage: FieldUsage): string[] {
  const lines: string[] = [];
  const categories: Array<[string, string[]]> = [
    ['source', usage.sourceFiles],
    ['test', usage.testFiles],
    ['frontend', usage.frontendFiles],
    ['migration', usage.migrationFiles],
  ];
  for (const [label, files] of categories) {
    if (files.length > 0) {
      lines.push(`${usage.fieldName}: ${files.length} ${label} file(s) - ${files.join(', ')}`);
    }
  }
  return lines;
}
