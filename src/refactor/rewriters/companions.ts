/**
 * Review notes for files that are not rewritten: controllers work through
 * the DTOs, and test data is left for a human to adjust.
 */

import { testValue, toCamelCase, toPascalCase } from '../../utils/naming.js';
import type { FieldOperation } from '../types.js';

export function controllerNotes(controllerName: string, content: string, operations: readonly FieldOperation[]): string[] {
  const notes: string[] = [];
  for (const operation of operations) {
    if (operation.action !== 'remove') continue;
    const pascal = toPascalCase(operation.fieldName);
    if (new RegExp(`\\b(?:get|set|is)${pascal}\\(`).test(content)) {
      notes.push(`${controllerName}: still calls accessors of ${toCamelCase(operation.fieldName)}`);
    }
  }
  return notes;
}

/**
 * Builder values to add for new fields and references to drop for removed
 * ones, e.g. `ProjectServiceTest: add .discountRate(new BigDecimal("100.00")) to test data`.
 */
export function testFileNotes(testName: string, content: string, operations: readonly FieldOperation[]): string[] {
  const notes: string[] = [];

  for (const operation of operations) {
    if (operation.action === 'add') {
      const { field } = operation;
      if (field.autoGenerated) continue;
      notes.push(
        `${testName}: add .${toCamelCase(field.name)}(${testValue(field.javaType, field.name)}) to test data`
      );
    } else if (operation.action === 'remove') {
      const camel = toCamelCase(operation.fieldName);
      const pattern = new RegExp(`\\b(?:${camel}|(?:get|set|is)${toPascalCase(operation.fieldName)})\\b`);
      if (pattern.test(content)) {
        notes.push(`${testName}: remove references to ${camel}`);
      }
    }
  }

  return notes;
}
