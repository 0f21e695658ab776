/**
 * frontend notes - TypeScript interface changes for the service's API client
 *
 * The client is hand-maintained JavaScript, so changes are written to a notes
 * file next to it for manual integration rather than applied.
 */

import { formatDateTime } from '../../utils/dates.js';
import { javaToTypeScriptType, toCamelCase } from '../../utils/naming.js';
import type { FieldOperation, ServiceInfo } from '../types.js';
import { targetJavaType } from './java-edits.js';

export function interfaceUpdateLines(operations: readonly FieldOperation[]): string[] {
  const lines: string[] = [];

  for (const operation of operations) {
    switch (operation.action) {
      case 'add': {
        const { field } = operation;
        if (field.autoGenerated) break;
        const optional = field.nullable === false ? '' : '?';
        lines.push(
          `  ${toCamelCase(field.name)}${optional}: ${javaToTypeScriptType(field.javaType)};  // ${field.description ?? ''}`.trimEnd()
        );
        break;
      }
      case 'update': {
        const javaType = targetJavaType(operation.changes);
        if (javaType !== undefined) {
          lines.push(`  ${toCamelCase(operation.fieldName)}: ${javaToTypeScriptType(javaType)};  // CHANGED type`);
        }
        break;
      }
      case 'remove':
        lines.push(`  // REMOVED: ${toCamelCase(operation.fieldName)}`);
        break;
    }
  }

  return lines;
}

/** Content of the interface notes file, or undefined when nothing changes on the client */
export function renderInterfaceNotes(
  service: ServiceInfo,
  operations: readonly FieldOperation[],
  date: Date
): string | undefined {
  const updates = interfaceUpdateLines(operations);
  if (updates.length === 0) return undefined;

  return [
    `// Interface updates for ${service.entity}`,
    `// Generated: ${formatDateTime(date)}`,
    '',
    '// Add these fields to your TypeScript interfaces:',
    '',
    ...updates,
    '',
  ].join('\n');
}
