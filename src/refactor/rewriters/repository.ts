/**
 * repository rewriting - Derived finder methods for searchable String fields
 */

import { SourceDocument } from '../../parsers/document.js';
import { collectLeadingBlock, findBlockEnd } from '../../parsers/java.js';
import { escapeRegex, toCamelCase, toPascalCase, toWords } from '../../utils/naming.js';
import type { FieldDescriptor, FieldOperation, RewriteResult, ServiceInfo } from '../types.js';
import { INDENT } from './field-code.js';
import { classEndId, ensureImports, insertBeforeClassEnd, removeLines, type JavaSource } from './java-edits.js';

/** Longest String column that still gets finder methods */
export const MAX_SEARCHABLE_LENGTH = 255;

export function isSearchable(field: FieldDescriptor): boolean {
  if (field.javaType !== 'String') return false;
  const maxLength = field.validation?.maxLength;
  return maxLength === undefined || maxLength <= MAX_SEARCHABLE_LENGTH;
}

export function finderMethodLines(field: FieldDescriptor, entity: string, indent = INDENT): string[] {
  const pascal = toPascalCase(field.name);
  const camel = toCamelCase(field.name);
  const words = toWords(field.name);
  const plural = `${entity.toLowerCase()}s`;

  return [
    `${indent}/**`,
    `${indent} * Find ${plural} by ${words}.`,
    `${indent} *`,
    `${indent} * @param ${camel} the ${words}`,
    `${indent} * @return list of ${plural}`,
    `${indent} */`,
    `${indent}List<${entity}> findBy${pascal}(String ${camel});`,
    '',
    `${indent}/**`,
    `${indent} * Find ${plural} by ${words} containing text (case-insensitive).`,
    `${indent} *`,
    `${indent} * @param ${camel} the ${words} to search for`,
    `${indent} * @return list of ${plural}`,
    `${indent} */`,
    `${indent}List<${entity}> findBy${pascal}ContainingIgnoreCase(String ${camel});`,
  ];
}

export function rewriteRepository(
  source: JavaSource,
  operations: readonly FieldOperation[],
  service: ServiceInfo
): RewriteResult {
  const { content, structure } = source;
  const doc = SourceDocument.fromContent(content);
  const lines = doc.lines();
  const notes: string[] = [];
  const label = structure.className ?? `${service.entity}Repository`;
  const closingBrace = classEndId(doc, lines);
  let needsList = false;

  for (const operation of operations) {
    if (operation.action === 'add') {
      const { field } = operation;
      if (!isSearchable(field)) continue;
      if (closingBrace === undefined) {
        notes.push(`${label}: could not find an insertion point for ${toCamelCase(field.name)} finders`);
        continue;
      }
      insertBeforeClassEnd(doc, closingBrace, finderMethodLines(field, service.entity));
      needsList = true;
    } else if (operation.action === 'remove') {
      const pascal = toPascalCase(operation.fieldName);
      const finder = new RegExp(`\\bfindBy${escapeRegex(pascal)}(?:ContainingIgnoreCase)?\\s*\\(`);
      const mention = new RegExp(`\\b(?:${escapeRegex(pascal)}|${escapeRegex(toCamelCase(operation.fieldName))})\\b`);

      for (let i = structure.classLine + 1; i < lines.length; i++) {
        if (finder.test(lines[i])) {
          const { blockStart } = collectLeadingBlock(lines, i);
          removeLines(doc, blockStart, findBlockEnd(lines, i));
        } else if (mention.test(lines[i]) && !lines[i].trim().startsWith('*') && doc.has(i)) {
          notes.push(`${label}: line ${i + 1} still mentions ${toCamelCase(operation.fieldName)}`);
        }
      }
    }
  }

  if (needsList) ensureImports(doc, ['java.util.List']);

  return { content: doc.toString(), changed: doc.changed, notes };
}
