/**
 * DTO rewriting - request and response class edits for field operations
 *
 * Request DTOs carry validation annotations and never receive auto-generated
 * fields; response DTOs mirror the entity.
 */

import { SourceDocument } from '../../parsers/document.js';
import { toCamelCase } from '../../utils/naming.js';
import type { FieldOperation, RewriteResult } from '../types.js';
import {
  VALIDATION_ANNOTATIONS,
  accessorLines,
  dtoFieldLines,
  requiredImports,
  validationAnnotations,
  type DtoKind,
} from './field-code.js';
import {
  FieldInsertionPoint,
  classEndId,
  ensureImports,
  findField,
  hasGeneratedAccessors,
  isDeclared,
  indentOf,
  insertBeforeClassEnd,
  memberIndent,
  regenerateAccessors,
  removeAccessors,
  removeAnnotations,
  removeFieldBlock,
  replaceDeclaredType,
  replaceDocText,
  setAnnotationAttributes,
  targetJavaType,
  type JavaSource,
} from './java-edits.js';

export function rewriteDto(source: JavaSource, operations: readonly FieldOperation[], kind: DtoKind): RewriteResult {
  const { structure, content } = source;
  const doc = SourceDocument.fromContent(content);
  const lines = doc.lines();
  const notes: string[] = [];
  const imports: string[] = [];
  const indent = memberIndent(structure, lines);
  const insertion = new FieldInsertionPoint(structure);
  const closingBrace = classEndId(doc, lines);
  const generateAccessors = !hasGeneratedAccessors(structure);
  const label = structure.className ?? `${kind} DTO`;

  for (const operation of operations) {
    switch (operation.action) {
      case 'add': {
        const { field } = operation;
        if (kind === 'request' && field.autoGenerated) break;
        if (isDeclared(doc, structure, field.name)) {
          notes.push(`${label}: field ${toCamelCase(field.name)} already exists, not added`);
          break;
        }
        const block = dtoFieldLines(field, kind, indent);
        insertion.insert(doc, block);
        imports.push(...requiredImports(block, field.javaType));
        if (generateAccessors && closingBrace !== undefined) {
          insertBeforeClassEnd(doc, closingBrace, accessorLines(field, indent));
        }
        break;
      }

      case 'remove': {
        const field = findField(structure, operation.fieldName);
        if (!field) {
          // request DTOs legitimately lack auto-generated fields
          if (kind === 'response') {
            notes.push(`${label}: field ${operation.fieldName} not found, nothing removed`);
          }
          break;
        }
        removeFieldBlock(doc, field);
        removeAccessors(doc, structure, lines, operation.fieldName);
        break;
      }

      case 'update': {
        const { fieldName, changes } = operation;
        const field = findField(structure, fieldName);
        if (!field || !doc.has(field.line)) {
          notes.push(`${label}: field ${fieldName} not found, update skipped`);
          break;
        }

        const javaType = targetJavaType(changes);
        if (javaType !== undefined && javaType !== field.type) {
          replaceDeclaredType(doc, field, javaType);
          imports.push(...requiredImports([], javaType));
          if (generateAccessors) {
            regenerateAccessors(doc, structure, lines, fieldName, javaType, changes.description);
          }
        }

        if (kind === 'request' && changes.validation !== undefined) {
          removeAnnotations(doc, field, VALIDATION_ANNOTATIONS);
          const annotations = validationAnnotations(
            { name: fieldName, javaType: javaType ?? field.type, validation: changes.validation },
            indentOf(lines[field.line]),
            true
          );
          doc.insertBefore(field.line, annotations);
          imports.push(...requiredImports(annotations, ''));

          const schemaId = field.annotationLines.find(
            (id) => doc.has(id) && /^@(?:[\w.]+\.)?Schema\b/.test(doc.text(id).trim())
          );
          if (schemaId !== undefined && changes.validation.required !== undefined) {
            doc.replace(
              schemaId,
              setAnnotationAttributes(doc.text(schemaId), { required: String(changes.validation.required) })
            );
          }
        }

        if (changes.description !== undefined && !replaceDocText(doc, field, changes.description)) {
          notes.push(`${label}: update the doc comment of ${field.name} by hand`);
        }
        break;
      }
    }
  }

  ensureImports(doc, imports);

  return { content: doc.toString(), changed: doc.changed, notes };
}
