/**
 * entity rewriting - JPA model class edits for field operations
 */

import { SourceDocument } from '../../parsers/document.js';
import type { FieldInfo } from '../../parsers/types.js';
import { toCamelCase } from '../../utils/naming.js';
import type { FieldChanges, FieldOperation, RewriteResult } from '../types.js';
import {
  VALIDATION_ANNOTATIONS,
  accessorLines,
  columnAnnotation,
  modelFieldLines,
  requiredImports,
  validationAnnotations,
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

function updateColumn(doc: SourceDocument, field: FieldInfo, changes: FieldChanges, fieldName: string): void {
  const columnId = field.annotationLines.find(
    (id) => doc.has(id) && /^@(?:[\w.]+\.)?Column\b/.test(doc.text(id).trim())
  );
  const attributes: Record<string, string | undefined> = {};
  let touched = false;

  if (changes.nullable !== undefined) {
    attributes.nullable = changes.nullable ? undefined : 'false';
    touched = true;
  }
  if (changes.validation && 'maxLength' in changes.validation) {
    const length = changes.validation.maxLength;
    attributes.length = length === undefined ? undefined : String(length);
    touched = true;
  }
  if (!touched) return;

  if (columnId !== undefined) {
    doc.replace(columnId, setAnnotationAttributes(doc.text(columnId), attributes));
  } else if (changes.nullable === false || changes.validation?.maxLength !== undefined) {
    const indent = indentOf(doc.text(field.line));
    doc.insertBefore(field.line, [
      columnAnnotation({ name: fieldName, nullable: changes.nullable, validation: changes.validation }, indent),
    ]);
  }
}

export function rewriteEntity(source: JavaSource, operations: readonly FieldOperation[]): RewriteResult {
  const { structure, content } = source;
  const doc = SourceDocument.fromContent(content);
  const lines = doc.lines();
  const notes: string[] = [];
  const imports: string[] = [];
  const indent = memberIndent(structure, lines);
  const insertion = new FieldInsertionPoint(structure);
  const closingBrace = classEndId(doc, lines);
  const generateAccessors = !hasGeneratedAccessors(structure);

  for (const operation of operations) {
    switch (operation.action) {
      case 'add': {
        const { field } = operation;
        if (isDeclared(doc, structure, field.name)) {
          notes.push(`${structure.className}: field ${toCamelCase(field.name)} already exists, not added`);
          break;
        }
        const block = modelFieldLines(field, indent);
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
          notes.push(`${structure.className}: field ${operation.fieldName} not found, nothing removed`);
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
          notes.push(`${structure.className}: field ${fieldName} not found, update skipped`);
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

        if (changes.validation !== undefined) {
          removeAnnotations(doc, field, VALIDATION_ANNOTATIONS);
          const annotations = validationAnnotations(
            { name: fieldName, javaType: javaType ?? field.type, validation: changes.validation },
            indentOf(lines[field.line])
          );
          doc.insertBefore(field.line, annotations);
          imports.push(...requiredImports(annotations, ''));
        }

        updateColumn(doc, field, changes, fieldName);

        if (changes.description !== undefined && !replaceDocText(doc, field, changes.description)) {
          notes.push(`${structure.className}: update the doc comment of ${field.name} by hand`);
        }
        break;
      }
    }
  }

  ensureImports(doc, imports);

  return { content: doc.toString(), changed: doc.changed, notes };
}
