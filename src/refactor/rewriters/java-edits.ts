/**
 * Line-level edits on Java sources held in a SourceDocument.
 * Line numbers from a SourceStructure are valid ids of the document created
 * from the same content.
 */

import { collectLeadingBlock, findBlockEnd, findClassEnd } from '../../parsers/java.js';
import type { LineId, SourceDocument } from '../../parsers/document.js';
import type { FieldInfo, MethodInfo, SourceStructure } from '../../parsers/types.js';
import { escapeRegex, sqlToJavaType, toCamelCase, toPascalCase } from '../../utils/naming.js';
import type { FieldChanges } from '../types.js';
import { INDENT, accessorLines } from './field-code.js';

const LOMBOK_ACCESSORS = /^@(?:lombok\.)?(?:Data|Getter|Setter|Value)\b/;
const IMPORT_LINE = /^\s*import\s+(?:static\s+)?([\w.*]+)\s*;/;
const PACKAGE_LINE = /^\s*package\s+[\w.]+\s*;/;

export function indentOf(line: string): string {
  return line.match(/^\s*/)?.[0] ?? '';
}

/** Indentation used for members, taken from the first field or method */
export function memberIndent(structure: SourceStructure, lines: readonly string[]): string {
  const first = structure.fields[0]?.line ?? structure.methods[0]?.line;
  return first !== undefined ? indentOf(lines[first]) : INDENT;
}

/** Field declared for a snake_case column name, matched by its camelCase or literal name */
export function findField(structure: SourceStructure, fieldName: string): FieldInfo | undefined {
  const camel = toCamelCase(fieldName);
  return structure.fields.find((field) => field.name === camel) ?? structure.fields.find((field) => field.name === fieldName);
}

/** Field is declared and its declaration has not been removed by an earlier edit */
export function isDeclared(doc: SourceDocument, structure: SourceStructure, fieldName: string): boolean {
  const field = findField(structure, fieldName);
  return field !== undefined && doc.has(field.line);
}

/** Class generates its accessors through Lombok */
export function hasGeneratedAccessors(structure: SourceStructure): boolean {
  return structure.annotations.some((annotation) => LOMBOK_ACCESSORS.test(annotation));
}

/**
 * Remove the lines from `from` to `to` and collapse the blank line the gap
 * would otherwise leave behind.
 */
export function removeLines(doc: SourceDocument, from: LineId, to: LineId): void {
  if (!doc.has(from) || !doc.has(to)) return;

  const ids = doc.range(from, to);
  const before = doc.previous(ids[0]);
  const after = doc.next(ids[ids.length - 1]);
  doc.remove(ids);

  if (before === undefined || after === undefined) return;
  const beforeBlank = doc.text(before).trim() === '';
  const afterText = doc.text(after).trim();
  if (beforeBlank && afterText === '') {
    doc.remove([after]);
  } else if (beforeBlank && afterText.startsWith('}')) {
    doc.remove([before]);
  }
}

/** Remove a field with its annotations and doc comment */
export function removeFieldBlock(doc: SourceDocument, field: FieldInfo): void {
  removeLines(doc, field.blockStart, field.line);
}

/** First and last line of a method including its doc comment and annotations */
export function methodRange(lines: readonly string[], method: MethodInfo): { start: number; end: number } {
  const { blockStart } = collectLeadingBlock(lines, method.line);
  return { start: blockStart, end: findBlockEnd(lines, method.line) };
}

/** Getter, boolean getter and setter of a field */
export function findAccessors(structure: SourceStructure, fieldName: string): MethodInfo[] {
  const pascal = toPascalCase(fieldName);
  const names = new Set([`get${pascal}`, `is${pascal}`, `set${pascal}`]);
  return structure.methods.filter((method) => names.has(method.name));
}

export function removeAccessors(
  doc: SourceDocument,
  structure: SourceStructure,
  lines: readonly string[],
  fieldName: string
): number {
  const accessors = findAccessors(structure, fieldName);
  for (const accessor of accessors) {
    const { start, end } = methodRange(lines, accessor);
    removeLines(doc, start, end);
  }
  return accessors.length;
}

/** Id of the closing brace of the top-level class */
export function classEndId(doc: SourceDocument, lines: readonly string[]): LineId | undefined {
  const index = findClassEnd(lines);
  if (index === -1 || !doc.has(index)) return undefined;
  return index;
}

/**
 * Insert a member block before the class's closing brace, separated from the
 * previous member by a blank line.
 */
export function insertBeforeClassEnd(doc: SourceDocument, closingBrace: LineId, block: string[]): void {
  const previous = doc.previous(closingBrace);
  const needsSpacer = previous !== undefined && doc.text(previous).trim() !== '' && !doc.text(previous).trim().endsWith('{');
  doc.insertBefore(closingBrace, needsSpacer ? ['', ...block] : block);
}

/** Remove a field's annotations whose simple name is in `names` */
export function removeAnnotations(doc: SourceDocument, field: FieldInfo, names: readonly string[]): void {
  const pattern = new RegExp(`^@(?:[\\w.]+\\.)?(?:${names.map(escapeRegex).join('|')})\\b`);
  const doomed = field.annotationLines.filter((id) => doc.has(id) && pattern.test(doc.text(id).trim()));
  doc.remove(doomed);
}

/** Replace the declared type of a field on its declaration line */
export function replaceDeclaredType(doc: SourceDocument, field: FieldInfo, javaType: string): void {
  const declaration = new RegExp(`(^|\\s)${escapeRegex(field.type)}(\\s+${escapeRegex(field.name)}\\b)`);
  doc.replace(field.line, doc.text(field.line).replace(declaration, `$1${javaType}$2`));
}

function splitArguments(args: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inString = false;
  let depth = 0;
  for (const char of args) {
    if (char === '"') inString = !inString;
    if (!inString && char === '(') depth++;
    if (!inString && char === ')') depth--;
    if (char === ',' && !inString && depth === 0) {
      parts.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  if (current.trim() !== '') parts.push(current.trim());
  return parts;
}

/**
 * Set or clear `key = value` pairs in a single-line annotation such as
 * `@Column(name = "x", length = 50)`. `undefined` removes the key.
 */
export function setAnnotationAttributes(line: string, attributes: Record<string, string | undefined>): string {
  const match = line.match(/^(\s*@[\w.]+)\((.*)\)\s*$/);
  if (!match) return line;

  const entries = splitArguments(match[2]).map((part) => {
    const eq = part.indexOf('=');
    return eq === -1 ? { key: 'value', raw: part } : { key: part.slice(0, eq).trim(), raw: part };
  });

  for (const [key, value] of Object.entries(attributes)) {
    const index = entries.findIndex((entry) => entry.key === key);
    if (value === undefined) {
      if (index !== -1) entries.splice(index, 1);
    } else if (index === -1) {
      entries.push({ key, raw: `${key} = ${value}` });
    } else {
      entries[index] = { key, raw: `${key} = ${value}` };
    }
  }

  return `${match[1]}(${entries.map((entry) => entry.raw).join(', ')})`;
}

/** Replace the text of a one-paragraph doc comment; multi-paragraph comments are left alone */
export function replaceDocText(doc: SourceDocument, field: FieldInfo, text: string): boolean {
  const commentLines: LineId[] = [];
  for (let id = field.blockStart; id < field.line; id++) {
    if (doc.has(id)) {
      const trimmed = doc.text(id).trim();
      if (trimmed.startsWith('/**') || trimmed.startsWith('*')) commentLines.push(id);
    }
  }

  if (commentLines.length === 1) {
    const line = doc.text(commentLines[0]);
    doc.replace(commentLines[0], `${indentOf(line)}/** ${text} */`);
    return true;
  }

  const body = commentLines.filter((id) => {
    const trimmed = doc.text(id).trim();
    return trimmed !== '/**' && trimmed !== '*/' && trimmed !== '*';
  });
  if (body.length !== 1) return false;

  const line = doc.text(body[0]);
  doc.replace(body[0], `${indentOf(line)}* ${text}`);
  return true;
}

function isSatisfied(existing: readonly string[], qualifiedName: string): boolean {
  const pkg = qualifiedName.slice(0, qualifiedName.lastIndexOf('.'));
  return existing.includes(qualifiedName) || existing.includes(`${pkg}.*`);
}

/**
 * Add import statements that are not already covered by an explicit or
 * wildcard import. Returns the imports added.
 */
export function ensureImports(doc: SourceDocument, imports: readonly string[]): string[] {
  const existing: string[] = [];
  let lastImport: LineId | undefined;
  let packageLine: LineId | undefined;

  for (const id of doc.ids()) {
    const text = doc.text(id);
    const match = text.match(IMPORT_LINE);
    if (match) {
      existing.push(match[1]);
      lastImport = id;
    } else if (packageLine === undefined && PACKAGE_LINE.test(text)) {
      packageLine = id;
    }
  }

  const missing = Array.from(new Set(imports))
    .filter((name) => !isSatisfied(existing, name))
    .sort();
  if (missing.length === 0) return [];

  const statements = missing.map((name) => `import ${name};`);
  if (lastImport !== undefined) {
    doc.insertAfter(lastImport, statements);
  } else if (packageLine !== undefined) {
    doc.insertAfter(packageLine, ['', ...statements]);
  } else {
    doc.insertBefore(doc.idAt(0), [...statements, '']);
  }

  return missing;
}

export interface JavaSource {
  content: string;
  structure: SourceStructure;
}

/** Java type an update moves a field to, if it changes the type at all */
export function targetJavaType(changes: FieldChanges): string | undefined {
  if (changes.javaType !== undefined) return changes.javaType;
  return changes.type !== undefined ? sqlToJavaType(changes.type) : undefined;
}

/**
 * Anchor for new fields: the last field declaration still in the document,
 * or the class line. Later additions go after earlier ones.
 */
export class FieldInsertionPoint {
  private lastInserted?: LineId;

  constructor(private readonly structure: SourceStructure) {}

  insert(doc: SourceDocument, block: string[]): void {
    const anchor =
      this.lastInserted ??
      [...this.structure.fields]
        .reverse()
        .map((field) => field.line)
        .find((id) => doc.has(id));
    const afterField = anchor !== undefined;
    const lines = afterField ? ['', ...block] : [...block, ''];
    const ids = doc.insertAfter(anchor ?? this.structure.classLine, lines);
    this.lastInserted = afterField ? ids[ids.length - 1] : ids[ids.length - 2];
  }
}

/**
 * Regenerate a field's accessors in place, keeping their position.
 * Returns false when the class has no accessors for the field.
 */
export function regenerateAccessors(
  doc: SourceDocument,
  structure: SourceStructure,
  lines: readonly string[],
  fieldName: string,
  javaType: string,
  description?: string
): boolean {
  const accessors = findAccessors(structure, fieldName);
  if (accessors.length === 0) return false;

  const first = methodRange(lines, accessors[0]);
  const indent = indentOf(lines[accessors[0].line]);
  doc.insertBefore(first.start, [...accessorLines({ name: fieldName, javaType, description }, indent), '']);
  removeAccessors(doc, structure, lines, fieldName);
  return true;
}
