/**
 * service rewriting - Validation checks and entity/DTO mappings in the service class
 */

import { SourceDocument, type LineId } from '../../parsers/document.js';
import { findBlockEnd } from '../../parsers/java.js';
import type { MethodInfo, SourceStructure } from '../../parsers/types.js';
import { escapeRegex, toCamelCase, toPascalCase, toTitle } from '../../utils/naming.js';
import type { FieldOperation, RewriteResult, ServiceInfo } from '../types.js';
import { INDENT } from './field-code.js';
import { ensureImports, indentOf, targetJavaType, type JavaSource } from './java-edits.js';

const VALIDATE_METHODS = ['validateCreateRequest', 'validateUpdateRequest'];
const STRING_UTILS = 'org.springframework.util.StringUtils';

interface MethodBody {
  method: MethodInfo;
  /** Line of the closing brace */
  end: number;
  /** Where statements are appended: before a trailing return, else before the closing brace */
  insertAt: LineId;
  indent: string;
}

function locate(lines: readonly string[], method: MethodInfo): MethodBody {
  const end = findBlockEnd(lines, method.line);
  let insertAt: LineId = end;
  for (let i = end - 1; i > method.line; i--) {
    const trimmed = lines[i].trim();
    if (trimmed === '') continue;
    if (trimmed.startsWith('return ')) insertAt = i;
    break;
  }
  return { method, end, insertAt, indent: indentOf(lines[method.line]) + INDENT };
}

function parameterName(signature: string, type: string): string | undefined {
  return signature.match(new RegExp(`\\b${escapeRegex(type)}\\s+(\\w+)\\s*[,)]`))?.[1];
}

function localName(lines: readonly string[], body: MethodBody, type: string): string | undefined {
  const declaration = new RegExp(`\\b${escapeRegex(type)}\\s+(\\w+)\\s*=\\s*new\\b`);
  for (let i = body.method.line + 1; i < body.end; i++) {
    const match = lines[i].match(declaration);
    if (match) return match[1];
  }
  return undefined;
}

function requiredCheck(indent: string, requestVar: string, fieldName: string, javaType: string | undefined): string[] {
  const getter = `${requestVar}.get${toPascalCase(fieldName)}()`;
  const condition = javaType === 'String' ? `!StringUtils.hasText(${getter})` : `${getter} == null`;
  return [
    `${indent}if (${condition}) {`,
    `${indent}${INDENT}throw new BusinessException("${toTitle(fieldName)} is required");`,
    `${indent}}`,
  ];
}

/**
 * Range of the statement starting at `index`: a whole brace block when the
 * line opens one, otherwise up to the line ending the statement.
 */
function statementRange(lines: readonly string[], index: number): { start: number; end: number } {
  const line = lines[index];
  const opens = (line.match(/\{/g) ?? []).length;
  const closes = (line.match(/\}/g) ?? []).length;
  if (opens > closes) {
    return { start: index, end: findBlockEnd(lines, index) };
  }
  let end = index;
  while (end < lines.length - 1 && !/[;{}]\s*(?:\/\/.*)?$/.test(lines[end].trim())) {
    end++;
  }
  return { start: index, end };
}

export class ServiceRewriter {
  private readonly lines: string[];
  private readonly doc: SourceDocument;
  private readonly notes: string[] = [];
  private readonly imports: string[] = [];
  private readonly removed = new Set<number>();
  private readonly label: string;

  constructor(
    private readonly source: JavaSource,
    private readonly service: ServiceInfo
  ) {
    this.doc = SourceDocument.fromContent(source.content);
    this.lines = this.doc.lines();
    this.label = source.structure.className ?? `${service.entity}Service`;
  }

  private get structure(): SourceStructure {
    return this.source.structure;
  }

  private body(name: string): MethodBody | undefined {
    const method = this.structure.methods.find((m) => m.name === name);
    return method ? locate(this.lines, method) : undefined;
  }

  private requestVar(body: MethodBody): string {
    return parameterName(body.method.signature, `${this.service.entity}Request`) ?? 'request';
  }

  private entityVar(body: MethodBody): string {
    const entity = this.service.entity;
    return (
      localName(this.lines, body, entity) ??
      parameterName(body.method.signature, entity) ??
      entity.charAt(0).toLowerCase() + entity.slice(1)
    );
  }

  private append(body: MethodBody, statements: string[]): void {
    const anchor = this.doc.has(body.insertAt) ? body.insertAt : body.end;
    if (!this.doc.has(anchor)) {
      this.notes.push(`${this.label}: could not place "${statements.join(' ').trim()}" in ${body.method.name}`);
      return;
    }
    this.doc.insertBefore(anchor, statements);
  }

  apply(operations: readonly FieldOperation[]): RewriteResult {
    for (const operation of operations) {
      switch (operation.action) {
        case 'add': {
          const { field } = operation;
          if (field.validation?.required) {
            this.addRequiredChecks(field.name, field.javaType);
          }
          this.addMappings(field.name, field.autoGenerated === true);
          break;
        }
        case 'remove':
          this.removeReferences(operation.fieldName);
          break;
        case 'update': {
          const { fieldName, changes } = operation;
          const required = changes.validation?.required;
          if (required === true) {
            this.addRequiredChecks(fieldName, targetJavaType(changes), true);
          } else if (required === false) {
            this.removeRequiredChecks(fieldName);
          }
          if (changes.type !== undefined || changes.javaType !== undefined) {
            this.notes.push(`${this.label}: review conversions of ${toCamelCase(fieldName)} after its type change`);
          }
          break;
        }
      }
    }

    ensureImports(this.doc, this.imports);
    return { content: this.doc.toString(), changed: this.doc.changed, notes: this.notes };
  }

  private hasCheck(body: MethodBody, fieldName: string): boolean {
    const getter = `get${toPascalCase(fieldName)}()`;
    for (let i = body.method.line + 1; i < body.end; i++) {
      if (this.lines[i].includes(getter) && /\bif\s*\(/.test(this.lines[i])) return true;
    }
    return false;
  }

  private addRequiredChecks(fieldName: string, javaType: string | undefined, skipExisting = false): void {
    const bodies = VALIDATE_METHODS.map((name) => this.body(name)).filter((b): b is MethodBody => b !== undefined);
    if (bodies.length === 0) {
      this.notes.push(`${this.label}: no request validation method found, add the ${toTitle(fieldName)} check by hand`);
      return;
    }

    for (const body of bodies) {
      if (skipExisting && this.hasCheck(body, fieldName)) continue;
      this.append(
        { ...body, insertAt: body.end },
        requiredCheck(body.indent, this.requestVar(body), fieldName, javaType)
      );
    }
    if (javaType === 'String') this.imports.push(STRING_UTILS);
  }

  private removeRequiredChecks(fieldName: string): void {
    const getter = `get${toPascalCase(fieldName)}()`;
    for (const name of VALIDATE_METHODS) {
      const body = this.body(name);
      if (!body) continue;
      for (let i = body.method.line + 1; i < body.end; i++) {
        if (this.removed.has(i)) continue;
        const line = this.lines[i];
        if (!line.includes(getter) || !/\bif\s*\(/.test(line) || line.trim().startsWith('}')) continue;
        const range = statementRange(this.lines, i);
        this.removeRange(range.start, range.end);
      }
    }
  }

  private addMappings(fieldName: string, autoGenerated: boolean): void {
    const pascal = toPascalCase(fieldName);
    const entity = this.service.entity;

    if (!autoGenerated) {
      for (const name of ['createEntityFromRequest', 'updateEntityFromRequest', `mapRequestTo${entity}`]) {
        const body = this.body(name);
        if (!body) continue;
        const target = this.entityVar(body);
        this.append(body, [`${body.indent}${target}.set${pascal}(${this.requestVar(body)}.get${pascal}());`]);
      }
    }

    const convert = this.body('convertToResponse');
    if (convert) {
      const response = localName(this.lines, convert, `${entity}Response`) ?? 'response';
      const from = parameterName(convert.method.signature, entity) ?? this.entityVar(convert);
      this.append(convert, [`${convert.indent}${response}.set${pascal}(${from}.get${pascal}());`]);
    } else {
      this.notes.push(`${this.label}: no convertToResponse method found, map ${toCamelCase(fieldName)} by hand`);
    }
  }

  /** Drop every statement that reads or writes the field's accessors */
  private removeReferences(fieldName: string): void {
    const pascal = toPascalCase(fieldName);
    const reference = new RegExp(`\\b(?:get|set|is)${escapeRegex(pascal)}\\(`);

    for (let i = this.structure.classLine + 1; i < this.lines.length; i++) {
      if (this.removed.has(i)) continue;
      const line = this.lines[i];
      if (!reference.test(line)) continue;

      if (line.trim().startsWith('}')) {
        this.notes.push(`${this.label}: line ${i + 1} references ${toCamelCase(fieldName)}, remove it by hand`);
        continue;
      }
      const range = statementRange(this.lines, i);
      this.removeRange(range.start, range.end);
    }
  }

  private removeRange(start: number, end: number): void {
    const ids: number[] = [];
    for (let i = start; i <= end; i++) {
      this.removed.add(i);
      ids.push(i);
    }
    this.doc.remove(ids);
  }
}

export function rewriteService(
  source: JavaSource,
  operations: readonly FieldOperation[],
  service: ServiceInfo
): RewriteResult {
  return new ServiceRewriter(source, service).apply(operations);
}
