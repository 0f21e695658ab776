import { splitLines } from './document.js';
import type {
  ExtractResult,
  FieldInfo,
  MethodInfo,
  SourceStructure,
  StructureExtractor,
} from './types.js';

const PACKAGE_PATTERN = /^\s*package\s+([\w.]+)\s*;/m;
const IMPORT_PATTERN = /^\s*import\s+(?:static\s+)?([\w.*]+)\s*;/gm;
const CLASS_PATTERN =
  /^(?:(?:public|protected|private)\s+)?(?:(?:abstract|final|sealed|static)\s+)*(?:class|interface|enum|record)\s+(\w+)/;
const FIELD_PATTERN =
  /^(?:private|protected|public)\s+(?:(?:final|transient|volatile)\s+)*([\w.]+(?:<[^;=()]*>)?(?:\[\])*)\s+(\w+)\s*(?:=[^;]*)?;\s*(?:\/\/.*)?$/;
const METHOD_PATTERN =
  /^(?:public|protected|private)\s+(?:(?:static|final|synchronized|abstract|default)\s+)*(?:<[^>]+>\s+)?([\w.]+(?:<[^()]*?>)?(?:\[\])*)\s+(\w+)\s*\(/;

export function isCommentLine(trimmed: string): boolean {
  return trimmed.startsWith('//') || trimmed.startsWith('*') || trimmed.startsWith('/*');
}

export function isAnnotationLine(trimmed: string): boolean {
  return trimmed.startsWith('@');
}

/**
 * Walk backwards from a declaration collecting its annotations and doc comment.
 * Stops at the first line that is neither blank, an annotation nor a comment.
 */
export function collectLeadingBlock(
  lines: readonly string[],
  declarationIndex: number
): { annotations: string[]; annotationLines: number[]; javadoc: string[]; blockStart: number } {
  const annotations: string[] = [];
  const annotationLines: number[] = [];
  const javadoc: string[] = [];
  let blockStart = declarationIndex;

  let j = declarationIndex - 1;
  while (j >= 0) {
    const trimmed = lines[j].trim();
    if (isAnnotationLine(trimmed)) {
      annotations.unshift(trimmed);
      annotationLines.unshift(j);
      blockStart = j;
    } else if (trimmed !== '') {
      break;
    }
    j--;
  }

  while (j >= 0) {
    const trimmed = lines[j].trim();
    if (isCommentLine(trimmed)) {
      javadoc.unshift(trimmed);
      blockStart = j;
    } else if (trimmed !== '') {
      break;
    }
    j--;
  }

  return { annotations, annotationLines, javadoc, blockStart };
}

function countChar(line: string, char: string): number {
  let count = 0;
  for (const c of line) {
    if (c === char) count++;
  }
  return count;
}

/**
 * Index of the line closing the brace block that opens at or after `startIndex`.
 * Returns `startIndex` when the statement ends before any brace opens
 * (an abstract or interface method).
 */
export function findBlockEnd(lines: readonly string[], startIndex: number): number {
  let depth = 0;
  let opened = false;

  for (let i = startIndex; i < lines.length; i++) {
    const line = lines[i];
    const opens = countChar(line, '{');
    const closes = countChar(line, '}');

    if (!opened && opens === 0 && line.trim().endsWith(';')) {
      return i;
    }

    depth += opens - closes;
    if (opens > 0) opened = true;
    if (opened && depth <= 0) {
      return i;
    }
  }

  return lines.length - 1;
}

/**
 * Brace depth at the start of every line, counted from the class declaration.
 * Members of the top-level class sit at depth 1.
 */
export function braceDepths(lines: readonly string[], classLine: number): number[] {
  const depths = new Array<number>(lines.length).fill(0);
  let depth = 0;
  for (let i = classLine; i < lines.length; i++) {
    depths[i] = depth;
    const trimmed = lines[i].trim();
    if (trimmed.startsWith('//')) continue;
    depth += countChar(lines[i], '{') - countChar(lines[i], '}');
  }
  return depths;
}

/** Index of the class's closing brace (the last line starting with "}") */
export function findClassEnd(lines: readonly string[]): number {
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].trim().startsWith('}')) return i;
  }
  return -1;
}

/**
 * Java structure extractor
 * Uses line-oriented regex matching; not a grammar. Multi-line annotations
 * and deeply nested generics are not guaranteed to be recognized.
 */
export class JavaStructureExtractor implements StructureExtractor {
  readonly name = 'Java';
  readonly extensions = ['.java'];

  extractStructure(content: string): ExtractResult {
    const lines = splitLines(content);
    const classLine = this.findClassLine(lines);

    if (classLine === -1) {
      return { ok: false, error: { kind: 'no-class', message: 'No class or interface declaration found' } };
    }

    const depths = braceDepths(lines, classLine);
    const structure: SourceStructure = {
      packageName: content.match(PACKAGE_PATTERN)?.[1],
      imports: Array.from(content.matchAll(IMPORT_PATTERN), (m) => m[1]),
      className: lines[classLine].trim().match(CLASS_PATTERN)?.[1],
      classLine,
      fields: this.extractFields(lines, classLine, depths),
      methods: this.extractMethods(lines, classLine, depths),
      annotations: this.extractClassAnnotations(lines, classLine),
      lineCount: lines.length,
    };

    return { ok: true, structure };
  }

  private findClassLine(lines: string[]): number {
    for (let i = 0; i < lines.length; i++) {
      const trimmed = lines[i].trim();
      if (isCommentLine(trimmed)) continue;
      if (CLASS_PATTERN.test(trimmed)) return i;
    }
    return -1;
  }

  private extractFields(lines: string[], classLine: number, depths: number[]): FieldInfo[] {
    const fields: FieldInfo[] = [];

    for (let i = classLine + 1; i < lines.length; i++) {
      if (depths[i] !== 1) continue;
      const trimmed = lines[i].trim();
      if (/\bstatic\b/.test(trimmed)) continue;

      const match = trimmed.match(FIELD_PATTERN);
      if (!match) continue;

      const block = collectLeadingBlock(lines, i);
      fields.push({
        name: match[2],
        type: match[1],
        annotations: block.annotations,
        javadoc: block.javadoc,
        line: i,
        annotationLines: block.annotationLines,
        blockStart: block.blockStart,
      });
    }

    return fields;
  }

  private extractMethods(lines: string[], classLine: number, depths: number[]): MethodInfo[] {
    const methods: MethodInfo[] = [];

    for (let i = classLine + 1; i < lines.length; i++) {
      if (depths[i] !== 1) continue;
      const trimmed = lines[i].trim();
      if (isCommentLine(trimmed)) continue;

      const match = trimmed.match(METHOD_PATTERN);
      if (!match) continue;

      methods.push({
        name: match[2],
        returnType: match[1],
        line: i,
        signature: trimmed,
      });
    }

    return methods;
  }

  private extractClassAnnotations(lines: string[], classLine: number): string[] {
    const annotations: string[] = [];
    for (let i = 0; i < classLine; i++) {
      const trimmed = lines[i].trim();
      if (isAnnotationLine(trimmed)) {
        annotations.push(trimmed);
      }
    }
    return annotations;
  }
}
