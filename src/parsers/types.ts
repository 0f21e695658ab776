/**
 * Types for heuristic structural extraction of generated source files
 */

/** A field declaration with the annotation and doc-comment lines above it */
export interface FieldInfo {
  name: string;
  /** Declared type, e.g. "String" or "List<String>" */
  type: string;
  /** Annotation lines, trimmed, in source order */
  annotations: string[];
  /** Doc-comment lines, trimmed, in source order */
  javadoc: string[];
  /** 0-based line of the declaration */
  line: number;
  /** 0-based lines holding the annotations */
  annotationLines: number[];
  /** 0-based first line of the block (doc comment, annotations or declaration) */
  blockStart: number;
}

export interface MethodInfo {
  name: string;
  returnType: string;
  /** 0-based line of the signature */
  line: number;
  signature: string;
}

/** Structural view of one source file */
export interface SourceStructure {
  packageName?: string;
  imports: string[];
  className?: string;
  /** 0-based line of the class/interface declaration, -1 if none */
  classLine: number;
  fields: FieldInfo[];
  methods: MethodInfo[];
  /** Class-level annotations, trimmed */
  annotations: string[];
  lineCount: number;
}

export type ParseErrorKind = 'not-found' | 'unreadable' | 'no-class';

export interface ParseError {
  kind: ParseErrorKind;
  message: string;
}

export type ExtractResult =
  | { ok: true; structure: SourceStructure }
  | { ok: false; error: ParseError };

/** Extraction of a file on disk; carries the content it was read from */
export type FileExtractResult =
  | { ok: true; structure: SourceStructure; content: string }
  | { ok: false; error: ParseError };

/**
 * Interface that every structure extractor implements.
 * The Java extractor is pattern based; a grammar-based one can replace it
 * without changing callers.
 */
export interface StructureExtractor {
  /** Human-readable name */
  readonly name: string;

  /** File extensions this extractor handles (e.g. ['.java']) */
  readonly extensions: string[];

  extractStructure(content: string): ExtractResult;
}
