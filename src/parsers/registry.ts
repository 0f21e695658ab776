import * as fs from 'node:fs';
import * as path from 'node:path';
import type { FileExtractResult, StructureExtractor } from './types.js';

/**
 * Registry for structure extractors
 * Manages which extractor handles which file extensions
 */
export class ExtractorRegistry {
  private extractorsByExtension: Map<string, StructureExtractor> = new Map();

  /**
   * Register an extractor
   */
  register(extractor: StructureExtractor): void {
    for (const ext of extractor.extensions) {
      this.extractorsByExtension.set(ext.toLowerCase(), extractor);
    }
  }

  /**
   * Get the appropriate extractor for a file based on its extension
   */
  getForFile(filePath: string): StructureExtractor | undefined {
    const ext = path.extname(filePath).toLowerCase();
    return this.extractorsByExtension.get(ext);
  }

  /**
   * Read a file and extract its structure. Missing or unreadable files are
   * reported as parse errors, never thrown.
   */
  extractFile(filePath: string): FileExtractResult {
    const extractor = this.getForFile(filePath);
    if (!extractor) {
      return { ok: false, error: { kind: 'unreadable', message: `No extractor for ${path.basename(filePath)}` } };
    }
    if (!fs.existsSync(filePath)) {
      return { ok: false, error: { kind: 'not-found', message: `File not found: ${filePath}` } };
    }

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      return { ok: false, error: { kind: 'unreadable', message: `Failed to read ${filePath}: ${error}` } };
    }

    const result = extractor.extractStructure(content);
    return result.ok ? { ok: true, structure: result.structure, content } : result;
  }
}

// Global default registry
export const defaultRegistry = new ExtractorRegistry();
