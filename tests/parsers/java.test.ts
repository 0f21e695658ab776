import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { JavaStructureExtractor, findBlockEnd, findClassEnd, braceDepths } from '../../src/parsers/java.js';
import { ExtractorRegistry, defaultRegistry } from '../../src/parsers/index.js';
import type { SourceStructure } from '../../src/parsers/types.js';
import { MAIN, fixtureFile } from '../helpers/project.js';

const extractor = new JavaStructureExtractor();

function extract(content: string): SourceStructure {
  const result = extractor.extractStructure(content);
  if (!result.ok) throw new Error(result.error.message);
  return result.structure;
}

describe('JavaStructureExtractor', () => {
  describe('generated entity', () => {
    const structure = extract(fixtureFile(`${MAIN}/model/Project.java`));

    it('reads package, imports and class', () => {
      expect(structure.packageName).toBe('com.example.project.model');
      expect(structure.imports).toHaveLength(8);
      expect(structure.imports[0]).toBe('jakarta.persistence.Column');
      expect(structure.className).toBe('Project');
      expect(structure.classLine).toBe(16);
      expect(structure.annotations).toEqual(['@Entity', '@Table(name = "projects")']);
    });

    it('collects fields with their annotations and doc comments', () => {
      expect(structure.fields.map((f) => f.name)).toEqual(['id', 'title', 'legacyCode']);

      const [id, title] = structure.fields;
      expect(id).toEqual({
        name: 'id',
        type: 'Long',
        annotations: ['@Id', '@GeneratedValue(strategy = GenerationType.IDENTITY)', '@Column(name = "id")'],
        javadoc: ['/**', '* Unique identifier', '*/'],
        line: 24,
        annotationLines: [21, 22, 23],
        blockStart: 18,
      });
      expect(title.line).toBe(32);
      expect(title.blockStart).toBe(26);
      expect(title.annotationLines).toEqual([29, 30, 31]);
    });

    it('collects methods', () => {
      expect(structure.methods.map((m) => m.name)).toEqual([
        'getId',
        'setId',
        'getTitle',
        'setTitle',
        'getLegacyCode',
        'setLegacyCode',
      ]);
      expect(structure.methods[0]).toEqual({
        name: 'getId',
        returnType: 'Long',
        line: 45,
        signature: 'public Long getId() {',
      });
    });
  });

  it('skips static members and members of nested classes', () => {
    const structure = extract(
      [
        'public class Holder {',
        '    private static final String PREFIX = "x";',
        '    private List<String> tags = new ArrayList<>();',
        '',
        '    public static class Inner {',
        '        private String hidden;',
        '        public String getHidden() {',
        '            return hidden;',
        '        }',
        '    }',
        '}',
      ].join('\n')
    );

    expect(structure.fields.map((f) => [f.name, f.type])).toEqual([['tags', 'List<String>']]);
    expect(structure.methods).toEqual([]);
  });

  it('ignores commented-out methods', () => {
    const structure = extract(
      ['public class Notes {', '    // public String getOld() {', '    public String getNew() {', '        return "";', '    }', '}'].join(
        '\n'
      )
    );
    expect(structure.methods.map((m) => m.name)).toEqual(['getNew']);
  });

  it('reports sources without a class', () => {
    const result = extractor.extractStructure('package com.example;\n');
    expect(result).toEqual({
      ok: false,
      error: { kind: 'no-class', message: 'No class or interface declaration found' },
    });
  });
});

describe('brace helpers', () => {
  const lines = [
    'public class A {',
    '    void run() {',
    '        if (x) {',
    '            go();',
    '        }',
    '    }',
    '    abstract void stop();',
    '}',
  ];

  it('finds the end of a block', () => {
    expect(findBlockEnd(lines, 1)).toBe(5);
    expect(findBlockEnd(lines, 2)).toBe(4);
  });

  it('returns the start line for statements without a body', () => {
    expect(findBlockEnd(lines, 6)).toBe(6);
  });

  it('finds the class closing brace', () => {
    expect(findClassEnd(lines)).toBe(7);
  });

  it('computes member depths from the class line', () => {
    expect(braceDepths(lines, 0)).toEqual([0, 1, 2, 3, 3, 2, 1, 1]);
  });
});

describe('ExtractorRegistry', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'layerforge-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('registers the Java extractor by default', () => {
    expect(defaultRegistry.getForFile('src/Project.java')?.name).toBe('Java');
    expect(defaultRegistry.getForFile('README.md')).toBeUndefined();
  });

  it('extracts a file and returns its content', () => {
    const file = path.join(tempDir, 'Thing.java');
    fs.writeFileSync(file, 'public class Thing {\n    private String name;\n}\n');

    const result = defaultRegistry.extractFile(file);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.content).toBe('public class Thing {\n    private String name;\n}\n');
      expect(result.structure.fields.map((f) => f.name)).toEqual(['name']);
    }
  });

  it('reports missing files as not-found', () => {
    const result = defaultRegistry.extractFile(path.join(tempDir, 'Missing.java'));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('not-found');
  });

  it('reports unsupported extensions as unreadable', () => {
    const registry = new ExtractorRegistry();
    const result = registry.extractFile(path.join(tempDir, 'notes.txt'));
    expect(result).toEqual({ ok: false, error: { kind: 'unreadable', message: 'No extractor for notes.txt' } });
  });
});
