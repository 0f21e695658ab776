import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { globSync } from 'glob';
import { BUNDLED_TEMPLATES_DIR, type ResolvedConfig } from '../../src/core/config.js';
import { JavaStructureExtractor } from '../../src/parsers/java.js';
import type { JavaSource } from '../../src/refactor/rewriters/java-edits.js';

const FIXTURE_DIR = fileURLToPath(new URL('../fixtures/project-service', import.meta.url));

/** Main source tree of the fixture service */
export const MAIN = 'src/main/java/com/example/project';
export const MIGRATIONS = 'src/main/resources/db/migration';

/** Copy the generated "project" service into a fresh temp directory */
export function createProjectFixture(): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'layerforge-test-'));
  fs.cpSync(FIXTURE_DIR, root, { recursive: true });
  return root;
}

export function fixtureFile(relativePath: string): string {
  return fs.readFileSync(path.join(FIXTURE_DIR, ...relativePath.split('/')), 'utf-8');
}

export function projectConfig(root: string): ResolvedConfig {
  return {
    projectRoot: root,
    basePackage: 'com.example',
    templatesDir: BUNDLED_TEMPLATES_DIR,
    snapshotDir: path.join(root, '.layerforge', 'snapshots'),
  };
}

export function readProjectFile(root: string, relativePath: string): string {
  return fs.readFileSync(path.join(root, ...relativePath.split('/')), 'utf-8');
}

export function writeProjectFile(root: string, relativePath: string, content: string): void {
  const target = path.join(root, ...relativePath.split('/'));
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
}

/** Every file under `src/` keyed by its project-relative path */
export function readSourceTree(root: string): Record<string, string> {
  const files = globSync('src/**/*', { cwd: root, nodir: true, posix: true, dot: true }).sort();
  return Object.fromEntries(files.map((file) => [file, readProjectFile(root, file)]));
}

/** Content and extracted structure of a Java source, failing the test when it has no class */
export function javaSource(content: string): JavaSource {
  const result = new JavaStructureExtractor().extractStructure(content);
  if (!result.ok) throw new Error(result.error.message);
  return { content, structure: result.structure };
}
