import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const JAVA_PACKAGE = /^[A-Za-z_]\w*(\.[A-Za-z_]\w*)*$/;

export const ProjectConfigSchema = z.object({
  // Root of the generated backend project
  projectRoot: z.string().min(1).optional(),

  // Java base package, e.g. "com.example"
  basePackage: z.string().regex(JAVA_PACKAGE, 'must be a dotted Java package name').optional(),

  // Directory holding field_operations/*.hbs templates
  templatesDir: z.string().min(1).optional(),

  // Where snapshots are written (defaults to <projectRoot>/.layerforge/snapshots)
  snapshotDir: z.string().min(1).optional(),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/** Defaults stored in the user's global configuration */
export interface GlobalDefaults {
  projectRoot?: string;
  basePackage?: string;
}

export interface ResolvedConfig {
  projectRoot: string;
  basePackage: string;
  templatesDir: string;
  snapshotDir: string;
  /** Config file the values came from, if any */
  configFile?: string;
}

export const CONFIG_FILES = ['.layerforgerc', '.layerforgerc.json', 'layerforge.config.json'];

export const DEFAULT_BASE_PACKAGE = 'com.example';

export const BUNDLED_TEMPLATES_DIR = fileURLToPath(new URL('../../templates', import.meta.url));

export interface LoadedProjectConfig {
  config: ProjectConfig;
  filePath?: string;
}

function parseConfig(raw: unknown, source: string): ProjectConfig {
  const result = ProjectConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `'${issue.path.join('.')}' ` : '';
    throw new ConfigurationError(`Invalid configuration in ${source}: ${where}${issue.message}`);
  }
  return resolveRelativePaths(result.data, path.dirname(source));
}

function resolveRelativePaths(config: ProjectConfig, baseDir: string): ProjectConfig {
  const resolved: ProjectConfig = { ...config };
  if (config.projectRoot) resolved.projectRoot = path.resolve(baseDir, config.projectRoot);
  if (config.templatesDir) resolved.templatesDir = path.resolve(baseDir, config.templatesDir);
  if (config.snapshotDir) resolved.snapshotDir = path.resolve(baseDir, config.snapshotDir);
  return resolved;
}

function readJson(filePath: string): unknown {
  const content = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${filePath}: ${error}`, { cause: error });
  }
}

/**
 * Load an explicitly named configuration file
 */
export function loadConfigFile(filePath: string): ProjectConfig {
  const absolute = path.resolve(filePath);
  if (!fs.existsSync(absolute)) {
    throw new ConfigurationError(`Configuration file not found: ${absolute}`);
  }
  return parseConfig(readJson(absolute), absolute);
}

/**
 * Discover project configuration in a directory
 */
export function loadProjectConfig(rootDir: string): LoadedProjectConfig {
  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(rootDir, configFile);
    if (fs.existsSync(configPath)) {
      return { config: parseConfig(readJson(configPath), configPath), filePath: configPath };
    }
  }

  // Also check package.json for "layerforge" key
  const pkgPath = path.join(rootDir, 'package.json');
  if (fs.existsSync(pkgPath)) {
    const pkg = readJson(pkgPath);
    if (typeof pkg === 'object' && pkg !== null && 'layerforge' in pkg) {
      return { config: parseConfig(pkg.layerforge, pkgPath), filePath: pkgPath };
    }
  }

  return { config: {} };
}

export interface ResolveConfigOptions {
  configPath?: string;
  cwd?: string;
  globalDefaults?: GlobalDefaults;
}

/**
 * Merge explicit file, discovered project config, global defaults and built-ins.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): ResolvedConfig {
  const cwd = options.cwd ?? process.cwd();

  let loaded: LoadedProjectConfig;
  if (options.configPath) {
    const filePath = path.resolve(cwd, options.configPath);
    loaded = { config: loadConfigFile(filePath), filePath };
  } else {
    loaded = loadProjectConfig(cwd);
  }

  const { config } = loaded;
  const globals = options.globalDefaults ?? {};

  const projectRoot = config.projectRoot ?? globals.projectRoot ?? cwd;
  if (!fs.existsSync(projectRoot) || !fs.statSync(projectRoot).isDirectory()) {
    throw new ConfigurationError(`Project root doesn't exist: ${projectRoot}`);
  }

  const basePackage = config.basePackage ?? globals.basePackage ?? DEFAULT_BASE_PACKAGE;
  if (!JAVA_PACKAGE.test(basePackage)) {
    throw new ConfigurationError(`Invalid base package: ${basePackage}`);
  }

  return {
    projectRoot,
    basePackage,
    templatesDir: config.templatesDir ?? BUNDLED_TEMPLATES_DIR,
    snapshotDir: config.snapshotDir ?? path.join(projectRoot, '.layerforge', 'snapshots'),
    configFile: loaded.filePath,
  };
}
