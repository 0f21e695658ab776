// Core exports
export {
  loadProjectConfig,
  loadConfigFile,
  resolveConfig,
  ProjectConfigSchema,
  CONFIG_FILES,
  DEFAULT_BASE_PACKAGE,
  BUNDLED_TEMPLATES_DIR,
} from './config.js';
export type { ProjectConfig, ResolvedConfig, GlobalDefaults, ResolveConfigOptions, LoadedProjectConfig } from './config.js';
export { createLogger, createMemoryLogger } from './logger.js';
export type { Logger, LogLevel, LogSink, LoggerOptions } from './logger.js';
export * from './errors.js';
