export { configCommand, getGlobalDefaults, loadCommandConfig } from './config.js';
export { modifyCommand, type ModifyCommandOptions } from './modify.js';
export { snapshotsListCommand, snapshotsRestoreCommand } from './snapshots.js';
