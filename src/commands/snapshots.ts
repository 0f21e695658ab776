import chalk from 'chalk';
import { createLogger } from '../core/index.js';
import { SnapshotManager, type SnapshotManifest } from '../refactor/index.js';
import { formatDateTime } from '../utils/dates.js';
import { loadCommandConfig } from './config.js';

interface SnapshotsCommandOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

function createManager(options: SnapshotsCommandOptions): SnapshotManager {
  const config = loadCommandConfig(options.config);
  return new SnapshotManager({
    projectRoot: config.projectRoot,
    snapshotDir: config.snapshotDir,
    basePackage: config.basePackage,
    logger: createLogger({ verbose: options.verbose }),
  });
}

export async function snapshotsListCommand(options: SnapshotsCommandOptions = {}): Promise<void> {
  const manager = createManager(options);
  const snapshots = manager.listSnapshots();

  if (options.json) {
    console.log(JSON.stringify(snapshots, null, 2));
    return;
  }

  if (snapshots.length === 0) {
    console.log(chalk.gray('\nNo snapshots found.\n'));
    return;
  }

  console.log(chalk.cyan('\nAvailable snapshots:\n'));
  for (const snapshot of snapshots) {
    displaySnapshot(snapshot);
  }
  console.log('');
}

function displaySnapshot(snapshot: SnapshotManifest): void {
  const date = new Date(snapshot.timestamp);
  console.log(chalk.white(`  ${snapshot.backup_id}`));
  console.log(chalk.gray(`    Service: ${snapshot.service_name}`));
  console.log(chalk.gray(`    Date: ${Number.isNaN(date.getTime()) ? snapshot.timestamp : formatDateTime(date)}`));
  console.log(chalk.gray(`    Paths: ${snapshot.files_backed_up.length}`));
}

export async function snapshotsRestoreCommand(backupId: string, options: SnapshotsCommandOptions = {}): Promise<void> {
  const manager = createManager(options);

  console.log(chalk.cyan(`\nRestoring snapshot ${backupId}...\n`));
  if (manager.restoreSnapshot(backupId)) {
    console.log(chalk.green('Successfully restored from snapshot.'));
    return;
  }

  console.log(chalk.red('Snapshot not found or restore failed.'));
  console.log(chalk.gray('Use `layerforge snapshots list` to see available snapshots.'));
  process.exit(1);
}
