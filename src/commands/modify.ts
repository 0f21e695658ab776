/**
 * modify command - Apply field operations to a generated service
 *
 * Shows the impact of a request, asks for confirmation, snapshots the
 * service and rewrites its files, rolling back if any step fails.
 */

import * as path from 'node:path';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { createLogger } from '../core/index.js';
import {
  OperationApplier,
  colorize,
  createInteractiveGate,
  renderImpactAnalysis,
  type ConfirmationGate,
  type ModifyResult,
  type ProgressCallback,
} from '../refactor/index.js';
import { loadCommandConfig } from './config.js';

export interface ModifyCommandOptions {
  operations: string;
  config?: string;
  dryRun?: boolean;
  verbose?: boolean;
  yes?: boolean;
  json?: boolean;
}

export async function modifyCommand(options: ModifyCommandOptions): Promise<void> {
  const config = loadCommandConfig(options.config);
  const logger = createLogger({ verbose: options.verbose, sink: options.json ? () => {} : undefined });

  const progress = { spinner: null as Ora | null, phase: '' };

  const phaseLabels: Record<string, string> = {
    validation: 'Validating request',
    analysis: 'Analyzing impact',
    safety: 'Running safety checks',
    snapshot: 'Creating snapshot',
    migration: 'Generating migration',
    rewrite: 'Updating service files',
    rollback: 'Rolling back changes',
    done: 'Done',
  };

  const onProgress: ProgressCallback = (phase, message, current, total) => {
    if (options.json) return;

    if (phase !== progress.phase) {
      if (progress.spinner) {
        progress.spinner.succeed();
      }
      progress.phase = phase;

      const label = phaseLabels[phase] || message;
      progress.spinner = phase !== 'done' ? ora(label).start() : null;
    } else if (progress.spinner) {
      if (current !== undefined && total !== undefined) {
        progress.spinner.text = `${message} (${current}/${total})`;
      } else {
        progress.spinner.text = message;
      }
    }
  };

  // The prompt needs the terminal to itself; JSON output leaves no room for it
  const interactive = createInteractiveGate();
  const gate: ConfirmationGate = (analysis, context) => {
    if (options.json) {
      return Promise.reject(new Error('--json needs --yes to skip the prompt'));
    }
    progress.spinner?.stop();
    progress.spinner = null;
    return interactive(analysis, context);
  };

  const applier = new OperationApplier({ config, logger, gate, onProgress });

  let result: ModifyResult;
  try {
    result = await applier.processFile(path.resolve(options.operations), {
      dryRun: options.dryRun || undefined,
      autoConfirm: options.yes || undefined,
    });
  } catch (error) {
    if (progress.spinner) {
      progress.spinner.fail('Field modification failed');
    } else {
      console.log(chalk.red('Field modification failed'));
    }
    console.error(chalk.red(`\nError: ${error}\n`));
    process.exit(1);
  }

  if (progress.spinner) {
    if (result.success) {
      progress.spinner.succeed();
    } else {
      progress.spinner.fail();
    }
    progress.spinner = null;
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    displayResult(result);
  }

  if (!result.success) {
    process.exit(1);
  }
}

function displayResult(result: ModifyResult): void {
  if (result.outcome === 'dry-run' && result.analysis) {
    console.log('');
    for (const line of renderImpactAnalysis(result.analysis)) {
      console.log(colorize(line));
    }
    console.log(chalk.gray('\nDry run - no changes made.\n'));
    return;
  }

  if (!result.success) {
    console.log(chalk.red(`\nField modification failed (${result.outcome}):\n`));
    for (const error of result.errors) {
      console.log(chalk.red(`  - ${error}`));
    }
    displayList('Warnings:', result.warnings, chalk.yellow);
    if (result.outcome === 'rolled-back' && result.backupId) {
      console.log(chalk.gray(`\nProject restored from snapshot ${result.backupId}.\n`));
    }
    return;
  }

  console.log(chalk.green.bold('\n✓ Field modification complete\n'));
  if (result.migrationFile) {
    console.log(chalk.white(`  Migration: ${chalk.cyan(result.migrationFile)}`));
  }
  console.log(chalk.white(`  Files changed: ${chalk.cyan(String(result.changedFiles.length))}`));
  for (const file of result.changedFiles) {
    console.log(chalk.gray(`    ${file}`));
  }
  if (result.backupId) {
    console.log(chalk.white(`  Snapshot: ${chalk.cyan(result.backupId)}`));
  }

  displayList('Warnings:', result.warnings, chalk.yellow);
  displayList('Review manually:', result.notes, chalk.gray);

  if (result.backupId) {
    console.log(chalk.gray(`\nUndo with: layerforge snapshots restore ${result.backupId}\n`));
  }
}

function displayList(title: string, items: readonly string[], color: (text: string) => string): void {
  if (items.length === 0) return;
  console.log(chalk.white.bold(`\n${title}`));
  for (const item of items) {
    console.log(color(`  - ${item}`));
  }
}
