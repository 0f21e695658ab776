/**
 * confirmation - Show the impact of a request and ask whether to go ahead
 */

import chalk from 'chalk';
import inquirer from 'inquirer';
import { describeUsage } from './dependencies.js';
import type { ConfirmationContext, ConfirmationGate, ImpactAnalysis } from '../types.js';

type ConfirmChoice = 'yes' | 'no' | 'details';

const RULE = '='.repeat(60);

/** Lines of the impact report, uncoloured */
export function renderImpactAnalysis(analysis: ImpactAnalysis): string[] {
  const lines: string[] = [
    RULE,
    'FIELD MODIFICATION IMPACT ANALYSIS',
    RULE,
    `Service: ${analysis.serviceName}`,
    `Table: ${analysis.tableName}`,
    `Operations: ${analysis.operationsCount}`,
  ];

  if (analysis.migrationChanges.length > 0) {
    lines.push('', `DATABASE CHANGES (${analysis.migrationChanges.length}):`);
    for (const change of analysis.migrationChanges) {
      lines.push(`  • ${change.kind}: ${change.fieldName}`, `    SQL: ${change.statement}`);
    }
  }

  if (analysis.dependentFiles.length > 0) {
    lines.push('', `FILES TO MODIFY (${analysis.dependentFiles.length}):`);
    lines.push(...analysis.dependentFiles.map((file) => `  • ${file}`));
  }

  if (analysis.risks.length > 0) {
    lines.push('', `POTENTIAL RISKS (${analysis.risks.length}):`);
    lines.push(...analysis.risks.map((risk) => `  • ${risk}`));
  }

  if (analysis.breakingChanges.length > 0) {
    lines.push('', `BREAKING CHANGES (${analysis.breakingChanges.length}):`);
    lines.push(...analysis.breakingChanges.map((change) => `  • ${change}`));
  }

  lines.push(RULE);
  return lines;
}

export function renderDetailedAnalysis(analysis: ImpactAnalysis, context: ConfirmationContext): string[] {
  const lines: string[] = ['', 'DETAILED ANALYSIS:'];

  if (analysis.validationResults.length > 0) {
    lines.push('', 'Validation Results:');
    lines.push(...analysis.validationResults.map((result) => `  • ${result}`));
  }

  const impacts = context.usages.flatMap(describeUsage);
  if (impacts.length > 0) {
    lines.push('', 'Dependency Impacts:');
    lines.push(...impacts.map((impact) => `  • ${impact}`));
  }

  return lines;
}

/** Report line with headings and rules highlighted */
export function colorize(line: string): string {
  if (line === RULE) return chalk.cyan(line);
  if (/^[A-Z][A-Z ]+(\(\d+\))?:?$/.test(line)) return chalk.white.bold(line);
  if (line.startsWith('    SQL:')) return chalk.gray(line);
  return line;
}

/**
 * Confirmation gate backed by an inquirer list prompt. Keeps asking until the
 * answer is yes or no; "show details" prints the detailed view and asks again.
 */
export function createInteractiveGate(print: (line: string) => void = console.log): ConfirmationGate {
  return async (analysis, context) => {
    for (const line of renderImpactAnalysis(analysis)) {
      print(colorize(line));
    }

    if (context.destructive) {
      print(chalk.red.bold('\nWARNING: This operation includes potentially destructive changes!'));
      print(chalk.red('   Make sure you have a backup before proceeding.'));
    }

    print(chalk.white(`\nThis will modify ${analysis.dependentFiles.length} files`));
    print(chalk.gray('   A snapshot will be created automatically before any changes.'));

    for (;;) {
      const { choice } = await inquirer.prompt<{ choice: ConfirmChoice }>([
        {
          type: 'list',
          name: 'choice',
          message: 'Do you want to proceed?',
          choices: [
            { name: 'Yes', value: 'yes' },
            { name: 'No', value: 'no' },
            { name: 'Show details', value: 'details' },
          ],
        },
      ]);

      if (choice === 'yes') return true;
      if (choice === 'no') return false;

      for (const line of renderDetailedAnalysis(analysis, context)) {
        print(colorize(line));
      }
    }
  };
}
