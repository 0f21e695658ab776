#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { configCommand, modifyCommand, snapshotsListCommand, snapshotsRestoreCommand } from './commands/index.js';

const program = new Command();

program
  .name('layerforge')
  .description(
    chalk.green('🔧 Layerforge') +
      ' - Field modification for generated services\n' +
      chalk.gray('Add, update and remove fields across entity, DTOs, service, repository and migrations')
  )
  .version('1.0.0');

program
  .command('modify')
  .description('Apply field operations from a JSON file')
  .requiredOption('-o, --operations <file>', 'Field operations JSON file')
  .option('-c, --config <file>', 'Project configuration file')
  .option('--dry-run', 'Show the impact analysis without changing anything')
  .option('-v, --verbose', 'Verbose output')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .option('--json', 'Output the result as JSON')
  .action(
    async (options: {
      operations: string;
      config?: string;
      dryRun?: boolean;
      verbose?: boolean;
      yes?: boolean;
      json?: boolean;
    }) => {
      await modifyCommand(options);
    }
  );

const snapshots = program.command('snapshots').description('Manage snapshots taken before modifications');

snapshots
  .command('list')
  .description('List available snapshots, newest first')
  .option('-c, --config <file>', 'Project configuration file')
  .option('--json', 'Output as JSON')
  .action(async (options: { config?: string; json?: boolean }) => {
    await snapshotsListCommand(options);
  });

snapshots
  .command('restore <id>')
  .description('Restore the service tree from a snapshot')
  .option('-c, --config <file>', 'Project configuration file')
  .option('-v, --verbose', 'Verbose output')
  .action(async (id: string, options: { config?: string; verbose?: boolean }) => {
    await snapshotsRestoreCommand(id, options);
  });

program
  .command('config')
  .description('⚙️  Set default project root and base package')
  .action(async () => {
    await configCommand();
  });

program.addHelpText(
  'after',
  `
${chalk.green.bold('Get Started:')}
  ${chalk.white('$')} layerforge modify -o ops.json --dry-run  ${chalk.gray('# 1. Preview the impact')}
  ${chalk.white('$')} layerforge modify -o ops.json            ${chalk.gray('# 2. Apply with confirmation')}
  ${chalk.white('$')} layerforge snapshots list                ${chalk.gray('# 3. See what can be restored')}
`
);

// Handle unknown commands
program.on('command:*', () => {
  console.error(chalk.red(`\nUnknown command: ${program.args.join(' ')}`));
  console.log(chalk.gray(`Run ${chalk.white('layerforge --help')} for usage.\n`));
  process.exit(1);
});

await program.parseAsync();
