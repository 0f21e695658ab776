import * as fs from 'node:fs';
import * as path from 'node:path';
import inquirer from 'inquirer';
import chalk from 'chalk';
import Conf from 'conf';
import { ConfigurationError, resolveConfig, type GlobalDefaults, type ResolvedConfig } from '../core/index.js';

const JAVA_PACKAGE = /^[A-Za-z_]\w*(\.[A-Za-z_]\w*)*$/;

const globalConf = new Conf<GlobalDefaults>({
  projectName: 'layerforge-global',
  configName: 'config',
});

export async function configCommand(): Promise<void> {
  console.log(chalk.green.bold('\n🔧 Layerforge - Global Configuration\n'));

  const current = getGlobalDefaults();

  if (current.projectRoot || current.basePackage) {
    console.log(chalk.gray(`Current project root: ${current.projectRoot ?? '(working directory)'}`));
    console.log(chalk.gray(`Current base package: ${current.basePackage ?? '(default)'}\n`));

    const { action } = await inquirer.prompt<{ action: 'update' | 'clear' | 'cancel' }>([
      {
        type: 'list',
        name: 'action',
        message: 'What would you like to do?',
        choices: [
          { name: 'Update defaults', value: 'update' },
          { name: 'Clear defaults', value: 'clear' },
          { name: 'Cancel', value: 'cancel' },
        ],
      },
    ]);

    if (action === 'cancel') {
      return;
    }

    if (action === 'clear') {
      globalConf.delete('projectRoot');
      globalConf.delete('basePackage');
      console.log(chalk.yellow('\nDefaults cleared.'));
      return;
    }
  }

  const answers = await inquirer.prompt<{ projectRoot: string; basePackage: string }>([
    {
      type: 'input',
      name: 'projectRoot',
      message: 'Default project root (leave empty to use the working directory):',
      default: current.projectRoot ?? '',
      validate: validateProjectRoot,
    },
    {
      type: 'input',
      name: 'basePackage',
      message: 'Java base package:',
      default: current.basePackage ?? 'com.example',
      validate: validateBasePackage,
    },
  ]);

  const projectRoot = answers.projectRoot.trim();
  if (projectRoot) {
    globalConf.set('projectRoot', path.resolve(projectRoot));
  } else {
    globalConf.delete('projectRoot');
  }
  globalConf.set('basePackage', answers.basePackage.trim());

  console.log(chalk.green('\n✓ Defaults saved successfully!'));
  console.log(chalk.gray('\nRun `layerforge modify -o <operations.json>` from any directory.\n'));
}

export function validateProjectRoot(input: string): boolean | string {
  const value = input.trim();
  if (!value) return true;
  if (!fs.existsSync(value) || !fs.statSync(value).isDirectory()) {
    return 'Please enter an existing directory';
  }
  return true;
}

export function validateBasePackage(input: string): boolean | string {
  if (!JAVA_PACKAGE.test(input.trim())) {
    return 'Please enter a dotted Java package name, e.g. com.example';
  }
  return true;
}

export function getGlobalDefaults(): GlobalDefaults {
  // Environment variables win (useful for CI/CD)
  return {
    projectRoot: process.env.LAYERFORGE_PROJECT_ROOT || globalConf.get('projectRoot'),
    basePackage: process.env.LAYERFORGE_BASE_PACKAGE || globalConf.get('basePackage'),
  };
}

/**
 * Resolve configuration for a command, exiting with code 1 when it is invalid
 */
export function loadCommandConfig(configPath?: string): ResolvedConfig {
  try {
    return resolveConfig({ configPath, globalDefaults: getGlobalDefaults() });
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    console.error(chalk.red(`\nConfiguration error: ${error.message}\n`));
    process.exit(1);
  }
}
