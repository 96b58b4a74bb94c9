/**
 * tm-migrate init — Write a starter .tm-migrate/config.json
 *
 * Credentials are never written; they come from ZEPHYR_API_TOKEN and
 * QTEST_API_TOKEN (or QTEST_USERNAME / QTEST_PASSWORD).
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { localConfigPath, saveConfig } from '../config.js';
import { askWithDefault, confirm } from '../cli/prompts.js';

export const DEFAULT_ZEPHYR_URL = 'https://api.zephyrscale.smartbear.com/v2';

export interface InitCommandOptions {
  config?: string;
  projectKey?: string;
  zephyrUrl?: string;
  qtestUrl?: string;
  qtestProject?: string;
  /** Accept defaults without prompting */
  yes?: boolean;
  force?: boolean;
}

export interface StarterConfigInput {
  projectKey: string;
  zephyrUrl: string;
  qtestUrl: string;
  qtestProject: string;
}

/**
 * Raw configuration written by `init`. Every tunable not listed here takes
 * its default when the file is loaded.
 */
export function starterConfig(input: StarterConfigInput): Record<string, unknown> {
  return {
    source: { baseUrl: input.zephyrUrl, projectKey: input.projectKey },
    destination: { baseUrl: input.qtestUrl, projectId: input.qtestProject },
    batchSize: 50,
    maxRollbackRetries: 2,
    mappings: { priorities: {}, statuses: {}, customFields: {} },
  };
}

export async function initCommand(options: InitCommandOptions): Promise<void> {
  console.log();
  console.log(chalk.bold('⚡ tm-migrate: Zephyr Scale → qTest'));
  console.log();

  const path = options.config ? resolve(options.config) : localConfigPath();
  const interactive = !options.yes && process.stdin.isTTY === true;

  if (existsSync(path) && !options.force) {
    const overwrite = interactive && (await confirm(`${path} exists. Overwrite?`));
    if (!overwrite) {
      console.log(chalk.yellow('⚠  Configuration already exists.'));
      console.log(chalk.dim(`   Config: ${path}`));
      return;
    }
  }

  const value = async (question: string, given: string | undefined, fallback: string): Promise<string> => {
    if (given !== undefined) return given;
    return interactive ? askWithDefault(question, fallback) : fallback;
  };

  const input: StarterConfigInput = {
    projectKey: await value('Zephyr project key:', options.projectKey, ''),
    zephyrUrl: await value('Zephyr API URL:', options.zephyrUrl, DEFAULT_ZEPHYR_URL),
    qtestUrl: await value('qTest URL:', options.qtestUrl, 'https://example.qtestnet.com'),
    qtestProject: await value('qTest project ID:', options.qtestProject, ''),
  };

  const spinner = ora('Writing configuration...').start();
  try {
    await saveConfig(starterConfig(input), path);
    spinner.succeed(`Created ${path}`);
  } catch (err) {
    spinner.fail('Failed to write configuration');
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exitCode = 1;
    return;
  }

  console.log();
  console.log(chalk.dim('  Next steps:'));
  console.log(chalk.dim(`  Export ${chalk.white('ZEPHYR_API_TOKEN')} and ${chalk.white('QTEST_API_TOKEN')}`));
  console.log(chalk.dim(`  ${chalk.white('tm-migrate migrate')}        Run the full migration`));
  console.log(chalk.dim(`  ${chalk.white('tm-migrate report')}         Show the latest run`));
  console.log();
}
