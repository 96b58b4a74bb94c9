/**
 * Interactive Prompts
 *
 * Line-based prompts on native readline.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';

/**
 * Ask a simple question
 */
export async function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(chalk.cyan(question), (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * Ask with a default used for an empty answer
 */
export async function askWithDefault(question: string, defaultValue: string): Promise<string> {
  const hint = defaultValue ? ` ${chalk.dim(`(${defaultValue})`)}` : '';
  const answer = await ask(`${question}${hint} `);
  return answer || defaultValue;
}

/**
 * Ask for confirmation (yes/no)
 */
export async function confirm(message: string, defaultValue = false): Promise<boolean> {
  const hint = defaultValue ? '(Y/n)' : '(y/N)';
  const answer = await ask(`${message} ${chalk.dim(hint)} `);

  if (answer === '') {
    return defaultValue;
  }

  return answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes';
}
