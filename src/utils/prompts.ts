/**
 * Prompts
 *
 * Interactive questions on the terminal.
 */

import * as readline from 'readline';

/**
 * Ask for a single line of input
 */
export function promptSingleLine(prompt: string): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    rl.question(prompt, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * Ask for a value, offering a default that an empty answer accepts
 */
export async function ask(message: string, defaultValue?: string): Promise<string> {
  const suffix = defaultValue ? ` [${defaultValue}]` : '';
  const answer = await promptSingleLine(`${message}${suffix}: `);
  return answer === '' ? (defaultValue ?? '') : answer;
}

/**
 * Ask a yes/no question; anything unrecognised means the default
 */
export async function confirm(message: string, defaultYes: boolean = true): Promise<boolean> {
  const answer = await promptSingleLine(defaultYes ? `${message} (Y/n) ` : `${message} (y/N) `);
  const normalized = answer.toLowerCase();

  if (normalized === 'y' || normalized === 'yes') return true;
  if (normalized === 'n' || normalized === 'no') return false;
  return defaultYes;
}
