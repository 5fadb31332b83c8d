/**
 * Interactive confirmation prompt
 */

import { createInterface } from 'node:readline';

/**
 * Interpret a yes/no answer; an empty answer takes the default
 */
export function parseConfirmation(answer: string, defaultValue: boolean): boolean {
  const trimmed = answer.trim().toLowerCase();
  if (trimmed === '') return defaultValue;
  return trimmed === 'y' || trimmed === 'yes';
}

/**
 * Ask a yes/no question on the terminal
 */
export function promptConfirmation(message: string, defaultValue: boolean = false): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const defaultHint = defaultValue ? '[Y/n]' : '[y/N]';

  return new Promise((resolve) => {
    rl.question(`${message} ${defaultHint} `, (answer) => {
      rl.close();
      resolve(parseConfirmation(answer, defaultValue));
    });
  });
}
