import { createInterface } from 'node:readline/promises';
import type { ConfirmCallback } from '../../core/pipeline.js';
import { formatConfirmationMessage } from '../../core/safety.js';

export function isAffirmative(answer: string): boolean {
  return /^(y|yes)$/i.test(answer.trim());
}

export async function askYesNo(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return isAffirmative(await rl.question(`${question} [y/N] `));
  } finally {
    rl.close();
  }
}

/**
 * Confirmation for warn verdicts. `--yes` accepts; a non-interactive stdin
 * declines.
 */
export function createConfirm(assumeYes: boolean): ConfirmCallback {
  return async (verdict) => {
    console.log(formatConfirmationMessage(verdict));
    if (assumeYes) return true;
    if (!process.stdin.isTTY) {
      console.log('Not a terminal; pass --yes to accept warnings.');
      return false;
    }
    return askYesNo('Proceed?');
  };
}
