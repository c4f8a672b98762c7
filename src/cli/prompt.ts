import readline from 'readline';

import type { ConnectionDefinition } from '../connections/types.js';
import type { ShutdownDecision } from '../monitoring/StatusMonitor.js';

export function askQuestion(prompt: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(prompt, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export function isYes(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

export async function confirm(question: string): Promise<boolean> {
  return isYes(await askQuestion(`${question} [y/N] `));
}

/** y → unmount, n → keep mounted, anything else → cancel. */
export function parseShutdownAnswer(answer: string): ShutdownDecision {
  if (isYes(answer)) return 'unmount';
  if (/^no?$/i.test(answer.trim())) return 'keep';
  return 'cancel';
}

export async function askShutdownDecision(
  mounted: readonly ConnectionDefinition[],
): Promise<ShutdownDecision> {
  const names = mounted.map((c) => `  - ${c.name} (${c.localMountPoint})`).join('\n');
  const answer = await askQuestion(
    `\nThese connections are still mounted:\n${names}\nUnmount them before exiting? [y/n/c] `,
  );
  return parseShutdownAnswer(answer);
}
