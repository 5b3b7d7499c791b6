import type { LineSink } from './types.js';

export type ConfirmState = 'prompting' | 'confirmed' | 'aborted';

export const THREAT_WARNING = 'WARNING: Downloading this file type may expose you to a heightened security risk.';
export const THREAT_QUESTION = "Press 'y' to proceed or 'n' to exit: ";
export const INVALID_OPTION = 'Error: Invalid option provided.';

// Resolves to null once input is exhausted
export type Ask = (question: string) => Promise<string | null>;

export function nextState(input: string): ConfirmState {
  const answer = input.trim().toLowerCase();
  if (answer === 'y') return 'confirmed';
  if (answer === 'n') return 'aborted';
  return 'prompting';
}

/** Asks until the answer is `y` or `n`; running out of input counts as `n`. */
export async function confirmHighThreat(ask: Ask, print: LineSink = console.log): Promise<boolean> {
  print(THREAT_WARNING);
  let state: ConfirmState = 'prompting';
  while (state === 'prompting') {
    const input = await ask(THREAT_QUESTION);
    if (input === null) {
      state = 'aborted';
      break;
    }
    state = nextState(input);
    if (state === 'prompting') print(INVALID_OPTION);
  }
  return state === 'confirmed';
}
