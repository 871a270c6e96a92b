// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Timing helpers
// ═══════════════════════════════════════════════════════════════════════════════

import { Sleep } from './types';

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/** Race a promise against a timer. The timer is always cleared so nothing keeps the process alive. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(errorMessage)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
