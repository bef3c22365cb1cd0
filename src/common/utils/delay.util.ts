import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Resolves after `ms`. Rejects with an AbortError when `signal` fires first.
 * A zero or negative delay still yields to the event loop.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  await sleep(Math.max(0, ms), undefined, { signal });
}
