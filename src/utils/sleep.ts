import { setTimeout as delay } from 'node:timers/promises';

/** Largest delay a Node timer honours; longer ones fire after 1 ms. */
export const MAX_DELAY_MS = 2_147_483_647;

export const sleep = async (ms: number): Promise<void> => {
  if (ms <= 0) return;
  await delay(ms);
};
