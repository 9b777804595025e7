import { setTimeout as delay } from 'node:timers/promises';
import type { Sleep } from './types';

/** Real wall-clock wait; tests inject a recording stand-in instead. */
export const realSleep: Sleep = async (ms) => {
  await delay(ms);
};
