import {setTimeout as delay} from 'node:timers/promises';

export type SleepOutcome = 'elapsed' | 'aborted';

export const sleep = async (ms: number, signal?: AbortSignal): Promise<SleepOutcome> => {
  if (signal?.aborted) {
    return 'aborted';
  }

  try {
    await delay(ms, undefined, {signal});
    return 'elapsed';
  } catch (error) {
    if (signal?.aborted) {
      return 'aborted';
    }
    throw error;
  }
};
