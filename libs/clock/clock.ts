import { setTimeout as delay } from 'node:timers/promises';

/**
 * Source of time for freshness checks and reconnection delays.
 */
export interface Clock {
    /** Milliseconds since the epoch */
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = Object.freeze({
    now: () => Date.now(),
    sleep: async (ms: number) => {
        await delay(ms);
    }
});
