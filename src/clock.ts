import { Clock } from './staking/staking-interfaces.js';

export const systemClock: Clock = {
    now: () => Math.floor(Date.now() / 1000),
};

export interface ManualClock extends Clock {
    set(time: number): void;
    advance(seconds: number): void;
}

/**
 * Clock driven by the host, e.g. block timestamps. Refuses to move backwards.
 */
export function manualClock(start = 0): ManualClock {
    let current = start;
    return {
        now: () => current,
        set(time: number) {
            if (!Number.isSafeInteger(time) || time < current) {
                throw new Error(`Clock cannot move from ${current} to ${time}`);
            }
            current = time;
        },
        advance(seconds: number) {
            this.set(current + seconds);
        },
    };
}
