import { setTimeout as sleep } from 'timers/promises';
import { ConfigurationError } from '../errors';

// =================================================================
// SIMULATED PROCESSING DELAY
// =================================================================
//
// A distribution hands out processing times in simulated seconds.
// A Sleeper turns them into an actual wait:
//
//   sample() → 2.4 simulated seconds
//   × timeScaleMs (1000) → sleep(2400)
//
// Production uses UniformDelay(1, 3) and a real timer.
// Tests plug in FixedDelay and an immediate sleeper.
// =================================================================

export interface DelayDistribution {
    /** Next processing time, simulated seconds */
    sample(): number;

    name: string;
}

export type Sleeper = (ms: number) => Promise<void>;

export const timerSleep: Sleeper = async (ms) => {
    await sleep(ms);
};

/** Resolves on the next microtask; no timer involved */
export const immediateSleep: Sleeper = async () => {};

export function validateRange(min: number, max: number): void {
    const issues: string[] = [];
    if (!Number.isFinite(min) || min < 0) issues.push(`min must be a finite number >= 0, got ${min}`);
    if (!Number.isFinite(max) || max < 0) issues.push(`max must be a finite number >= 0, got ${max}`);
    if (issues.length === 0 && min > max) issues.push(`min (${min}) must not exceed max (${max})`);

    if (issues.length > 0) {
        throw new ConfigurationError(`Invalid processing time range: ${issues.join('; ')}`, ['processingTimeRange']);
    }
}

/** Throws unless the sample is a usable delay. Never clamps. */
export function checkSample(value: number, source: string): number {
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigurationError(`${source} produced an invalid delay sample: ${value}`, ['processingTimeRange']);
    }
    return value;
}

export class UniformDelay implements DelayDistribution {
    name = 'uniform';

    constructor(
        readonly min: number = 1,
        readonly max: number = 3,
        private readonly random: () => number = Math.random,
    ) {
        validateRange(min, max);
    }

    sample(): number {
        return this.min + this.random() * (this.max - this.min);
    }
}

export class FixedDelay implements DelayDistribution {
    name = 'fixed';

    constructor(readonly seconds: number) {
        validateRange(seconds, seconds);
    }

    sample(): number {
        return this.seconds;
    }
}

export function delayFromRange([min, max]: readonly [number, number]): DelayDistribution {
    return min === max ? new FixedDelay(min) : new UniformDelay(min, max);
}
