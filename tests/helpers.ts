import Transport from 'winston-transport';
import { DEFAULT_CONFIG, parseConfig } from '../src/config';
import type { SimulationConfig } from '../src/config';
import { createSimulation } from '../src/simulation/setup';
import type { Simulation, SimulationOverrides } from '../src/simulation/setup';
import { immediateSleep } from '../src/dispatch/delay';
import type { MetricsRecord, MetricsWriter } from '../src/metrics/types';
import { createMetricsRecord } from '../src/metrics/types';

/** Simulation with fixed 1s delays, no file output and no real waiting */
export function makeSimulation(
    config: Partial<SimulationConfig> = {},
    overrides: SimulationOverrides = {}
): Simulation {
    const full = parseConfig({
        ...DEFAULT_CONFIG,
        processingTimeRange: [1, 1],
        outputDir: 'unused-in-tests',
        ...config,
    });
    return createSimulation(full, { sleep: immediateSleep, writers: [], ...overrides });
}

export function record(playerId: string, serverId = 'Game_Server_1', responseTime = 1): MetricsRecord {
    return createMetricsRecord({
        timestamp: '2026-01-01T00:00:01.000Z',
        startTime: '2026-01-01T00:00:00.000Z',
        playerId,
        serverId,
        responseTime,
    });
}

/** Writer that keeps records in memory; fails on the given write numbers (1-based) */
export class MemoryWriter implements MetricsWriter {
    written: MetricsRecord[] = [];
    opened = false;
    closed = false;
    private writes = 0;

    constructor(private readonly failOn: number[] = [], readonly name = 'memory') {}

    async open(): Promise<void> {
        this.opened = true;
    }

    async write(r: MetricsRecord): Promise<void> {
        this.writes++;
        if (this.failOn.includes(this.writes)) {
            throw new Error('disk full');
        }
        this.written.push(r);
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

/**
 * Winston transport that reports each line the way real transports do:
 * `logged` on the next tick, or `error` for the given write numbers (1-based).
 */
export class FlakyTransport extends Transport {
    lines: string[] = [];
    private writes = 0;

    constructor(private readonly failOn: number[] = []) {
        super();
    }

    log(info: { message?: unknown }, next: () => void): void {
        this.writes++;
        if (this.failOn.includes(this.writes)) {
            setImmediate(() => this.emit('error', new Error('log volume unavailable')));
        } else {
            this.lines.push(String(info.message));
            setImmediate(() => this.emit('logged', info));
        }
        next();
    }
}

export function deferred() {
    let resolve: () => void = () => {};
    const promise = new Promise<void>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}
