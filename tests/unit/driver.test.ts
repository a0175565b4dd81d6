import { describe, it, expect, vi } from 'vitest';
import { setTimeout as sleep } from 'timers/promises';
import { RoundRobinSelector } from '../../src/load-balancers/round-robin';
import type { ServerSelector } from '../../src/load-balancers/types';
import { ServerPool } from '../../src/servers/server-pool';
import { MetricsSink } from '../../src/metrics/metrics-sink';
import { RequestDispatcher } from '../../src/dispatch/dispatcher';
import { SimulationDriver } from '../../src/simulation/driver';
import { FixedDelay, immediateSleep } from '../../src/dispatch/delay';
import { createAppLogger } from '../../src/logger';
import { ServerLogWriter } from '../../src/metrics/writers';
import { ConfigurationError, SimulationError } from '../../src/errors';
import type { Sleeper } from '../../src/dispatch/delay';
import { FlakyTransport, MemoryWriter, deferred, makeSimulation } from '../helpers';

/** Fails every third selection with an index no pool has */
class FlakySelector implements ServerSelector {
    name = 'flaky';
    private calls = 0;
    private readonly inner: RoundRobinSelector;

    constructor(pool: ServerPool) {
        this.inner = new RoundRobinSelector(pool);
    }

    async selectNext(): Promise<number> {
        this.calls++;
        return this.calls % 3 === 0 ? 99 : this.inner.selectNext();
    }
}

describe('SimulationDriver', () => {
    it('spreads 9 players evenly over 3 servers with a fixed delay', async () => {
        const sim = makeSimulation({ serverCount: 3, numPlayers: 9 });

        const summary = await sim.driver.run(9);

        expect(summary).toMatchObject({
            state: 'COMPLETED',
            requested: 9,
            dispatched: 9,
            succeeded: 9,
            failed: 0,
            skipped: 0,
            timedOut: false,
            aborted: false,
            failures: [],
        });
        expect(await sim.pool.snapshot()).toEqual([
            { serverId: 'Game_Server_1', requestsServed: 3, totalResponseTime: 3 },
            { serverId: 'Game_Server_2', requestsServed: 3, totalResponseTime: 3 },
            { serverId: 'Game_Server_3', requestsServed: 3, totalResponseTime: 3 },
        ]);
        expect(sim.sink.drain()).toHaveLength(9);
    });

    it('walks IDLE → RUNNING → DRAINING → COMPLETED', async () => {
        const sim = makeSimulation({ numPlayers: 2 });
        expect(sim.driver.getState()).toBe('IDLE');

        await sim.driver.run(2);

        expect(sim.driver.getStateChanges().map(c => `${c.from}→${c.to}`)).toEqual([
            'IDLE→RUNNING',
            'RUNNING→DRAINING',
            'DRAINING→COMPLETED',
        ]);
        expect(sim.sink.isOpen()).toBe(false);
    });

    it('routes everything to server 0 when there is one server', async () => {
        const sim = makeSimulation({ serverCount: 1, numPlayers: 4 });
        await sim.driver.run(4);

        expect(new Set(sim.sink.drain().map(r => r.serverId))).toEqual(new Set(['Game_Server_1']));
        expect((await sim.pool.snapshot())[0].requestsServed).toBe(4);
    });

    it('completes immediately with zero players', async () => {
        const writer = new MemoryWriter();
        const sim = makeSimulation({ numPlayers: 0 }, { writers: [writer] });

        const summary = await sim.driver.run(0);

        expect(summary).toMatchObject({ state: 'COMPLETED', dispatched: 0, succeeded: 0, skipped: 0 });
        expect(sim.sink.drain()).toEqual([]);
        expect(writer.closed).toBe(true);
    });

    it('keeps at most concurrencyLimit dispatches in flight', async () => {
        let inFlight = 0;
        let maxInFlight = 0;
        const trackingSleep: Sleeper = async () => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            await sleep(5);
            inFlight--;
        };
        const sim = makeSimulation({ numPlayers: 6 }, { sleep: trackingSleep });

        const summary = await sim.driver.run(6, 2);

        expect(summary.succeeded).toBe(6);
        expect(maxInFlight).toBe(2);
    });

    it('records failed dispatches and keeps going', async () => {
        const pool = new ServerPool(3);
        const sink = new MetricsSink();
        const logger = createAppLogger('error');
        const dispatcher = new RequestDispatcher({
            pool,
            selector: new FlakySelector(pool),
            sink,
            delay: new FixedDelay(1),
            sleep: immediateSleep,
            logger,
        });
        const driver = new SimulationDriver({ dispatcher, sink, logger });

        const summary = await driver.run(9, 1);

        expect(summary).toMatchObject({ dispatched: 9, succeeded: 6, failed: 3, aborted: false });
        expect(summary.failures.map(f => f.playerId)).toEqual(['3', '6', '9']);
        expect(summary.failures[0]).toEqual({
            playerId: '3',
            kind: 'DispatchError',
            message: 'Player_3: flaky selected invalid server index 99',
        });

        const served = (await pool.snapshot()).map(s => s.requestsServed);
        expect(served).toEqual([2, 2, 2]);
        expect(served.reduce((a, b) => a + b, 0)).toBe(9 - summary.failed);
        expect(sink.drain()).toHaveLength(9 - summary.failed);
    });

    it('aborts the run when the sink can no longer write', async () => {
        const sim = makeSimulation({ numPlayers: 10 }, { writers: [new MemoryWriter([3])] });

        const summary = await sim.driver.run(10, 1);

        expect(summary).toMatchObject({
            state: 'COMPLETED',
            dispatched: 3,
            succeeded: 2,
            failed: 1,
            skipped: 7,
            aborted: true,
            abortReason: 'Failed to append metrics for Player_3: disk full',
        });
        expect(summary.failures).toEqual([
            { playerId: '3', kind: 'SinkWriteError', message: 'Failed to append metrics for Player_3: disk full' },
        ]);
        expect(sim.sink.drain().map(r => r.playerId)).toEqual(['1', '2']);
        const served = (await sim.pool.snapshot()).reduce((n, s) => n + s.requestsServed, 0);
        expect(served).toBe(2);
    });

    it('blames a failed server-log line on the request that wrote it', async () => {
        const transport = new FlakyTransport([3]);
        const sim = makeSimulation({ numPlayers: 3 }, { writers: [new ServerLogWriter(transport)] });

        const summary = await sim.driver.run(3, 1);

        expect(summary).toMatchObject({
            dispatched: 3,
            succeeded: 2,
            failed: 1,
            skipped: 0,
            aborted: true,
            abortReason: 'Failed to append metrics for Player_3: log volume unavailable',
        });
        expect(summary.failures.map(f => f.playerId)).toEqual(['3']);
        expect(sim.sink.drain().map(r => r.playerId)).toEqual(['1', '2']);
        expect((await sim.pool.snapshot()).map(s => s.requestsServed)).toEqual([1, 1, 0]);
        expect(transport.lines).toHaveLength(2);
    });

    it('stops issuing on timeout but lets in-flight requests finish', async () => {
        const gate = deferred();
        const sim = makeSimulation(
            { numPlayers: 5, runTimeoutMs: 20 },
            { sleep: () => gate.promise },
        );

        const running = sim.driver.run(5, 2);
        await sleep(60);
        gate.resolve();
        const summary = await running;

        expect(summary).toMatchObject({
            dispatched: 2,
            succeeded: 2,
            failed: 0,
            skipped: 3,
            timedOut: true,
            aborted: false,
            state: 'COMPLETED',
        });
        expect(sim.sink.drain()).toHaveLength(2);
    });

    it('pauses between issued requests', async () => {
        const sleepSpy = vi.fn(async (_ms: number) => {});
        const sim = makeSimulation({ numPlayers: 4, requestIntervalMs: 10 }, { sleep: sleepSpy });

        await sim.driver.run(4);

        expect(sleepSpy.mock.calls.filter(([ms]) => ms === 10)).toHaveLength(3);
        expect(sleepSpy.mock.calls.filter(([ms]) => ms === 1000)).toHaveLength(4);
    });

    it('validates arguments before dispatching anything', async () => {
        const sim = makeSimulation({ numPlayers: 5 });

        await expect(sim.driver.run(-1)).rejects.toBeInstanceOf(ConfigurationError);
        await expect(sim.driver.run(5, 0)).rejects.toThrow('concurrencyLimit must be an integer between 1 and 5, got 0');
        await expect(sim.driver.run(5, 6)).rejects.toBeInstanceOf(ConfigurationError);
        expect(sim.driver.getState()).toBe('IDLE');
        expect(sim.sink.isOpen()).toBe(false);
    });

    it('runs only once', async () => {
        const sim = makeSimulation({ numPlayers: 1 });
        await sim.driver.run(1);
        await expect(sim.driver.run(1)).rejects.toBeInstanceOf(SimulationError);
    });
});

describe('simulation setup', () => {
    it('refuses a pool without servers before anything runs', () => {
        expect(() => makeSimulation({ serverCount: 0 })).toThrow(ConfigurationError);
    });
});
