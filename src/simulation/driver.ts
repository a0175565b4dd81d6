import PQueue from 'p-queue';
import type { Logger } from 'winston';
import type { RequestDispatcher } from '../dispatch/dispatcher';
import { timerSleep } from '../dispatch/delay';
import type { Sleeper } from '../dispatch/delay';
import type { MetricsSink } from '../metrics/metrics-sink';
import { ConfigurationError, SimulationError, SinkWriteError, errorMessage } from '../errors';
import { createAppLogger } from '../logger';

// =================================================================
// SIMULATION DRIVER
// =================================================================
//
// Generates player requests and pushes them through the dispatcher
// with at most `concurrencyLimit` in flight.
//
//   IDLE ──run()──▶ RUNNING ──all issued──▶ DRAINING ──all settled──▶ COMPLETED
//
// A request is attempted exactly once. When the run times out or
// the sink fails, nothing new is issued; requests already in flight
// finish normally and the rest are counted as skipped.
// =================================================================

export type SimulationState = 'IDLE' | 'RUNNING' | 'DRAINING' | 'COMPLETED';

export interface DispatchFailure {
    playerId: string;
    kind: string; // Error class name
    message: string;
}

export interface SimulationSummary {
    state: SimulationState;
    requested: number;
    dispatched: number; // Attempted (succeeded + failed)
    succeeded: number;
    failed: number;
    skipped: number; // Never issued because the run stopped early
    wallTimeMs: number;
    timedOut: boolean;
    aborted: boolean;
    abortReason?: string;
    failures: DispatchFailure[];
}

export interface SimulationDriverOptions {
    dispatcher: RequestDispatcher;
    sink: MetricsSink;
    timeoutMs?: number; // Stop issuing after this long
    requestIntervalMs?: number; // Pause between issued requests
    sleep?: Sleeper;
    now?: () => number;
    logger?: Logger;
}

export class SimulationDriver {
    private state: SimulationState = 'IDLE';
    private stopReason: 'timeout' | 'sink-error' | null = null;
    private abortReason: string | undefined;
    private stateChanges: Array<{ from: SimulationState; to: SimulationState; at: string }> = [];

    private counts = { dispatched: 0, succeeded: 0, failed: 0, skipped: 0 };
    private failures: DispatchFailure[] = [];

    private readonly dispatcher: RequestDispatcher;
    private readonly sink: MetricsSink;
    private readonly sleep: Sleeper;
    private readonly now: () => number;
    private readonly logger: Logger;

    constructor(private readonly options: SimulationDriverOptions) {
        this.dispatcher = options.dispatcher;
        this.sink = options.sink;
        this.sleep = options.sleep ?? timerSleep;
        this.now = options.now ?? Date.now;
        this.logger = options.logger ?? createAppLogger();
    }

    getState(): SimulationState {
        return this.state;
    }

    getStateChanges() {
        return [...this.stateChanges];
    }

    async run(numPlayers: number, concurrencyLimit: number = numPlayers): Promise<SimulationSummary> {
        if (this.state !== 'IDLE') {
            throw new SimulationError(`Simulation already ${this.state}; a driver runs once`);
        }
        validateRunArgs(numPlayers, concurrencyLimit);

        const startedAt = this.now();
        await this.sink.open();
        this.transitionTo('RUNNING');

        const timer = this.options.timeoutMs !== undefined
            ? setTimeout(() => this.stop('timeout'), this.options.timeoutMs)
            : undefined;
        timer?.unref();

        const queue = new PQueue({ concurrency: Math.max(1, concurrencyLimit) });
        const tasks: Promise<void>[] = [];

        try {
            for (let i = 1; i <= numPlayers; i++) {
                if (this.stopReason) break;
                if (i > 1 && this.options.requestIntervalMs) {
                    await this.sleep(this.options.requestIntervalMs);
                }
                const playerId = String(i);
                tasks.push(queue.add(() => this.attempt(playerId)));

                // Don't queue the next request until this one has a slot
                await queue.onSizeLessThan(1);
            }

            // Never-issued requests: the ones the loop didn't reach
            this.counts.skipped += numPlayers - tasks.length;
            this.transitionTo('DRAINING');

            await Promise.all(tasks);
        } finally {
            clearTimeout(timer);
        }

        try {
            await this.sink.close();
        } catch (err) {
            this.abortReason ??= errorMessage(err);
            this.logger.error(`Metrics sink close failed: ${errorMessage(err)}`);
        }

        this.transitionTo('COMPLETED');

        return {
            state: this.state,
            requested: numPlayers,
            ...this.counts,
            wallTimeMs: this.now() - startedAt,
            timedOut: this.stopReason === 'timeout',
            aborted: this.abortReason !== undefined,
            abortReason: this.abortReason,
            failures: [...this.failures],
        };
    }

    private async attempt(playerId: string): Promise<void> {
        // Queued before the run stopped, but not started yet
        if (this.stopReason) {
            this.counts.skipped++;
            return;
        }

        this.counts.dispatched++;
        try {
            await this.dispatcher.dispatch(playerId);
            this.counts.succeeded++;
        } catch (err) {
            this.counts.failed++;
            const kind = err instanceof Error ? err.name : 'Error';
            this.failures.push({ playerId, kind, message: errorMessage(err) });

            if (err instanceof SinkWriteError) {
                this.abortReason ??= err.message;
                this.stop('sink-error');
                this.logger.error(`Aborting run: ${err.message}`);
            } else {
                this.logger.warn(`❌ Dispatch failed: ${errorMessage(err)}`);
            }
        }
    }

    private stop(reason: 'timeout' | 'sink-error'): void {
        if (this.stopReason || this.state === 'COMPLETED') return;
        this.stopReason = reason;
        this.logger.warn(`Simulation stopping (${reason}); in-flight requests will finish`);
    }

    private transitionTo(newState: SimulationState): void {
        const from = this.state;
        this.state = newState;

        this.stateChanges.push({
            from,
            to: newState,
            at: new Date().toISOString(),
        });

        this.logger.debug(`⚡ Simulation ${from} → ${newState}`);
    }
}

function validateRunArgs(numPlayers: number, concurrencyLimit: number): void {
    if (!Number.isInteger(numPlayers) || numPlayers < 0) {
        throw new ConfigurationError(
            `numPlayers must be a non-negative integer, got ${numPlayers}`,
            ['numPlayers']
        );
    }
    if (numPlayers === 0) return;

    if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1 || concurrencyLimit > numPlayers) {
        throw new ConfigurationError(
            `concurrencyLimit must be an integer between 1 and ${numPlayers}, got ${concurrencyLimit}`,
            ['concurrencyLimit']
        );
    }
}
