import { Mutex, withTimeout } from 'async-mutex';
import type { MutexInterface } from 'async-mutex';
import type { MetricsRecord, MetricsWriter } from './types';
import { SinkWriteError, errorMessage } from '../errors';

// =================================================================
// METRICS SINK
// =================================================================
//
// Append-only record log shared by every dispatch.
//
//   open()   → writers ready (CSV file, server log)
//   append() → writers first, then memory, all under one lock
//   drain()  → every record so far, in append order
//   close()  → flush writers, no more appends
//
// Appends never wait forever: if the lock can't be taken within
// appendTimeoutMs the append fails with SinkWriteError.
// A record only reaches memory after every writer accepted it; a
// writer that took it before a later one failed is named in the error.
// =================================================================

export interface MetricsSinkOptions {
    writers?: MetricsWriter[];
    appendTimeoutMs?: number;
}

type SinkState = 'NEW' | 'OPEN' | 'CLOSED';

export class MetricsSink {
    private records: MetricsRecord[] = [];
    private state: SinkState = 'NEW';
    private readonly writers: MetricsWriter[];
    private readonly lock: MutexInterface;
    readonly appendTimeoutMs: number;

    constructor(options: MetricsSinkOptions = {}) {
        this.writers = options.writers ?? [];
        this.appendTimeoutMs = options.appendTimeoutMs ?? 5000;
        this.lock = withTimeout(new Mutex(), this.appendTimeoutMs);
    }

    get size(): number {
        return this.records.length;
    }

    isOpen(): boolean {
        return this.state === 'OPEN';
    }

    async open(): Promise<void> {
        if (this.state !== 'NEW') {
            throw new SinkWriteError(`Metrics sink cannot be opened from state ${this.state}`);
        }
        for (const writer of this.writers) {
            try {
                await writer.open();
            } catch (err) {
                throw new SinkWriteError(`Failed to open ${writer.name} writer: ${errorMessage(err)}`, undefined, { cause: err });
            }
        }
        this.state = 'OPEN';
    }

    async append(record: MetricsRecord): Promise<void> {
        if (this.state !== 'OPEN') {
            throw new SinkWriteError(`Metrics sink is ${this.state}, cannot append`, record.playerId);
        }

        try {
            await this.lock.runExclusive(async () => {
                const written: string[] = [];
                for (const writer of this.writers) {
                    try {
                        await writer.write(record);
                    } catch (err) {
                        if (written.length === 0) throw err;
                        // Earlier writers keep their line
                        throw new Error(`${errorMessage(err)}; record already in ${written.join(', ')}`, { cause: err });
                    }
                    written.push(writer.name);
                }
                this.records.push(record);
            });
        } catch (err) {
            throw new SinkWriteError(
                `Failed to append metrics for Player_${record.playerId}: ${errorMessage(err)}`,
                record.playerId,
                { cause: err }
            );
        }
    }

    /** Copy of all records, in append order */
    drain(): readonly MetricsRecord[] {
        return [...this.records];
    }

    async close(): Promise<void> {
        if (this.state === 'CLOSED') return;
        const wasOpen = this.state === 'OPEN';
        this.state = 'CLOSED';
        if (!wasOpen) return;

        const failures: string[] = [];
        try {
            await this.lock.runExclusive(async () => {
                for (const writer of this.writers) {
                    try {
                        await writer.close();
                    } catch (err) {
                        failures.push(`${writer.name}: ${errorMessage(err)}`);
                    }
                }
            });
        } catch (err) {
            throw new SinkWriteError(`Failed to close metrics sink: ${errorMessage(err)}`, undefined, { cause: err });
        }

        if (failures.length > 0) {
            throw new SinkWriteError(`Failed to close metrics writers (${failures.join('; ')})`);
        }
    }
}
