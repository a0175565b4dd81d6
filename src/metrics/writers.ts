import fs from 'fs';
import path from 'path';
import type { Logger } from 'winston';
import type TransportStream from 'winston-transport';
import { formatServerLogLine } from './types';
import type { MetricsRecord, MetricsWriter } from './types';
import { createServerLog, serverLogFile } from '../logger';

// =================================================================
// METRICS WRITERS — where appended records end up besides memory
// =================================================================
//
//   CsvMetricsWriter  → output/logs/metrics.csv
//   ServerLogWriter   → output/logs/server_logs.txt
//
// A writer that fails keeps failing: once its stream reports an
// error, every later write rejects with that error.
// =================================================================

export const CSV_HEADER = ['timestamp', 'player_id', 'server_id', 'start_time', 'response_time'];

function csvField(value: string): string {
    return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsvLine(record: MetricsRecord): string {
    return [
        record.timestamp,
        record.playerId,
        record.serverId,
        record.startTime,
        record.responseTime.toFixed(3),
    ].map(csvField).join(',');
}

export function toCsv(records: readonly MetricsRecord[]): string {
    return [CSV_HEADER.join(','), ...records.map(toCsvLine)].join('\n') + '\n';
}

export class CsvMetricsWriter implements MetricsWriter {
    name = 'csv';
    private stream: fs.WriteStream | null = null;
    private failure: Error | null = null;

    constructor(private readonly filePath: string) {}

    async open(): Promise<void> {
        await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
        this.stream = fs.createWriteStream(this.filePath, { flags: 'w' });
        this.stream.on('error', (err) => {
            this.failure = err;
        });
        await this.writeLine(CSV_HEADER.join(','));
    }

    async write(record: MetricsRecord): Promise<void> {
        await this.writeLine(toCsvLine(record));
    }

    close(): Promise<void> {
        return new Promise((resolve, reject) => {
            const stream = this.stream;
            if (!stream) {
                resolve();
                return;
            }
            this.stream = null;
            stream.end((err?: Error | null) => (err ? reject(err) : resolve()));
        });
    }

    private writeLine(line: string): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.failure) {
                reject(this.failure);
                return;
            }
            if (!this.stream) {
                reject(new Error(`${this.filePath} is not open`));
                return;
            }
            this.stream.write(line + '\n', (err?: Error | null) => (err ? reject(err) : resolve()));
        });
    }
}

export class ServerLogWriter implements MetricsWriter {
    name = 'server-log';
    private logger: Logger | null = null;
    private transport: TransportStream | null = null;
    private failure: Error | null = null;

    /**
     * @param target - log file path, or a ready-made transport
     */
    constructor(private readonly target: string | TransportStream) {}

    async open(): Promise<void> {
        let transport: TransportStream;
        if (typeof this.target === 'string') {
            await fs.promises.mkdir(path.dirname(this.target), { recursive: true });
            transport = serverLogFile(this.target);
        } else {
            transport = this.target;
        }
        this.transport = transport;
        this.logger = createServerLog(transport);
        this.logger.on('error', (err: Error) => {
            this.failure = err;
        });
    }

    /**
     * Settles once the transport has handled this line: resolves on its
     * `logged` event, rejects if the logger reports an error first.
     * Callers keep at most one write outstanding (the sink's lock).
     */
    write(record: MetricsRecord): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.failure) {
                reject(this.failure);
                return;
            }
            const logger = this.logger;
            const transport = this.transport;
            if (!logger || !transport) {
                reject(new Error('server log is not open'));
                return;
            }

            const onLogged = () => {
                logger.off('error', onError);
                resolve();
            };
            const onError = (err: Error) => {
                transport.off('logged', onLogged);
                reject(err);
            };
            transport.once('logged', onLogged);
            logger.once('error', onError);

            logger.info(formatServerLogLine(record));
        });
    }

    close(): Promise<void> {
        return new Promise((resolve, reject) => {
            const logger = this.logger;
            if (!logger) {
                resolve();
                return;
            }
            this.logger = null;
            this.transport = null;

            const onError = (err: Error) => reject(err);
            logger.once('error', onError);
            logger.once('finish', () => {
                logger.off('error', onError);
                resolve();
            });
            logger.end();
        });
    }
}
