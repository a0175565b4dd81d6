import type { Logger } from 'winston';
import type { ServerSelector } from '../load-balancers/types';
import type { ServerPool } from '../servers/server-pool';
import type { MetricsSink } from '../metrics/metrics-sink';
import { createMetricsRecord } from '../metrics/types';
import type { MetricsRecord } from '../metrics/types';
import { checkSample, timerSleep } from './delay';
import type { DelayDistribution, Sleeper } from './delay';
import { DispatchError, errorMessage } from '../errors';
import { createAppLogger } from '../logger';

// =================================================================
// REQUEST DISPATCHER — one player request, start to finish
// =================================================================
//
//   1. selector.selectNext()        → server index   (locked, instant)
//   2. delay.sample()               → processing time
//   3. sleep(time × timeScaleMs)    → no lock held, dispatches overlap
//   4. sink.append(record)          → locked
//   5. pool.recordCompletion(...)   → locked
//
// Steps 4 and 5 commit together. The index is checked before the
// wait, so step 5 cannot fail once step 4 succeeded; if step 4
// fails the counters are never touched.
// =================================================================

export interface DispatcherOptions {
    pool: ServerPool;
    selector: ServerSelector;
    sink: MetricsSink;
    delay: DelayDistribution;
    sleep?: Sleeper;
    timeScaleMs?: number; // Real ms per simulated second
    clock?: () => Date;
    logger?: Logger;
}

export class RequestDispatcher {
    private readonly pool: ServerPool;
    private readonly selector: ServerSelector;
    private readonly sink: MetricsSink;
    private readonly delay: DelayDistribution;
    private readonly sleep: Sleeper;
    private readonly timeScaleMs: number;
    private readonly clock: () => Date;
    private readonly logger: Logger;

    constructor(options: DispatcherOptions) {
        this.pool = options.pool;
        this.selector = options.selector;
        this.sink = options.sink;
        this.delay = options.delay;
        this.sleep = options.sleep ?? timerSleep;
        this.timeScaleMs = options.timeScaleMs ?? 1000;
        this.clock = options.clock ?? (() => new Date());
        this.logger = options.logger ?? createAppLogger();
    }

    async dispatch(playerId: string): Promise<MetricsRecord> {
        const startTime = this.clock();

        const index = await this.selector.selectNext();
        const serverId = this.pool.idAt(index);
        if (serverId === undefined) {
            throw new DispatchError(playerId, `${this.selector.name} selected invalid server index ${index}`);
        }
        this.logger.debug(`➡️  Player_${playerId} connected to ${serverId}`);

        let responseTime: number;
        try {
            responseTime = checkSample(this.delay.sample(), `${this.delay.name} delay`);
        } catch (err) {
            throw new DispatchError(playerId, `delay sampling failed: ${errorMessage(err)}`, { cause: err });
        }

        await this.sleep(responseTime * this.timeScaleMs);

        const record = createMetricsRecord({
            timestamp: this.clock().toISOString(),
            startTime: startTime.toISOString(),
            playerId,
            serverId,
            responseTime,
        });

        await this.sink.append(record);
        await this.pool.recordCompletion(index, responseTime, playerId);

        this.logger.info(`Player_${playerId} routed to ${serverId}, took ${responseTime.toFixed(2)}s`);
        return record;
    }
}
