import path from 'path';
import type { Logger } from 'winston';
import type { SimulationConfig } from '../config';
import { ServerPool } from '../servers/server-pool';
import { RoundRobinSelector } from '../load-balancers/round-robin';
import { MetricsSink } from '../metrics/metrics-sink';
import type { MetricsWriter } from '../metrics/types';
import { CsvMetricsWriter, ServerLogWriter } from '../metrics/writers';
import { RequestDispatcher } from '../dispatch/dispatcher';
import { delayFromRange } from '../dispatch/delay';
import type { DelayDistribution, Sleeper } from '../dispatch/delay';
import { SimulationDriver } from './driver';
import { createAppLogger } from '../logger';

// =================================================================
// SIMULATION WIRING
// =================================================================
//
// Builds one simulation from a validated config:
//
//   ServerPool ◀── RoundRobinSelector
//        ▲                ▲
//        └── RequestDispatcher ──▶ MetricsSink ──▶ metrics.csv
//                 ▲                             └─▶ server_logs.txt
//          SimulationDriver
//
// Everything is constructed here and owned by the returned object;
// nothing lives at module level.
// =================================================================

export interface SimulationOverrides {
    delay?: DelayDistribution;
    sleep?: Sleeper;
    writers?: MetricsWriter[]; // Replaces the file writers
    clock?: () => Date;
    logger?: Logger;
}

export interface Simulation {
    config: SimulationConfig;
    pool: ServerPool;
    selector: RoundRobinSelector;
    sink: MetricsSink;
    dispatcher: RequestDispatcher;
    driver: SimulationDriver;
    outputs: { csv: string; serverLog: string };
}

export function outputPaths(outputDir: string) {
    return {
        csv: path.join(outputDir, 'metrics.csv'),
        serverLog: path.join(outputDir, 'server_logs.txt'),
    };
}

export function createSimulation(config: SimulationConfig, overrides: SimulationOverrides = {}): Simulation {
    const logger = overrides.logger ?? createAppLogger(config.logLevel);
    const outputs = outputPaths(config.outputDir);

    // Throws ConfigurationError on a bad server count or delay range
    const pool = new ServerPool(config.serverCount);
    const delay = overrides.delay ?? delayFromRange(config.processingTimeRange);

    const selector = new RoundRobinSelector(pool);
    const sink = new MetricsSink({
        appendTimeoutMs: config.appendTimeoutMs,
        writers: overrides.writers ?? [
            new CsvMetricsWriter(outputs.csv),
            new ServerLogWriter(outputs.serverLog),
        ],
    });

    const dispatcher = new RequestDispatcher({
        pool,
        selector,
        sink,
        delay,
        sleep: overrides.sleep,
        timeScaleMs: config.timeScaleMs,
        clock: overrides.clock,
        logger,
    });

    const driver = new SimulationDriver({
        dispatcher,
        sink,
        timeoutMs: config.runTimeoutMs,
        requestIntervalMs: config.requestIntervalMs,
        sleep: overrides.sleep,
        logger,
    });

    return { config, pool, selector, sink, dispatcher, driver, outputs };
}
