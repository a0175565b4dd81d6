import type { Server } from 'http';
import express from 'express';
import type { Express } from 'express';
import type { Simulation } from '../simulation/setup';
import type { SimulationSummary } from '../simulation/driver';
import { toCsv } from '../metrics/writers';
import { distribution, serverStats, summarize, toRows } from './stats';

// =================================================================
// REPORT SERVER — read-only view of a simulation over HTTP
// =================================================================
//
//   GET /simulation/health   → state, config, run summary
//   GET /simulation/servers  → per-server stats
//   GET /simulation/metrics  → every record (?format=csv for CSV)
//   GET /simulation/summary  → response times + distribution
//
// Works during a run too: everything is read from the live pool
// and a copy of the sink.
// =================================================================

export function createReportApp(
    sim: Simulation,
    getSummary: () => SimulationSummary | undefined = () => undefined
): Express {
    const app = express();

    app.get('/simulation/health', (req, res) => {
        res.json({
            status: 'ok',
            state: sim.driver.getState(),
            selector: sim.selector.name,
            config: sim.config,
            servers: sim.pool.ids(),
            records: sim.sink.size,
            summary: getSummary() ?? null,
        });
    });

    app.get('/simulation/servers', (req, res) => {
        res.json({ servers: serverStats(sim.pool.list()) });
    });

    app.get('/simulation/metrics', (req, res) => {
        const records = sim.sink.drain();

        if (req.query.format === 'csv') {
            res.type('text/csv').send(toCsv(records));
            return;
        }
        if (req.query.format !== undefined && req.query.format !== 'json') {
            res.status(400).json({ error: `Unknown format: ${String(req.query.format)}`, available: ['json', 'csv'] });
            return;
        }

        res.json({ count: records.length, records: toRows(records) });
    });

    app.get('/simulation/summary', (req, res) => {
        const records = sim.sink.drain();
        res.json({
            responseTimes: summarize(records),
            distribution: distribution(records),
        });
    });

    app.use((req, res) => {
        res.status(404).json({ error: 'Not Found', path: req.originalUrl });
    });

    return app;
}

/** Resolves once listening; rejects on a bind error such as EADDRINUSE */
export function startReportServer(app: Express, port: number): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port);
        server.once('error', reject);
        server.once('listening', () => {
            server.off('error', reject);
            resolve(server);
        });
    });
}
