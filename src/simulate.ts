import { loadConfig, effectiveConcurrency } from './config';
import { createSimulation } from './simulation/setup';
import type { Simulation } from './simulation/setup';
import type { SimulationSummary } from './simulation/driver';
import { serverStats, summarize } from './report/stats';
import { createReportApp, startReportServer } from './report/server';
import { ConfigurationError, errorMessage } from './errors';

// =================================================================
// Run one simulation: players → round robin → game servers
// =================================================================

function printReport(summary: SimulationSummary, sim: Simulation): void {
    console.log('');
    console.log('📊 Final Server Statistics:');
    console.log('='.repeat(50));

    for (const server of serverStats(sim.pool.list())) {
        console.log('');
        console.log(`${server.id}:`);
        console.log(`  Players Handled: ${server.requestCount}`);
        console.log(`  Average Response Time: ${server.avgResponseTime.toFixed(3)} seconds`);
        console.log(`  Player List: ${server.players.map(p => `Player_${p}`).join(', ')}`);
    }

    const overall = summarize(sim.sink.drain());
    console.log('');
    console.log('📈 Overall Statistics:');
    console.log('='.repeat(50));
    console.log(`Total Players Connected: ${overall.totalPlayers}`);
    console.log(`Average Response Time Across All Servers: ${overall.avgResponseTime.toFixed(3)} seconds`);
    console.log(`Min / Max Response Time: ${overall.minResponseTime.toFixed(3)}s / ${overall.maxResponseTime.toFixed(3)}s`);
    console.log('');
    console.log(`Dispatched: ${summary.dispatched}  Failed: ${summary.failed}  Skipped: ${summary.skipped}`);
    console.log(`Wall time: ${(summary.wallTimeMs / 1000).toFixed(2)}s${summary.timedOut ? ' (timed out)' : ''}`);
    if (summary.aborted) {
        console.log(`Run aborted: ${summary.abortReason}`);
    }

    console.log('');
    console.log('📝 Detailed logs have been saved to:');
    console.log(`  - Text logs: ${sim.outputs.serverLog}`);
    console.log(`  - CSV metrics: ${sim.outputs.csv}`);
    console.log('');
}

async function main(): Promise<number> {
    const config = loadConfig();
    const sim = createSimulation(config);
    let summary: SimulationSummary | undefined;

    let reportFailed = false;

    if (config.reportPort !== undefined) {
        try {
            const server = await startReportServer(createReportApp(sim, () => summary), config.reportPort);
            server.on('error', (err) => {
                console.error(`Report server failed: ${errorMessage(err)}`);
                process.exitCode = 1;
            });
            console.log(`  Report: http://localhost:${config.reportPort}/simulation/health`);
        } catch (err) {
            console.error(`Report server failed: ${errorMessage(err)}`);
            reportFailed = true;
        }
    }

    console.log('');
    console.log(`🎮 Starting Game Server Simulation with ${config.numPlayers} players...`);
    console.log(`  Servers: ${sim.pool.ids().join(', ')}`);
    console.log(`  Concurrency: ${effectiveConcurrency(config)}`);
    console.log(`  Processing time: ${config.processingTimeRange[0]}-${config.processingTimeRange[1]}s`);
    console.log('');

    summary = await sim.driver.run(config.numPlayers, effectiveConcurrency(config));
    printReport(summary, sim);

    return summary.aborted || summary.failed > 0 || reportFailed ? 1 : 0;
}

main()
    .then((code) => {
        if (code !== 0) process.exitCode = code;
    })
    .catch((err: unknown) => {
        const prefix = err instanceof ConfigurationError ? 'Configuration error' : 'Simulation failed';
        console.error(`${prefix}: ${errorMessage(err)}`);
        process.exitCode = 1;
    });
