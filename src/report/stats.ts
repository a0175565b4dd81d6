import type { GameServer } from '../load-balancers/types';
import type { MetricsRecord } from '../metrics/types';

// =================================================================
// REPORT DATA — what charts and summaries are drawn from
// =================================================================

export interface ServerStats {
    id: string;
    requestCount: number;
    avgResponseTime: number;
    players: string[];
}

export interface ResponseTimeSummary {
    totalPlayers: number;
    avgResponseTime: number;
    minResponseTime: number;
    maxResponseTime: number;
    totalProcessingTime: number;
}

export interface MetricsRow {
    timestamp: string;
    serverId: string;
    playerId: string;
    responseTime: number;
}

export interface ServerShare {
    serverId: string;
    count: number;
    percentage: number;
}

export function serverStats(servers: GameServer[]): ServerStats[] {
    return servers.map(s => ({
        id: s.id,
        requestCount: s.requestsServed,
        avgResponseTime: s.requestsServed > 0 ? s.totalResponseTime / s.requestsServed : 0,
        players: [...s.players],
    }));
}

export function summarize(records: readonly MetricsRecord[]): ResponseTimeSummary {
    if (records.length === 0) {
        return { totalPlayers: 0, avgResponseTime: 0, minResponseTime: 0, maxResponseTime: 0, totalProcessingTime: 0 };
    }

    const times = records.map(r => r.responseTime);
    const total = times.reduce((sum, t) => sum + t, 0);

    return {
        totalPlayers: records.length,
        avgResponseTime: total / records.length,
        minResponseTime: Math.min(...times),
        maxResponseTime: Math.max(...times),
        totalProcessingTime: total,
    };
}

/** One row per record, in append order */
export function toRows(records: readonly MetricsRecord[]): MetricsRow[] {
    return records.map(r => ({
        timestamp: r.timestamp,
        serverId: r.serverId,
        playerId: r.playerId,
        responseTime: r.responseTime,
    }));
}

/** Share of requests per server, ordered by server id */
export function distribution(records: readonly MetricsRecord[]): ServerShare[] {
    const counts = new Map<string, number>();
    for (const r of records) {
        counts.set(r.serverId, (counts.get(r.serverId) || 0) + 1);
    }

    return [...counts.entries()]
        .sort(([a], [b]) => a.localeCompare(b, undefined, { numeric: true }))
        .map(([serverId, count]) => ({
            serverId,
            count,
            percentage: (count / records.length) * 100,
        }));
}
