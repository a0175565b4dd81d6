import { Mutex } from 'async-mutex';
import type { GameServer, ServerSnapshot } from '../load-balancers/types';
import { ConfigurationError, DispatchError } from '../errors';

// =================================================================
// SERVER POOL
// =================================================================
//
// Fixed set of game servers, created once per simulation:
//
//   index 0 → Game_Server_1   { requests: 4, total: 8.12s }
//   index 1 → Game_Server_2   { requests: 4, total: 7.40s }
//   index 2 → Game_Server_3   { requests: 3, total: 6.95s }
//
// Each server has its own lock. Completions on different servers
// never wait on each other; completions on the same server are
// applied one at a time, count and total together.
// =================================================================

export class ServerPool {
    private readonly servers: GameServer[];
    private readonly locks: Mutex[];

    constructor(serverCount: number) {
        if (!Number.isInteger(serverCount) || serverCount <= 0) {
            throw new ConfigurationError(
                `serverCount must be a positive integer, got ${serverCount}`,
                ['serverCount']
            );
        }

        this.servers = Array.from({ length: serverCount }, (_, i) => ({
            index: i,
            id: `Game_Server_${i + 1}`,
            requestsServed: 0,
            totalResponseTime: 0,
            players: [],
        }));
        this.locks = this.servers.map(() => new Mutex());
    }

    get size(): number {
        return this.servers.length;
    }

    has(index: number): boolean {
        return Number.isInteger(index) && index >= 0 && index < this.servers.length;
    }

    serverAt(index: number): GameServer | undefined {
        if (!this.has(index)) return undefined;
        const server = this.servers[index];
        return { ...server, players: [...server.players] };
    }

    idAt(index: number): string | undefined {
        return this.has(index) ? this.servers[index].id : undefined;
    }

    ids(): string[] {
        return this.servers.map(s => s.id);
    }

    /**
     * Count one finished request against a server.
     * The pair (requestsServed, totalResponseTime) moves as one unit.
     */
    async recordCompletion(index: number, responseTime: number, playerId = 'unknown'): Promise<void> {
        if (!this.has(index)) {
            throw new DispatchError(playerId, `invalid server index ${index} (pool size ${this.size})`);
        }
        const server = this.servers[index];

        await this.locks[index].runExclusive(() => {
            server.requestsServed += 1;
            server.totalResponseTime += responseTime;
            server.players.push(playerId);
        });
    }

    /**
     * Per-server counters for reporting.
     * Each pair is read under that server's lock.
     */
    async snapshot(): Promise<ServerSnapshot[]> {
        return Promise.all(
            this.servers.map((server, i) =>
                this.locks[i].runExclusive(() => ({
                    serverId: server.id,
                    requestsServed: server.requestsServed,
                    totalResponseTime: server.totalResponseTime,
                }))
            )
        );
    }

    /** Full server state, copied */
    list(): GameServer[] {
        return this.servers.map(s => ({ ...s, players: [...s.players] }));
    }
}
