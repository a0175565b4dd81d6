export interface GameServer {
    index: number; // Position in the pool, 0-based
    id: string; // Game_Server_1, Game_Server_2, ...
    requestsServed: number;
    totalResponseTime: number; // Simulated seconds
    players: string[]; // Player ids in completion order
}

export interface ServerSnapshot {
    serverId: string;
    requestsServed: number;
    totalResponseTime: number;
}

export interface ServerSelector {
    /** Pick the index of the server for the next request */
    selectNext(): Promise<number>;

    /** Algorithm name */
    name: string;
}
