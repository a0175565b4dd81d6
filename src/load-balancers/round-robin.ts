import { Mutex } from 'async-mutex';
import type { ServerSelector } from './types';
import type { ServerPool } from '../servers/server-pool';

// =================================================================
// ROUND ROBIN SELECTOR
// =================================================================
//
// Rotate through the game servers in order:
//
//   Player 1 → Game_Server_1
//   Player 2 → Game_Server_2
//   Player 3 → Game_Server_3
//   Player 4 → Game_Server_1 (wraps around)
//
// Many dispatches ask for a server at the same time, so the
// cursor is advanced inside a mutex. Whoever gets the lock first
// gets the next index; the cursor moves exactly once per call.
//
// The critical section is read + increment, nothing else.
// =================================================================

export class RoundRobinSelector implements ServerSelector {
    name = 'round-robin';
    private nextIndex = 0;
    private readonly lock = new Mutex();

    constructor(private readonly pool: ServerPool) {}

    async selectNext(): Promise<number> {
        return this.lock.runExclusive(() => {
            const index = this.nextIndex;
            this.nextIndex = (index + 1) % this.pool.size;
            return index;
        });
    }

    /** Index the next call will return */
    peek(): number {
        return this.nextIndex;
    }
}
