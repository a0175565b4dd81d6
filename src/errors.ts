// =================================================================
// SIMULATOR ERRORS
// =================================================================
//
// Three kinds, each with a different blast radius:
//
//   ConfigurationError → fatal, thrown before any dispatch starts
//   DispatchError      → one player request failed, run continues
//   SinkWriteError     → metrics can no longer be trusted, run aborts
//
// Every error names the player it belongs to, or none if it
// belongs to the run as a whole.
// =================================================================

export class SimulationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigurationError extends SimulationError {
    constructor(
        message: string,
        public readonly issues: string[] = [],
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class DispatchError extends SimulationError {
    constructor(
        public readonly playerId: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(`Player_${playerId}: ${message}`, options);
    }
}

export class SinkWriteError extends SimulationError {
    constructor(
        message: string,
        public readonly playerId?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
