// =================================================================
// METRICS TYPES
// =================================================================

/** Outcome of one completed dispatch. Frozen once created. */
export interface MetricsRecord {
    readonly timestamp: string; // Completion time, ISO 8601
    readonly startTime: string; // When the dispatcher accepted the request
    readonly playerId: string;
    readonly serverId: string;
    readonly responseTime: number; // Simulated seconds
}

export interface MetricsWriter {
    /** Writer name (for error messages) */
    name: string;

    open(): Promise<void>;

    /** Persist one record. Called one record at a time, in append order. */
    write(record: MetricsRecord): Promise<void>;

    /** Flush and release the underlying resource */
    close(): Promise<void>;
}

export function createMetricsRecord(fields: MetricsRecord): MetricsRecord {
    return Object.freeze({ ...fields });
}

export function formatServerLogLine(record: MetricsRecord): string {
    return `${record.timestamp} player=${record.playerId} server=${record.serverId} ` +
        `response_time=${record.responseTime.toFixed(3)}`;
}
