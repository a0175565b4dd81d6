// Vitest global environment setup: keep console logging quiet and the
// simulator config independent of the developer's shell.
process.env.NODE_ENV = 'test';

for (const key of [
    'SERVER_COUNT',
    'NUM_PLAYERS',
    'CONCURRENCY_LIMIT',
    'PROCESSING_TIME_MIN',
    'PROCESSING_TIME_MAX',
    'TIME_SCALE_MS',
    'REQUEST_INTERVAL_MS',
    'RUN_TIMEOUT_MS',
    'APPEND_TIMEOUT_MS',
    'OUTPUT_DIR',
    'LOG_LEVEL',
    'REPORT_PORT',
]) {
    delete process.env[key];
}
