import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from './errors';

// =================================================================
// CONFIGURATION
// =================================================================
//
// Read from the environment (and .env), validated with zod.
// Explicit overrides win over the environment, which wins over
// the defaults:
//
//   loadConfig()                          → env + defaults
//   loadConfig({ serverCount: 5 })        → env + defaults, 5 servers
//
// Any invalid field → ConfigurationError listing all of them,
// before a single request is dispatched.
// =================================================================

const intString = z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'must be an integer')
    .transform(Number);

const numberString = z
    .string()
    .trim()
    .refine(v => v !== '' && Number.isFinite(Number(v)), 'must be a number')
    .transform(Number);

export const envSchema = z.object({
    SERVER_COUNT: intString.optional(),
    NUM_PLAYERS: intString.optional(),
    CONCURRENCY_LIMIT: intString.optional(),
    PROCESSING_TIME_MIN: numberString.optional(),
    PROCESSING_TIME_MAX: numberString.optional(),
    TIME_SCALE_MS: numberString.optional(),
    REQUEST_INTERVAL_MS: numberString.optional(),
    RUN_TIMEOUT_MS: numberString.optional(),
    APPEND_TIMEOUT_MS: numberString.optional(),
    OUTPUT_DIR: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    REPORT_PORT: intString.optional(),
});

export const simulationConfigSchema = z
    .object({
        serverCount: z.number().int().positive(),
        numPlayers: z.number().int().nonnegative(),
        concurrencyLimit: z.number().int().positive().optional(),
        processingTimeRange: z.tuple([z.number().nonnegative(), z.number().nonnegative()]),
        timeScaleMs: z.number().nonnegative(),
        requestIntervalMs: z.number().nonnegative(),
        runTimeoutMs: z.number().positive().optional(),
        appendTimeoutMs: z.number().positive(),
        outputDir: z.string().min(1),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        reportPort: z.number().int().min(0).max(65535).optional(),
    })
    .refine(c => c.processingTimeRange[0] <= c.processingTimeRange[1], {
        message: 'min must not exceed max',
        path: ['processingTimeRange'],
    })
    .refine(c => c.concurrencyLimit === undefined || c.numPlayers === 0 || c.concurrencyLimit <= c.numPlayers, {
        message: 'must not exceed numPlayers',
        path: ['concurrencyLimit'],
    });

export type SimulationConfig = z.infer<typeof simulationConfigSchema>;

export const DEFAULT_CONFIG: SimulationConfig = {
    serverCount: 3,
    numPlayers: 20,
    processingTimeRange: [1, 3],
    timeScaleMs: 1000,
    requestIntervalMs: 0,
    appendTimeoutMs: 5000,
    outputDir: 'output/logs',
    logLevel: 'info',
};

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SimulationConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = formatIssues(parsed.error);
        throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, issues);
    }
    const e = parsed.data;

    return {
        serverCount: e.SERVER_COUNT ?? DEFAULT_CONFIG.serverCount,
        numPlayers: e.NUM_PLAYERS ?? DEFAULT_CONFIG.numPlayers,
        concurrencyLimit: e.CONCURRENCY_LIMIT,
        processingTimeRange: [
            e.PROCESSING_TIME_MIN ?? DEFAULT_CONFIG.processingTimeRange[0],
            e.PROCESSING_TIME_MAX ?? DEFAULT_CONFIG.processingTimeRange[1],
        ],
        timeScaleMs: e.TIME_SCALE_MS ?? DEFAULT_CONFIG.timeScaleMs,
        requestIntervalMs: e.REQUEST_INTERVAL_MS ?? DEFAULT_CONFIG.requestIntervalMs,
        runTimeoutMs: e.RUN_TIMEOUT_MS,
        appendTimeoutMs: e.APPEND_TIMEOUT_MS ?? DEFAULT_CONFIG.appendTimeoutMs,
        outputDir: e.OUTPUT_DIR ?? DEFAULT_CONFIG.outputDir,
        logLevel: e.LOG_LEVEL ?? DEFAULT_CONFIG.logLevel,
        reportPort: e.REPORT_PORT,
    };
}

export function parseConfig(input: unknown): SimulationConfig {
    const parsed = simulationConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = formatIssues(parsed.error);
        throw new ConfigurationError(`Invalid simulation config: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
}

export function loadConfig(
    overrides: Partial<SimulationConfig> = {},
    env: NodeJS.ProcessEnv = process.env
): SimulationConfig {
    return parseConfig({ ...configFromEnv(env), ...overrides });
}

/** Concurrency limit with the "all at once" default applied */
export function effectiveConcurrency(config: SimulationConfig): number {
    return config.concurrencyLimit ?? config.numPlayers;
}
