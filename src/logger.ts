import { createLogger, format, transports } from 'winston';
import type { Logger } from 'winston';
import type TransportStream from 'winston-transport';

// =================================================================
// LOGGING
// =================================================================
//
// Two loggers, two audiences:
//
//   app log     → console, for whoever is watching the run
//                 2026-10-18T12:00:01.204Z [info] Player_4 routed to Game_Server_1, took 2.17s
//
//   server log  → text file, one line per completed request,
//                 read by log viewers and the reporting tools
//                 2026-10-18T12:00:01.204Z player=4 server=Game_Server_1 response_time=2.170
// =================================================================

export function createAppLogger(level: string = 'info'): Logger {
    return createLogger({
        level,
        format: format.combine(
            format.timestamp(),
            format.errors({ stack: true }),
            format.json()
        ),
        transports: [
            new transports.Console({
                silent: process.env.NODE_ENV === 'test',
                format: format.combine(
                    format.colorize(),
                    format.printf(({ timestamp, level, message, ...meta }) => {
                        const metaStr = Object.keys(meta).length > 0
                            ? ` ${JSON.stringify(meta)}`
                            : '';
                        return `${timestamp} [${level}] ${message}${metaStr}`;
                    })
                ),
            }),
        ],
    });
}

/**
 * Server log lines carry their own timestamp (the request's completion
 * time), so the format prints the message as-is.
 */
export function createServerLog(transport: TransportStream): Logger {
    return createLogger({
        level: 'info',
        format: format.printf(({ message }) => String(message)),
        transports: [transport],
    });
}

export function serverLogFile(filename: string): TransportStream {
    return new transports.File({ filename });
}
