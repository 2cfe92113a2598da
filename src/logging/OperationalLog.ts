/**
 * @file Operational Log
 *
 * The generator's own diagnostics: lifecycle, rotation, dropped records.
 * Never mixed into the synthetic streams.
 *
 * Line format: `<ISO timestamp> - <LEVEL> - <message>`. The console
 * transport colors the line with chalk; the file transport writes it plain.
 *
 * @module logging
 */

import fs from 'fs';
import chalk from 'chalk';
import type { LogLevel } from '../config/settings.js';
import { errorMessage_get } from '../errors.js';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Receives fully formatted lines at or above the configured level.
 */
export type LogTransport = (line: string, level: LogLevel) => void;

export interface OperationalLogOptions {
    level: LogLevel;
    transports: LogTransport[];
    now?: () => Date;
}

export class OperationalLog {
    private readonly threshold: number;
    private readonly now: () => Date;

    constructor(private readonly options: OperationalLogOptions) {
        this.threshold = LEVEL_RANK[options.level];
        this.now = options.now ?? ((): Date => new Date());
    }

    debug(message: string): void {
        this.entry_write('debug', message);
    }

    info(message: string): void {
        this.entry_write('info', message);
    }

    warn(message: string): void {
        this.entry_write('warn', message);
    }

    error(message: string, err?: unknown): void {
        this.entry_write('error', err === undefined ? message : `${message}: ${errorMessage_get(err)}`);
    }

    level_enabled(level: LogLevel): boolean {
        return LEVEL_RANK[level] >= this.threshold;
    }

    private entry_write(level: LogLevel, message: string): void {
        if (!this.level_enabled(level)) return;
        const line: string = `${this.now().toISOString()} - ${level.toUpperCase()} - ${message}`;
        for (const transport of this.options.transports) {
            transport(line, level);
        }
    }
}

/**
 * Colored stdout/stderr transport.
 */
export function consoleTransport_create(): LogTransport {
    return (line: string, level: LogLevel): void => {
        switch (level) {
            case 'debug': console.log(chalk.gray(line)); break;
            case 'info':  console.log(chalk.white(line)); break;
            case 'warn':  console.warn(chalk.yellow(line)); break;
            case 'error': console.error(chalk.red(line)); break;
        }
    };
}

export interface FileTransport {
    transport: LogTransport;
    close(): Promise<void>;
}

/**
 * Append-only file transport. Stream errors are reported once to stderr
 * and further lines are discarded; the operational log must not stop
 * generation.
 */
export function fileTransport_create(filePath: string): FileTransport {
    const stream: fs.WriteStream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    let broken: boolean = false;

    stream.on('error', (err: Error): void => {
        if (!broken) {
            console.error(chalk.red(`operational log file unavailable (${filePath}): ${err.message}`));
        }
        broken = true;
    });

    return {
        transport: (line: string): void => {
            if (!broken) stream.write(`${line}\n`);
        },
        close: (): Promise<void> => new Promise<void>((resolve): void => {
            if (broken || stream.closed) {
                resolve();
                return;
            }
            stream.end((): void => resolve());
        }),
    };
}

/**
 * Log that discards everything; used where a caller supplies none.
 */
export function operationalLog_silent(): OperationalLog {
    return new OperationalLog({ level: 'error', transports: [] });
}
