/**
 * @file CLI Argument Parsing
 *
 * Flat flag parser for the `synthlog` command. Returns a result object
 * rather than exiting so it can be tested directly.
 *
 * @module cli
 */

import { LOG_LEVELS, type LogLevel } from '../config/settings.js';
import { SEED_MAX, seed_isValid } from '../config/types.js';

export interface CliOptions {
    config: string;
    status: boolean;
    help: boolean;
    durationSeconds?: number;
    seed?: number;
    output?: string;
    simulateFrom?: Date;
    logFile?: string;
    logLevel?: LogLevel;
}

export type CliParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

export const USAGE: string = [
    'Usage: synthlog [options]',
    '',
    'Options:',
    '  -c, --config <path>         Configuration file (default: config.yaml)',
    '  -d, --duration <seconds>    Run for the given number of seconds, then stop',
    '  -s, --status                Print configuration and output paths, then exit',
    '      --seed <n>              Fixed random seed (reproducible output)',
    '  -o, --output <dir>          Output directory (overrides the config)',
    '      --simulate-from <date>  Backfill on simulated time from an ISO date (needs --duration)',
    '      --log-file <path>       Also write the operational log to a file',
    '      --log-level <level>     debug | info | warn | error',
    '  -h, --help                  Show this help',
].join('\n');

const NEGATIVE_NUMBER: RegExp = /^-\d/;

/**
 * Parse argv (without the node and script entries).
 */
export function cliArgs_parse(argv: readonly string[]): CliParseResult {
    const options: CliOptions = { config: 'config.yaml', status: false, help: false };

    for (let i = 0; i < argv.length; i++) {
        const arg: string = argv[i];
        const value = (): string | undefined => {
            const next: string | undefined = argv[i + 1];
            if (next === undefined || (next.startsWith('-') && !NEGATIVE_NUMBER.test(next))) return undefined;
            i += 1;
            return next;
        };

        switch (arg) {
            case '-c':
            case '--config': {
                const v: string | undefined = value();
                if (!v) return { ok: false, error: `${arg} needs a path` };
                options.config = v;
                break;
            }
            case '-d':
            case '--duration': {
                const v: string | undefined = value();
                const seconds: number = Number(v);
                if (!v || !Number.isFinite(seconds) || seconds <= 0) {
                    return { ok: false, error: `${arg} needs a positive number of seconds` };
                }
                options.durationSeconds = seconds;
                break;
            }
            case '-s':
            case '--status':
                options.status = true;
                break;
            case '-h':
            case '--help':
                options.help = true;
                break;
            case '--seed': {
                const v: string | undefined = value();
                const seed: number = Number(v);
                if (!v || !seed_isValid(seed)) return { ok: false, error: `--seed needs an integer from 0 to ${SEED_MAX}` };
                options.seed = seed;
                break;
            }
            case '-o':
            case '--output': {
                const v: string | undefined = value();
                if (!v) return { ok: false, error: `${arg} needs a directory` };
                options.output = v;
                break;
            }
            case '--simulate-from': {
                const v: string | undefined = value();
                const start: Date = new Date(v ?? '');
                if (!v || Number.isNaN(start.getTime())) return { ok: false, error: '--simulate-from needs an ISO date' };
                options.simulateFrom = start;
                break;
            }
            case '--log-file': {
                const v: string | undefined = value();
                if (!v) return { ok: false, error: '--log-file needs a path' };
                options.logFile = v;
                break;
            }
            case '--log-level': {
                const v: string | undefined = value();
                const level: LogLevel | undefined = LOG_LEVELS.find((l: LogLevel): boolean => l === v);
                if (!level) return { ok: false, error: `--log-level must be one of ${LOG_LEVELS.join(', ')}` };
                options.logLevel = level;
                break;
            }
            default:
                return { ok: false, error: `Unknown option: ${arg}` };
        }
    }

    if (options.simulateFrom && options.durationSeconds === undefined) {
        return { ok: false, error: '--simulate-from requires --duration' };
    }
    return { ok: true, options };
}
