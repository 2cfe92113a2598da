/**
 * @file CLI Runner
 *
 * Everything the `synthlog` command does, minus process wiring: parse
 * flags, load the configuration, resolve settings, then either print the
 * status report or run the orchestrator until the duration elapses or
 * `signal` aborts. Returns the process exit code.
 *
 * @module cli
 */

import chalk from 'chalk';
import { config_load } from '../config/loader.js';
import { SettingsService, type ResolvedSettings } from '../config/settings.js';
import type { GenerationConfig } from '../config/types.js';
import { ConfigError } from '../errors.js';
import {
    OperationalLog,
    consoleTransport_create,
    fileTransport_create,
    type FileTransport,
    type LogTransport,
} from '../logging/OperationalLog.js';
import { ScenarioEngine } from '../scenario/ScenarioEngine.js';
import { SimulatedClock, SystemClock, type Clock } from '../scheduler/Clock.js';
import { GenerationOrchestrator, type RunSummary } from '../scheduler/GenerationOrchestrator.js';
import type { ControllerCounters } from '../scheduler/RateController.js';
import { FileSink } from '../sink/FileSink.js';
import { USAGE, cliArgs_parse, type CliOptions } from './args.js';
import { status_render } from './status.js';

export const EXIT_OK: number = 0;
export const EXIT_CONFIG: number = 1;
export const EXIT_USAGE: number = 2;

export interface CliIo {
    out(text: string): void;
    err(text: string): void;
}

export interface CliRunOptions {
    io?: CliIo;
    env?: Record<string, string | undefined>;
    /** Aborting triggers a graceful drain. */
    signal?: AbortSignal;
    /** Extra operational-log transports (tests). */
    transports?: LogTransport[];
}

const consoleIo: CliIo = {
    out: (text: string): void => console.log(text),
    err: (text: string): void => console.error(text),
};

export async function cli_run(argv: readonly string[], runOptions: CliRunOptions = {}): Promise<number> {
    const io: CliIo = runOptions.io ?? consoleIo;
    const parsed = cliArgs_parse(argv);
    if (!parsed.ok) {
        io.err(chalk.red(parsed.error));
        io.err(USAGE);
        return EXIT_USAGE;
    }
    const options: CliOptions = parsed.options;
    if (options.help) {
        io.out(USAGE);
        return EXIT_OK;
    }

    let config: GenerationConfig;
    try {
        config = await config_load(options.config);
    } catch (err: unknown) {
        if (!(err instanceof ConfigError)) throw err;
        configError_print(io, options.config, err);
        return EXIT_CONFIG;
    }

    const settings: SettingsService = new SettingsService(config, {
        seed: options.seed,
        outputDirectory: options.output,
        logLevel: options.logLevel,
        logFile: options.logFile,
    }, runOptions.env ?? process.env);

    if (options.status) {
        io.out(status_render({
            config,
            settings: settings.report(),
            scenario: new ScenarioEngine(config),
            now: options.simulateFrom ?? new Date(),
        }));
        return EXIT_OK;
    }

    const resolved: ResolvedSettings = settings.snapshot();
    const fileTransport: FileTransport | null = resolved.logFile ? fileTransport_create(resolved.logFile) : null;
    const transports: LogTransport[] = [consoleTransport_create(), ...(runOptions.transports ?? [])];
    if (fileTransport) transports.push(fileTransport.transport);
    const log: OperationalLog = new OperationalLog({ level: resolved.logLevel, transports });

    const clock: Clock = options.simulateFrom ? new SimulatedClock(options.simulateFrom) : new SystemClock();
    if (options.simulateFrom) {
        log.info(`Backfilling from ${options.simulateFrom.toISOString()} on simulated time`);
    }

    const orchestrator: GenerationOrchestrator = new GenerationOrchestrator({
        config,
        sink: new FileSink({
            directory: resolved.outputDirectory,
            rotation: config.output.rotation,
            log,
            now: (): number => clock.now(),
        }),
        clock,
        log,
        seed: resolved.seed,
        drainTimeoutMs: resolved.drainTimeoutMs,
    });

    try {
        const summary: RunSummary = await orchestrator.run({
            durationMs: options.durationSeconds === undefined ? undefined : options.durationSeconds * 1000,
            signal: runOptions.signal,
        });
        summary_log(log, summary);
    } finally {
        await fileTransport?.close();
    }
    return EXIT_OK;
}

function configError_print(io: CliIo, configPath: string, err: ConfigError): void {
    io.err(chalk.red(`Configuration error (${configPath}): ${err.summary}`));
    for (const issue of err.issues) {
        io.err(chalk.red(`  - ${issue}`));
    }
}

function summary_log(log: OperationalLog, summary: RunSummary): void {
    const seconds: string = ((summary.stoppedAt - summary.startedAt) / 1000).toFixed(1);
    log.info(`Stopped (${summary.reason}) after ${seconds}s${summary.drained ? '' : ', drain incomplete'}`);
    for (const [service, counters] of Object.entries(summary.services)) {
        if (counters) log.info(counters_describe(service, counters));
    }
}

function counters_describe(service: string, counters: ControllerCounters): string {
    return `  ${service.padEnd(15)} generated=${counters.generated} written=${counters.written} dropped=${counters.dropped} failed=${counters.failed}`;
}
