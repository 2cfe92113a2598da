/**
 * @file Runtime Settings Service
 *
 * Run-scoped settings with central validation and deterministic precedence
 * (CLI flag > env > config document > defaults). Each resolved value records
 * where it came from so `--status` can show it.
 *
 * @module
 */

import { seed_isValid, type GenerationConfig } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface SettingsOverrides {
    seed?: number;
    outputDirectory?: string;
    logLevel?: LogLevel;
    logFile?: string;
    drainTimeoutMs?: number;
}

export interface ResolvedSettings {
    seed: number | null;
    outputDirectory: string;
    logLevel: LogLevel;
    logFile: string | null;
    drainTimeoutMs: number;
}

export type SettingsKey = keyof ResolvedSettings;

export type SettingSource = 'cli' | 'env' | 'config' | 'default';

export interface ResolvedSetting<T> {
    value: T;
    source: SettingSource;
}

export type SettingsReport = { [K in SettingsKey]: ResolvedSetting<ResolvedSettings[K]> };

interface NumericBounds {
    min: number;
    max: number;
}

const ENV_KEYS: Record<SettingsKey, string> = {
    seed:            'SYNTHLOG_SEED',
    outputDirectory: 'SYNTHLOG_OUTPUT_DIR',
    logLevel:        'SYNTHLOG_LOG_LEVEL',
    logFile:         'SYNTHLOG_LOG_FILE',
    drainTimeoutMs:  'SYNTHLOG_DRAIN_TIMEOUT_MS',
};

export class SettingsService {
    private readonly defaults: ResolvedSettings = {
        seed: null,
        outputDirectory: './logs',
        logLevel: 'info',
        logFile: null,
        drainTimeoutMs: 5000,
    };
    private readonly bounds: { drainTimeoutMs: NumericBounds } = {
        drainTimeoutMs: { min: 100, max: 60000 },
    };

    constructor(
        private readonly config: GenerationConfig | null,
        private readonly overrides: SettingsOverrides = {},
        private readonly env: Record<string, string | undefined> = process.env,
    ) {}

    /**
     * Return effective settings.
     */
    public snapshot(): ResolvedSettings {
        const report: SettingsReport = this.report();
        return {
            seed:            report.seed.value,
            outputDirectory: report.outputDirectory.value,
            logLevel:        report.logLevel.value,
            logFile:         report.logFile.value,
            drainTimeoutMs:  report.drainTimeoutMs.value,
        };
    }

    /**
     * Return effective settings together with their sources.
     */
    public report(): SettingsReport {
        return {
            seed:            this.seed_resolve(),
            outputDirectory: this.outputDirectory_resolve(),
            logLevel:        this.logLevel_resolve(),
            logFile:         this.logFile_resolve(),
            drainTimeoutMs:  this.drainTimeout_resolve(),
        };
    }

    private seed_resolve(): ResolvedSetting<number | null> {
        if (typeof this.overrides.seed === 'number') return { value: this.overrides.seed, source: 'cli' };
        const envSeed: number | undefined = this.envInteger_resolve(ENV_KEYS.seed);
        if (typeof envSeed === 'number' && seed_isValid(envSeed)) return { value: envSeed, source: 'env' };
        if (this.config && this.config.seed !== null) return { value: this.config.seed, source: 'config' };
        return { value: this.defaults.seed, source: 'default' };
    }

    private outputDirectory_resolve(): ResolvedSetting<string> {
        if (this.overrides.outputDirectory) return { value: this.overrides.outputDirectory, source: 'cli' };
        const envDir: string | undefined = this.envString_resolve(ENV_KEYS.outputDirectory);
        if (envDir) return { value: envDir, source: 'env' };
        if (this.config) return { value: this.config.output.directory, source: 'config' };
        return { value: this.defaults.outputDirectory, source: 'default' };
    }

    private logLevel_resolve(): ResolvedSetting<LogLevel> {
        if (this.overrides.logLevel) return { value: this.overrides.logLevel, source: 'cli' };
        const envLevel: string | undefined = this.envString_resolve(ENV_KEYS.logLevel)?.toLowerCase();
        const matched: LogLevel | undefined = LOG_LEVELS.find((l: LogLevel): boolean => l === envLevel);
        if (matched) return { value: matched, source: 'env' };
        return { value: this.defaults.logLevel, source: 'default' };
    }

    private logFile_resolve(): ResolvedSetting<string | null> {
        if (this.overrides.logFile) return { value: this.overrides.logFile, source: 'cli' };
        const envFile: string | undefined = this.envString_resolve(ENV_KEYS.logFile);
        if (envFile) return { value: envFile, source: 'env' };
        return { value: this.defaults.logFile, source: 'default' };
    }

    private drainTimeout_resolve(): ResolvedSetting<number> {
        if (typeof this.overrides.drainTimeoutMs === 'number') {
            return { value: this.value_clamp(this.overrides.drainTimeoutMs), source: 'cli' };
        }
        const envTimeout: number | undefined = this.envInteger_resolve(ENV_KEYS.drainTimeoutMs);
        if (typeof envTimeout === 'number') return { value: this.value_clamp(envTimeout), source: 'env' };
        return { value: this.defaults.drainTimeoutMs, source: 'default' };
    }

    private envString_resolve(key: string): string | undefined {
        const raw: string | undefined = this.env[key]?.trim();
        return raw ? raw : undefined;
    }

    private envInteger_resolve(key: string): number | undefined {
        const raw: string | undefined = this.envString_resolve(key);
        if (!raw) return undefined;

        const parsed: number = Number.parseInt(raw, 10);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private value_clamp(value: number): number {
        const bounds: NumericBounds = this.bounds.drainTimeoutMs;
        return Math.max(bounds.min, Math.min(bounds.max, Math.round(value)));
    }
}
