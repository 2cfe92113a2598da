/**
 * @file Status Report
 *
 * Renders the `--status` view: rates (base and time-adjusted), peak-hour
 * state, host topology, scenarios, resolved settings and the directory
 * each service writes to. Headings are colored with chalk; rows are plain.
 *
 * @module cli
 */

import path from 'path';
import chalk from 'chalk';
import type { SettingsReport, SettingsKey } from '../config/settings.js';
import { SERVICE_TYPES, type GenerationConfig, type Host, type ServiceType } from '../config/types.js';
import type { ScenarioEngine } from '../scenario/ScenarioEngine.js';

const RULE: string = '='.repeat(50);

export interface StatusInput {
    config: GenerationConfig;
    settings: SettingsReport;
    scenario: ScenarioEngine;
    now: Date;
}

/**
 * Output directory for one service.
 */
export function serviceDirectory_resolve(outputDirectory: string, service: ServiceType): string {
    return path.resolve(outputDirectory, service);
}

function rate_format(rate: number): string {
    return rate.toFixed(1).padStart(5);
}

function section(title: string): string {
    return chalk.bold.cyan(title);
}

export function status_render(input: StatusInput): string {
    const { config, settings, scenario, now } = input;
    const peak = config.business.peakHours;
    const inPeak: boolean = scenario.peakWindow_contains(now);
    const lines: string[] = [];

    lines.push(RULE, chalk.bold('LOG GENERATOR STATUS'), RULE);
    lines.push(`Peak Hours: ${inPeak ? 'ACTIVE' : 'inactive'} (${peak.start}-${peak.end}, x${peak.multiplier})`);

    lines.push('', section('CONFIGURED LOG TYPES:'));
    for (const service of SERVICE_TYPES) {
        const rate: number | undefined = config.rates[service];
        if (rate === undefined) continue;
        const adjusted: number = rate * scenario.multiplier_current(now);
        lines.push(`  ${service.padEnd(15)} - ${rate_format(rate)}/s (adjusted: ${rate_format(adjusted)}/s)`);
    }

    lines.push('', section('OUTPUT PATHS:'));
    for (const service of SERVICE_TYPES) {
        if (config.rates[service] === undefined) continue;
        const dir: string = serviceDirectory_resolve(settings.outputDirectory.value, service);
        lines.push(`  ${service.padEnd(15)} - ${dir}${path.sep}${service}_<yyyyMMdd_HHmmss>.log`);
    }
    const rotation = config.output.rotation;
    lines.push(`  rotation: ${rotation.maxSizeMb} MB` + (rotation.maxAgeSeconds > 0 ? `, ${rotation.maxAgeSeconds} s` : ''));

    lines.push('', section('HOST SIMULATION:'));
    for (const host of config.topology.hosts) {
        lines.push(`  ${host.name.padEnd(15)} (${host.ip}) - ${host_describe(host)}`);
    }

    lines.push('', section('ATTACK PATTERNS:'));
    const attacks = Object.entries(config.security.attackPatterns);
    if (attacks.length === 0) lines.push('  (none)');
    for (const [name, attack] of attacks) {
        const burst: string = attack.burst
            ? `, bursts of ${attack.burst.durationSeconds}s every ${attack.burst.everySeconds}s at ${attack.burst.intensity}`
            : '';
        lines.push(`  ${name.padEnd(15)} - ${attack.enabled ? 'enabled' : 'disabled'}, intensity ${attack.intensity}, ${attack.sourceIps.length} source IPs${burst}`);
    }

    lines.push('', section('FAILURE SCENARIOS:'));
    const failures = Object.entries(config.business.failureScenarios);
    if (failures.length === 0) lines.push('  (none)');
    for (const [name, failure] of failures) {
        const factor: string = failure.slowdownFactor > 1 ? `, slowdown x${failure.slowdownFactor}` : '';
        lines.push(`  ${name} - probability ${failure.probability}${factor}`);
    }

    lines.push('', section('SETTINGS:'));
    const keys: SettingsKey[] = ['seed', 'outputDirectory', 'logLevel', 'logFile', 'drainTimeoutMs'];
    for (const key of keys) {
        const entry = settings[key];
        lines.push(`  ${key.padEnd(15)} - ${entry.value === null ? '(none)' : String(entry.value)} [${entry.source}]`);
    }

    return lines.join('\n');
}

function host_describe(host: Host): string {
    const services: string = host.services.length > 0 ? host.services.join(', ') : '(no services)';
    return `${host.role}: ${services}`;
}
