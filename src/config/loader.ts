/**
 * @file Config Loader
 *
 * Reads the YAML configuration document and turns it into a frozen
 * `GenerationConfig`. Validation happens in two passes:
 *
 *   1. Shape and single-field ranges — `ConfigDocumentSchema` (Zod).
 *   2. Cross-references — rates vs. topology, profile hosts vs. host list,
 *      attack pools for enabled patterns.
 *
 * Both passes collect every issue before failing, so one `ConfigError`
 * reports the whole document.
 *
 * The original document layout nests everything under `log_generator:`;
 * both that form and the flat form are accepted.
 *
 * @module config
 */

import fs from 'fs/promises';
import yaml from 'js-yaml';
import { ConfigError, errorMessage_get } from '../errors.js';
import { ConfigDocumentSchema, type RawAttack, type RawConfigDocument, type RawFailureScenario } from './schemas.js';
import {
    serviceType_is,
    type AttackConfig,
    type FailureScenario,
    type GenerationConfig,
    type Host,
    type ServiceProfile,
    type ServiceType,
} from './types.js';

/**
 * Parse a YAML configuration document.
 *
 * @throws ConfigError on malformed YAML, schema violations or dangling references.
 */
export function config_parse(yamlText: string): GenerationConfig {
    let raw: unknown;
    try {
        raw = yaml.load(yamlText);
    } catch (err: unknown) {
        throw new ConfigError('Configuration is not valid YAML', [errorMessage_get(err)], { cause: err });
    }
    return config_fromObject(raw);
}

/**
 * Validate an already-decoded document (YAML or JSON).
 */
export function config_fromObject(raw: unknown): GenerationConfig {
    const doc: unknown = document_unwrap(raw);

    const result = ConfigDocumentSchema.safeParse(doc);
    if (!result.success) {
        const issues: string[] = result.error.issues.map(i => `[${i.path.join('.')}] ${i.message}`);
        throw new ConfigError('Invalid configuration', issues);
    }

    const issues: string[] = references_check(result.data);
    if (issues.length > 0) {
        throw new ConfigError('Invalid configuration', issues);
    }

    return deep_freeze(config_build(result.data));
}

/**
 * Read and parse a configuration file.
 *
 * @throws ConfigError if the file cannot be read or is invalid.
 */
export async function config_load(filePath: string): Promise<GenerationConfig> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf-8');
    } catch (err: unknown) {
        throw new ConfigError(`Configuration file not readable: ${filePath}`, [errorMessage_get(err)], { cause: err });
    }
    return config_parse(text);
}

function document_unwrap(raw: unknown): unknown {
    if (raw !== null && typeof raw === 'object' && 'log_generator' in raw) {
        return raw.log_generator;
    }
    return raw;
}

function references_check(doc: RawConfigDocument): string[] {
    const issues: string[] = [];
    const hostNames: Set<string> = new Set<string>();

    doc.topology.hosts.forEach((host, index: number): void => {
        if (hostNames.has(host.name)) {
            issues.push(`[topology.hosts.${index}.name] duplicate host '${host.name}'`);
        }
        hostNames.add(host.name);
        for (const service of host.services) {
            if (!serviceType_is(service)) {
                issues.push(`[topology.hosts.${index}.services] unknown service type '${service}'`);
            }
        }
    });

    for (const [service, profile] of Object.entries(doc.topology.services)) {
        if (!serviceType_is(service)) {
            issues.push(`[topology.services.${service}] unknown service type '${service}'`);
        }
        for (const hostName of profile.hosts) {
            if (!hostNames.has(hostName)) {
                issues.push(`[topology.services.${service}.hosts] unknown host '${hostName}'`);
            }
        }
    }

    for (const service of Object.keys(doc.rates)) {
        if (!serviceType_is(service)) {
            issues.push(`[rates.${service}] unknown service type '${service}'`);
        } else if (!(service in doc.topology.services)) {
            issues.push(`[rates.${service}] service is not declared in topology.services`);
        }
    }

    for (const [name, attack] of Object.entries(doc.security.attack_patterns)) {
        if (attack.enabled && attack.source_ips.length === 0) {
            issues.push(`[security.attack_patterns.${name}.source_ips] enabled pattern needs at least one source IP`);
        }
    }

    return issues;
}

function config_build(doc: RawConfigDocument): GenerationConfig {
    const rates: Partial<Record<ServiceType, number>> = {};
    for (const [service, rate] of Object.entries(doc.rates)) {
        if (serviceType_is(service)) rates[service] = rate;
    }

    const services: Partial<Record<ServiceType, ServiceProfile>> = {};
    for (const [service, profile] of Object.entries(doc.topology.services)) {
        if (serviceType_is(service)) {
            services[service] = { description: profile.description, hosts: [...profile.hosts] };
        }
    }

    const hosts: Host[] = doc.topology.hosts.map((h): Host => ({
        name:     h.name,
        ip:       h.ip,
        role:     h.role,
        services: h.services.filter(serviceType_is),
    }));

    const attackPatterns: Record<string, AttackConfig> = {};
    for (const [name, attack] of Object.entries(doc.security.attack_patterns)) {
        attackPatterns[name] = attack_build(attack);
    }

    const failureScenarios: Record<string, FailureScenario> = {};
    for (const [name, scenario] of Object.entries(doc.business.failure_scenarios)) {
        failureScenarios[name] = failure_build(scenario);
    }

    return {
        rates,
        topology: { hosts, services, users: [...doc.topology.users] },
        security: { attackPatterns },
        business: {
            peakHours: {
                start:      doc.business.peak_hours.start,
                end:        doc.business.peak_hours.end,
                multiplier: doc.business.peak_hours.multiplier,
            },
            failureScenarios,
        },
        correlation: {
            shareProbability: doc.correlation.share_probability,
            window:           doc.correlation.window,
        },
        output: {
            directory: doc.output.directory,
            rotation: {
                maxSizeMb:     doc.output.rotation.max_size_mb,
                maxAgeSeconds: doc.output.rotation.max_age_seconds,
            },
        },
        seed: doc.seed,
    };
}

function attack_build(raw: RawAttack): AttackConfig {
    return {
        enabled:         raw.enabled,
        intensity:       raw.intensity,
        sourceIps:       [...raw.source_ips],
        targetUsers:     [...raw.target_users],
        targetEndpoints: [...raw.target_endpoints],
        burst: raw.burst
            ? {
                everySeconds:    raw.burst.every_seconds,
                durationSeconds: raw.burst.duration_seconds,
                intensity:       raw.burst.intensity,
            }
            : null,
    };
}

function failure_build(raw: RawFailureScenario): FailureScenario {
    if (typeof raw === 'number') {
        return { probability: raw, slowdownFactor: 1 };
    }
    return { probability: raw.probability, slowdownFactor: raw.slowdown_factor };
}

function deep_freeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deep_freeze(child);
        }
    }
    return value;
}
