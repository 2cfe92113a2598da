/**
 * @file Test Fixtures
 *
 * Configuration documents and generation contexts shared by the test
 * suites. Not part of the runtime surface.
 */

import { config_fromObject } from '../config/loader.js';
import { SERVICE_TYPES, type GenerationConfig, type Host, type ServiceType } from '../config/types.js';
import type { GenerationContext } from '../generators/types.js';
import { CorrelationFabric } from '../identity/CorrelationFabric.js';
import { IdentityFabric } from '../identity/IdentityFabric.js';
import { randomSource_create, type RandomSource } from '../identity/RandomSource.js';
import { ScenarioEngine } from '../scenario/ScenarioEngine.js';

export const ATTACKER_IPS: readonly string[] = ['203.0.113.15', '198.51.100.23'];

/**
 * A valid document declaring all ten services at 1 event/s on two hosts.
 * Top-level sections in `overrides` replace the defaults wholesale.
 */
export function document_create(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        rates: rates_create(),
        topology: topology_create(),
        business: {
            peak_hours: { start: '09:00', end: '17:00', multiplier: 1 },
        },
        ...overrides,
    };
}

/** Every service at `rate` events/s. */
export function rates_create(rate: number = 1): Record<string, number> {
    const rates: Record<string, number> = {};
    for (const service of SERVICE_TYPES) rates[service] = rate;
    return rates;
}

/** Two hosts; every service declared with an empty profile unless `omit`ted. */
export function topology_create(omit: readonly ServiceType[] = []): Record<string, unknown> {
    const services: Record<string, null> = {};
    for (const service of SERVICE_TYPES) {
        if (!omit.includes(service)) services[service] = null;
    }
    return {
        hosts: [
            { name: 'web-01', ip: '10.0.1.10', role: 'frontend', services: ['nginx', 'cdn', 'system_access'] },
            { name: 'app-01', ip: '10.0.2.10', role: 'application', services: [...SERVICE_TYPES] },
        ],
        services,
    };
}

export function config_create(overrides: Record<string, unknown> = {}): GenerationConfig {
    return config_fromObject(document_create(overrides));
}

export interface ContextFactory {
    scenario: ScenarioEngine;
    identities: IdentityFabric;
    random: RandomSource;
    context_next(service: ServiceType, at?: Date): GenerationContext;
}

/**
 * Builds generation contexts the way a rate controller does, on a seeded stream.
 */
export function contextFactory_create(config: GenerationConfig, seed: number = 7): ContextFactory {
    const scenario: ScenarioEngine = new ScenarioEngine(config);
    const identities: IdentityFabric = new IdentityFabric(config, randomSource_create(seed, 'identity'));
    const correlation: CorrelationFabric = new CorrelationFabric(config.correlation);
    const random: RandomSource = randomSource_create(seed, 'fixture');

    return {
        scenario,
        identities,
        random,
        context_next(service: ServiceType, at: Date = new Date(2026, 9, 19, 10, 30, 0)): GenerationContext {
            scenario.tick(at);
            const host: Host = identities.host_pick(service, random);
            return {
                timestamp: at,
                correlation: correlation.correlation_begin(service, at.getTime(), random),
                host,
                profile: config.topology.services[service] ?? { description: '', hosts: [] },
                random,
                scenario,
                identities,
            };
        },
    };
}
