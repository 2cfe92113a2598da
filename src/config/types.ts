/**
 * @file Generation Config Types
 *
 * The resolved, read-only configuration snapshot shared by every component
 * for the lifetime of one run. Produced by `config_parse` after schema and
 * semantic validation; never mutated afterwards (the loader deep-freezes it).
 *
 * @module config
 */

/**
 * The ten simulated services. Order is the canonical listing order used by
 * status output and by the orchestrator when it starts controllers.
 */
export const SERVICE_TYPES = [
    'nginx',
    'java_app',
    'kubernetes',
    'system_access',
    'ecommerce',
    'api_gateway',
    'database',
    'docker',
    'cdn',
    'cicd',
] as const;

export type ServiceType = typeof SERVICE_TYPES[number];

/** Seeds are unsigned 32-bit integers. */
export const SEED_MAX: number = 0xffffffff;

export function seed_isValid(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value <= SEED_MAX;
}

export function serviceType_is(value: string): value is ServiceType {
    return SERVICE_TYPES.some((service: ServiceType): boolean => service === value);
}

export interface Host {
    readonly name: string;
    readonly ip: string;
    readonly role: string;
    readonly services: readonly ServiceType[];
}

export interface ServiceProfile {
    readonly description: string;
    /** Host names allowed to emit this service. Empty = hosts listing the service. */
    readonly hosts: readonly string[];
}

export interface Topology {
    readonly hosts: readonly Host[];
    readonly services: Readonly<Partial<Record<ServiceType, ServiceProfile>>>;
    readonly users: readonly string[];
}

export interface BurstConfig {
    readonly everySeconds: number;
    readonly durationSeconds: number;
    readonly intensity: number;
}

export interface AttackConfig {
    readonly enabled: boolean;
    readonly intensity: number;
    readonly sourceIps: readonly string[];
    readonly targetUsers: readonly string[];
    readonly targetEndpoints: readonly string[];
    readonly burst: BurstConfig | null;
}

export interface PeakHours {
    /** `HH:MM` or `HH:MM:SS`, local time. */
    readonly start: string;
    readonly end: string;
    readonly multiplier: number;
}

export interface FailureScenario {
    readonly probability: number;
    readonly slowdownFactor: number;
}

export interface BusinessConfig {
    readonly peakHours: PeakHours;
    readonly failureScenarios: Readonly<Record<string, FailureScenario>>;
}

export interface CorrelationConfig {
    readonly shareProbability: number;
    readonly window: number;
}

export interface RotationPolicy {
    readonly maxSizeMb: number;
    /** 0 disables age-based rotation. */
    readonly maxAgeSeconds: number;
}

export interface OutputConfig {
    readonly directory: string;
    readonly rotation: RotationPolicy;
}

export interface GenerationConfig {
    readonly rates: Readonly<Partial<Record<ServiceType, number>>>;
    readonly topology: Topology;
    readonly security: {
        readonly attackPatterns: Readonly<Record<string, AttackConfig>>;
    };
    readonly business: BusinessConfig;
    readonly correlation: CorrelationConfig;
    readonly output: OutputConfig;
    readonly seed: number | null;
}

/** Attack patterns the generators consult by name. */
export type AttackPatternName = 'brute_force' | 'api_abuse';

/** Failure scenarios the generators consult by name. */
export type FailureScenarioName = 'payment_gateway_outage' | 'database_slowdown';
