/**
 * @file Config Document Schemas
 *
 * Zod runtime schemas for the YAML configuration document. Keys are
 * snake_case as written in the document; `config_parse` maps the validated
 * result onto the camelCase `GenerationConfig`.
 *
 * Range checks that only involve one field live here. Cross-references
 * (rates vs. topology, profile hosts vs. host list) are checked afterwards
 * in loader.ts.
 *
 * @module config/schemas
 */

import { z } from 'zod';
import { SEED_MAX } from './types.js';

const probability = z.number().min(0, 'must be >= 0').max(1, 'must be <= 1');

/** `HH:MM` or `HH:MM:SS`, 24-hour clock. */
const ClockTimeSchema = z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/, 'must be HH:MM or HH:MM:SS');

// ─── Topology ─────────────────────────────────────────────────────────────────

export const HostSchema = z.object({
    name:     z.string().min(1, 'host name is required'),
    ip:       z.string().ip({ version: 'v4', message: 'must be an IPv4 address' }),
    role:     z.string().default('generic'),
    services: z.array(z.string()).default([]),
});

export const ServiceProfileSchema = z.object({
    description: z.string().default(''),
    hosts:       z.array(z.string()).default([]),
}).nullable().transform(v => v ?? { description: '', hosts: [] });

export const TopologySchema = z.object({
    hosts:    z.array(HostSchema).min(1, 'at least one host is required'),
    services: z.record(z.string(), ServiceProfileSchema),
    users:    z.array(z.string().min(1)).default(['admin', 'deploy', 'monitoring', 'backup']),
});

// ─── Security ─────────────────────────────────────────────────────────────────

export const BurstSchema = z.object({
    every_seconds:    z.number().positive('must be > 0'),
    duration_seconds: z.number().positive('must be > 0'),
    intensity:        probability,
});

export const AttackSchema = z.object({
    enabled:          z.boolean().default(true),
    intensity:        probability,
    source_ips:       z.array(z.string().ip({ version: 'v4', message: 'must be an IPv4 address' })).default([]),
    target_users:     z.array(z.string()).default(['admin', 'root', 'administrator']),
    target_endpoints: z.array(z.string()).default([]),
    burst:            BurstSchema.nullable().default(null),
});

// ─── Business ─────────────────────────────────────────────────────────────────

export const PeakHoursSchema = z.object({
    start:      ClockTimeSchema,
    end:        ClockTimeSchema,
    multiplier: z.number().min(0, 'must be >= 0'),
});

/**
 * A failure scenario is either a bare probability or an object carrying the
 * probability plus scenario-specific parameters.
 */
export const FailureScenarioSchema = z.union([
    probability,
    z.object({
        probability:     probability,
        slowdown_factor: z.number().min(1, 'must be >= 1').default(1),
    }),
]);

export const BusinessSchema = z.object({
    peak_hours:        PeakHoursSchema.default({ start: '09:00', end: '17:00', multiplier: 1 }),
    failure_scenarios: z.record(z.string(), FailureScenarioSchema).default({}),
});

// ─── Document ─────────────────────────────────────────────────────────────────

export const CorrelationSchema = z.object({
    share_probability: probability.default(0.3),
    window:            z.number().int().min(1, 'must be >= 1').default(64),
});

export const OutputSchema = z.object({
    directory: z.string().min(1).default('./logs'),
    rotation:  z.object({
        max_size_mb:     z.number().positive('must be > 0').default(100),
        max_age_seconds: z.number().min(0, 'must be >= 0').default(0),
    }).default({}),
});

export const ConfigDocumentSchema = z.object({
    rates:       z.record(z.string(), z.number().min(0, 'rate must be >= 0')),
    topology:    TopologySchema,
    security:    z.object({
        attack_patterns: z.record(z.string(), AttackSchema).default({}),
    }).default({}),
    business:    BusinessSchema.default({}),
    correlation: CorrelationSchema.default({}),
    output:      OutputSchema.default({}),
    seed:        z.number().int().min(0, 'seed must be >= 0').max(SEED_MAX, `seed must be <= ${SEED_MAX}`).nullable().default(null),
});

export type RawConfigDocument = z.infer<typeof ConfigDocumentSchema>;
export type RawAttack = z.infer<typeof AttackSchema>;
export type RawFailureScenario = z.infer<typeof FailureScenarioSchema>;
