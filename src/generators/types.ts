/**
 * @file Generator Types
 *
 * Contracts for the per-service line generators. A generator is pure
 * logic: it turns a `GenerationContext` into one `LogRecord` and never
 * touches the filesystem.
 */

import type { Host, ServiceProfile, ServiceType } from '../config/types.js';
import type { CorrelationContext } from '../identity/CorrelationFabric.js';
import type { IdentityFabric } from '../identity/IdentityFabric.js';
import type { RandomSource } from '../identity/RandomSource.js';
import type { ScenarioEngine } from '../scenario/ScenarioEngine.js';

export type WireFormat = 'clf' | 'syslog' | 'json' | 'text';

export type RecordFields = Readonly<Record<string, string | number | boolean | null>>;

/**
 * One generated line. `fields` holds the sampled values the line was built
 * from, so tests and dry runs can compare them with what a parser extracts.
 */
export interface LogRecord {
    readonly service: ServiceType;
    readonly timestamp: Date;
    readonly text: string;
    readonly fields: RecordFields;
}

export interface GenerationContext {
    readonly timestamp: Date;
    readonly correlation: CorrelationContext;
    readonly host: Host;
    readonly profile: ServiceProfile;
    readonly random: RandomSource;
    readonly scenario: ScenarioEngine;
    readonly identities: IdentityFabric;
}

export interface ServiceGenerator {
    readonly service: ServiceType;
    readonly format: WireFormat;

    /**
     * Produce the next record. Must not throw on sampled values; out-of-range
     * samples are clamped.
     */
    record_produce(context: GenerationContext): LogRecord;
}
