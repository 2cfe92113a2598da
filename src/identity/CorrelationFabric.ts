/**
 * @file Correlation Fabric
 *
 * Creates the correlation identifiers that tie records from different
 * services into one simulated transaction. A bounded window of recently
 * begun transactions lets a service join a trace that another service
 * started, which is what makes cross-service lookups in the shipped data
 * return more than one record.
 *
 * Contexts are values: nothing holds on to them after they fall out of the
 * window.
 *
 * @module identity
 */

import type { CorrelationConfig, ServiceType } from '../config/types.js';
import type { RandomSource } from './RandomSource.js';

export interface CorrelationContext {
    readonly id: string;
    /** Service that began the transaction. */
    readonly origin: ServiceType;
    readonly createdAt: number;
}

export class CorrelationFabric {
    private readonly recent: CorrelationContext[] = [];

    constructor(private readonly config: CorrelationConfig) {}

    /**
     * UUID-grade identifier drawn from the caller's stream.
     */
    correlationId_new(random: RandomSource): string {
        return random.uuid();
    }

    /**
     * Begin (or join) a transaction on behalf of `service`.
     *
     * Joining only considers transactions begun by a different service;
     * otherwise a fresh context is created and remembered.
     */
    correlation_begin(service: ServiceType, at: number, random: RandomSource): CorrelationContext {
        const joinable: CorrelationContext[] = this.recent.filter(
            (c: CorrelationContext): boolean => c.origin !== service,
        );
        if (joinable.length > 0 && random.chance(this.config.shareProbability)) {
            return random.pick(joinable);
        }

        const context: CorrelationContext = Object.freeze({
            id: this.correlationId_new(random),
            origin: service,
            createdAt: at,
        });
        this.recent.push(context);
        if (this.recent.length > this.config.window) {
            this.recent.shift();
        }
        return context;
    }

    recent_count(): number {
        return this.recent.length;
    }
}
