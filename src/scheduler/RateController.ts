/**
 * @file Rate Controller
 *
 * Drives one service at `rate * multiplier_current(now)` events per second.
 *
 * Deadlines advance by exact intervals from the previous deadline rather
 * than from the end of the previous write, so fractional rates hold on
 * average. A controller that falls more than `MAX_LAG_MS` behind (slow
 * sink) resets its deadline instead of bursting to catch up. While the
 * effective rate is zero the controller parks until the scenario engine's
 * next transition.
 *
 * The controller owns no I/O; each tick hands a context to the generator
 * and the resulting line to the sink. A failure in either is recorded and
 * the loop continues.
 *
 * @module scheduler
 */

import type { ServiceProfile, ServiceType } from '../config/types.js';
import { GenerationError, errorMessage_get } from '../errors.js';
import type { GenerationContext, LogRecord, ServiceGenerator } from '../generators/types.js';
import type { CorrelationFabric } from '../identity/CorrelationFabric.js';
import type { IdentityFabric } from '../identity/IdentityFabric.js';
import type { RandomSource } from '../identity/RandomSource.js';
import type { OperationalLog } from '../logging/OperationalLog.js';
import type { ScenarioEngine } from '../scenario/ScenarioEngine.js';
import type { LogSink } from '../sink/types.js';
import type { Clock } from './Clock.js';

export interface ControllerCounters {
    generated: number;
    written: number;
    dropped: number;
    failed: number;
}

export interface RateControllerDeps {
    service: ServiceType;
    baseRate: number;
    profile: ServiceProfile;
    generator: ServiceGenerator;
    random: RandomSource;
    clock: Clock;
    sink: LogSink;
    scenario: ScenarioEngine;
    correlation: CorrelationFabric;
    identities: IdentityFabric;
    log: OperationalLog;
}

const MAX_LAG_MS: number = 1000;

export class RateController {
    public readonly service: ServiceType;
    private readonly counters: ControllerCounters = { generated: 0, written: 0, dropped: 0, failed: 0 };

    constructor(private readonly deps: RateControllerDeps) {
        this.service = deps.service;
    }

    /**
     * Events per second at `now`.
     */
    rate_effective(now: Date): number {
        return Math.max(0, this.deps.baseRate * this.deps.scenario.multiplier_current(now));
    }

    counters_get(): ControllerCounters {
        return { ...this.counters };
    }

    /**
     * Produce until `signal` aborts. Resolves after the in-flight write (if
     * any) has settled.
     */
    async run(signal: AbortSignal): Promise<void> {
        const { clock } = this.deps;
        let deadline: number = clock.now();

        while (!signal.aborted) {
            const now: number = clock.now();
            const rate: number = this.rate_effective(new Date(now));

            if (rate <= 0) {
                const resumeAt: number = this.deps.scenario.transition_next(new Date(now)).getTime();
                await clock.sleep(resumeAt - now, signal);
                deadline = clock.now();
                continue;
            }

            if (now < deadline) {
                await clock.sleep(deadline - now, signal);
                continue;
            }

            await this.tick_fire(new Date(now));

            deadline += 1000 / rate;
            if (clock.now() - deadline > MAX_LAG_MS) {
                deadline = clock.now();
            }
        }
    }

    /**
     * Generate and write exactly one record.
     */
    async tick_fire(now: Date): Promise<void> {
        const { service, scenario, sink, log } = this.deps;
        scenario.tick(now);

        let record: LogRecord;
        try {
            record = this.deps.generator.record_produce(this.context_build(now));
        } catch (err: unknown) {
            this.counters.failed += 1;
            const failure: GenerationError = new GenerationError(service, `record skipped: ${errorMessage_get(err)}`, { cause: err });
            log.warn(failure.message);
            return;
        }
        this.counters.generated += 1;

        try {
            const ok: boolean = await sink.line_write(service, record.text);
            if (ok) this.counters.written += 1;
            else this.counters.dropped += 1;
        } catch (err: unknown) {
            this.counters.dropped += 1;
            log.error(`[${service}] sink rejected write, record dropped`, err);
        }
    }

    private context_build(now: Date): GenerationContext {
        const { service, random, identities, correlation, scenario, profile } = this.deps;
        return {
            timestamp: now,
            correlation: correlation.correlation_begin(service, now.getTime(), random),
            host: identities.host_pick(service, random),
            profile,
            random,
            scenario,
            identities,
        };
    }
}
