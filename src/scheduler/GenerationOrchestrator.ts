/**
 * @file Generation Orchestrator
 *
 * Owns one `RateController` per configured service and their shared
 * lifetime:
 *
 *   idle ──start()──▶ running ──stop()/duration──▶ draining ──flushed──▶ stopped
 *
 * Controllers run concurrently on the event loop as one task group: they
 * share an AbortController, and `stop()` awaits all of them (bounded by the
 * drain timeout) before closing the sink. A controller only suspends on its
 * own clock sleep or its own sink write, so a slow service never holds up
 * another.
 *
 * @module scheduler
 */

import type { GenerationConfig, ServiceProfile, ServiceType } from '../config/types.js';
import { SERVICE_TYPES } from '../config/types.js';
import { generator_create } from '../generators/index.js';
import type { ServiceGenerator } from '../generators/types.js';
import { CorrelationFabric } from '../identity/CorrelationFabric.js';
import { IdentityFabric } from '../identity/IdentityFabric.js';
import { randomSource_create } from '../identity/RandomSource.js';
import type { OperationalLog } from '../logging/OperationalLog.js';
import { operationalLog_silent } from '../logging/OperationalLog.js';
import { ScenarioEngine } from '../scenario/ScenarioEngine.js';
import type { LogSink } from '../sink/types.js';
import { SystemClock, type Clock } from './Clock.js';
import { RateController, type ControllerCounters } from './RateController.js';

export type OrchestratorState = 'idle' | 'running' | 'draining' | 'stopped';

export type StopReason = 'duration' | 'signal' | 'requested';

export interface StateChange {
    from: OrchestratorState;
    to: OrchestratorState;
    at: number;
}

export interface OrchestratorOptions {
    config: GenerationConfig;
    sink: LogSink;
    clock?: Clock;
    log?: OperationalLog;
    seed?: number | null;
    scenario?: ScenarioEngine;
    drainTimeoutMs?: number;
    /** Replace the generator for selected services (tests). */
    generators?: Partial<Record<ServiceType, ServiceGenerator>>;
}

export interface RunOptions {
    /** Stop after this much (clock) time; omit to run until `signal`. */
    durationMs?: number;
    signal?: AbortSignal;
}

export interface RunSummary {
    reason: StopReason;
    startedAt: number;
    stoppedAt: number;
    services: Partial<Record<ServiceType, ControllerCounters>>;
    drained: boolean;
}

export class GenerationOrchestrator {
    private state: OrchestratorState = 'idle';
    private readonly controllers: RateController[] = [];
    private readonly observers: Set<(change: StateChange) => void> = new Set();
    private readonly clock: Clock;
    private readonly log: OperationalLog;
    private readonly scenario: ScenarioEngine;
    private readonly drainTimeoutMs: number;
    private abort: AbortController = new AbortController();
    private group: Promise<void> | null = null;
    private active: number = 0;
    private startedAt: number = 0;
    private drained: boolean = true;
    private stopping: Promise<void> | null = null;

    constructor(private readonly options: OrchestratorOptions) {
        this.clock = options.clock ?? new SystemClock();
        this.log = options.log ?? operationalLog_silent();
        this.scenario = options.scenario ?? new ScenarioEngine(options.config);
        this.drainTimeoutMs = options.drainTimeoutMs ?? 5000;
        this.controllers_build();
    }

    state_get(): OrchestratorState {
        return this.state;
    }

    services_list(): ServiceType[] {
        return this.controllers.map((c: RateController): ServiceType => c.service);
    }

    scenario_get(): ScenarioEngine {
        return this.scenario;
    }

    /**
     * Observe lifecycle transitions.
     *
     * @returns Unsubscribe function.
     */
    state_subscribe(observer: (change: StateChange) => void): () => void {
        this.observers.add(observer);
        return (): void => {
            this.observers.delete(observer);
        };
    }

    counters_get(): Partial<Record<ServiceType, ControllerCounters>> {
        const counters: Partial<Record<ServiceType, ControllerCounters>> = {};
        for (const controller of this.controllers) {
            counters[controller.service] = controller.counters_get();
        }
        return counters;
    }

    /**
     * Launch every controller. Only valid from `idle`.
     */
    start(): void {
        if (this.state !== 'idle') {
            this.log.warn(`Generator is already ${this.state}`);
            return;
        }
        this.startedAt = this.clock.now();
        this.state_set('running');
        this.log.info('Starting log generation...');

        const signal: AbortSignal = this.abort.signal;
        this.active = this.controllers.length;
        this.group = Promise.all(this.controllers.map(async (controller: RateController): Promise<void> => {
            this.log.info(`Started generator for ${controller.service}`);
            try {
                await controller.run(signal);
            } catch (err: unknown) {
                this.log.error(`Generator for ${controller.service} stopped unexpectedly`, err);
            } finally {
                this.active -= 1;
            }
        })).then((): void => undefined);
    }

    /**
     * Stop scheduling, wait for in-flight writes, close the sink.
     * Safe to call more than once; later calls await the first.
     */
    stop(): Promise<void> {
        if (this.stopping) return this.stopping;
        if (this.state === 'idle') {
            this.state_set('stopped');
            this.stopping = this.options.sink.sink_close();
            return this.stopping;
        }
        this.stopping = this.drain();
        return this.stopping;
    }

    /**
     * Start, let `durationMs` elapse or `signal` abort, then stop.
     */
    async run(options: RunOptions = {}): Promise<RunSummary> {
        const external: AbortSignal | undefined = options.signal;
        this.start();

        let reason: StopReason = 'requested';
        const waitAbort: AbortController = new AbortController();
        const onExternal = (): void => waitAbort.abort();
        external?.addEventListener('abort', onExternal, { once: true });
        if (external?.aborted) waitAbort.abort();

        try {
            if (typeof options.durationMs === 'number') {
                await this.clock.run_for(options.durationMs, waitAbort.signal, (): number => this.active);
                reason = waitAbort.signal.aborted ? 'signal' : 'duration';
            } else {
                await new Promise<void>((resolve): void => {
                    if (waitAbort.signal.aborted) resolve();
                    else waitAbort.signal.addEventListener('abort', (): void => resolve(), { once: true });
                });
                reason = 'signal';
            }
        } finally {
            external?.removeEventListener('abort', onExternal);
            await this.stop();
        }

        return {
            reason,
            startedAt: this.startedAt,
            stoppedAt: this.clock.now(),
            services: this.counters_get(),
            drained: this.drained,
        };
    }

    private async drain(): Promise<void> {
        this.state_set('draining');
        this.log.info('Stopping log generation...');
        this.abort.abort();

        const deadline: number = Date.now() + this.drainTimeoutMs;
        if (this.group) {
            this.drained = await deadline_race(this.group, this.drainTimeoutMs);
            if (!this.drained) {
                this.log.warn(`Drain timed out after ${this.drainTimeoutMs} ms; closing with writes in flight`);
            }
        }

        const closed: boolean = await deadline_race(
            this.options.sink.sink_close({ force: !this.drained }),
            Math.max(0, deadline - Date.now()),
        );
        if (!closed) {
            this.drained = false;
            this.log.warn('Sink did not close before the drain deadline; abandoning pending writes');
        }
        this.state_set('stopped');
        this.log.info('Log generation stopped');
    }

    private controllers_build(): void {
        const { config, seed } = this.options;
        const runSeed: number | null = seed === undefined ? config.seed : seed;
        const correlation: CorrelationFabric = new CorrelationFabric(config.correlation);
        const identities: IdentityFabric = new IdentityFabric(config, randomSource_create(runSeed, 'identity'));

        for (const service of SERVICE_TYPES) {
            const baseRate: number | undefined = config.rates[service];
            if (baseRate === undefined) continue;
            if (baseRate <= 0) {
                this.log.info(`Generator for ${service} disabled (rate 0)`);
                continue;
            }
            const profile: ServiceProfile = config.topology.services[service] ?? { description: '', hosts: [] };
            this.controllers.push(new RateController({
                service,
                baseRate,
                profile,
                generator: this.options.generators?.[service] ?? generator_create(service),
                random: randomSource_create(runSeed, service),
                clock: this.clock,
                sink: this.options.sink,
                scenario: this.scenario,
                correlation,
                identities,
                log: this.log,
            }));
            this.log.debug(`Initialized ${service} generator at ${baseRate}/s`);
        }
    }

    private state_set(next: OrchestratorState): void {
        const change: StateChange = { from: this.state, to: next, at: this.clock.now() };
        this.state = next;
        for (const observer of this.observers) {
            observer(change);
        }
    }
}

/**
 * Resolves true when `work` settles within `ms`, false otherwise.
 */
async function deadline_race(work: Promise<void>, ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout: Promise<boolean> = new Promise<boolean>((resolve): void => {
        timer = setTimeout((): void => resolve(false), ms);
    });
    try {
        return await Promise.race([work.then((): boolean => true), timeout]);
    } finally {
        clearTimeout(timer);
    }
}
