/**
 * @file Scenario Engine
 *
 * Cross-cutting traffic shaping consulted by the scheduler and by every
 * generator:
 *
 *   - time-of-day multiplier (peak hours),
 *   - attack injection (brute force, API abuse), optionally in bursts,
 *   - business failure injection (payment gateway outage, database slowdown).
 *
 * The engine is an explicit handle passed to whoever needs it. Sampling
 * draws from the caller's `RandomSource` so that each service's stream stays
 * reproducible. Counters are mutated only from here; the event loop runs
 * one producer step at a time, so there is a single writer.
 *
 * @module scenario
 */

import type {
    AttackConfig,
    AttackPatternName,
    BusinessConfig,
    FailureScenario,
    FailureScenarioName,
    GenerationConfig,
} from '../config/types.js';
import type { RandomSource } from '../identity/RandomSource.js';

export interface AttackState {
    pattern: string;
    inBurst: boolean;
    burstsStarted: number;
    sampled: number;
    injected: number;
}

export interface FailureState {
    scenario: string;
    sampled: number;
    injected: number;
}

export interface ScenarioSnapshot {
    attacks: AttackState[];
    failures: FailureState[];
}

const DAY_MS: number = 24 * 60 * 60 * 1000;

/**
 * Seconds since local midnight for an `HH:MM[:SS]` string.
 */
export function clockTime_parse(value: string): number {
    const [h, m, s] = value.split(':').map((part: string): number => Number.parseInt(part, 10));
    return h * 3600 + m * 60 + (s ?? 0);
}

export class ScenarioEngine {
    private readonly attackStates: Map<string, AttackState> = new Map<string, AttackState>();
    private readonly failureStates: Map<string, FailureState> = new Map<string, FailureState>();
    private readonly peakStart: number;
    private readonly peakEnd: number;
    private readonly business: BusinessConfig;
    private epoch: number | null = null;

    constructor(private readonly config: GenerationConfig) {
        this.business = config.business;
        this.peakStart = clockTime_parse(config.business.peakHours.start);
        this.peakEnd = clockTime_parse(config.business.peakHours.end);

        for (const name of Object.keys(config.security.attackPatterns)) {
            this.attackStates.set(name, { pattern: name, inBurst: false, burstsStarted: 0, sampled: 0, injected: 0 });
        }
        for (const name of Object.keys(config.business.failureScenarios)) {
            this.failureStates.set(name, { scenario: name, sampled: 0, injected: 0 });
        }
    }

    // ─── Time of Day ────────────────────────────────────────────────────────

    /**
     * True when `now` falls in the half-open peak window [start, end).
     * A window whose end precedes its start wraps past midnight; equal
     * bounds mean no window.
     */
    peakWindow_contains(now: Date): boolean {
        const t: number = now.getHours() * 3600 + now.getMinutes() * 60 + now.getSeconds() + now.getMilliseconds() / 1000;
        if (this.peakStart === this.peakEnd) return false;
        if (this.peakStart < this.peakEnd) {
            return t >= this.peakStart && t < this.peakEnd;
        }
        return t >= this.peakStart || t < this.peakEnd;
    }

    multiplier_current(now: Date): number {
        return this.peakWindow_contains(now) ? this.business.peakHours.multiplier : 1.0;
    }

    /**
     * The next instant strictly after `now` at which the multiplier may change.
     */
    transition_next(now: Date): Date {
        if (this.peakStart === this.peakEnd) {
            return new Date(now.getTime() + DAY_MS);
        }
        const candidates: Date[] = [];
        for (const dayOffset of [0, 1]) {
            for (const secondOfDay of [this.peakStart, this.peakEnd]) {
                const h: number = Math.floor(secondOfDay / 3600);
                const m: number = Math.floor((secondOfDay % 3600) / 60);
                const s: number = secondOfDay % 60;
                candidates.push(new Date(now.getFullYear(), now.getMonth(), now.getDate() + dayOffset, h, m, s, 0));
            }
        }
        const upcoming: Date[] = candidates
            .filter((d: Date): boolean => d.getTime() > now.getTime())
            .sort((a: Date, b: Date): number => a.getTime() - b.getTime());
        return upcoming[0];
    }

    // ─── Attacks ────────────────────────────────────────────────────────────

    /**
     * Advance burst windows to `now`. Bursts repeat every `everySeconds`
     * from the first tick and last `durationSeconds`.
     */
    tick(now: Date): void {
        const at: number = now.getTime();
        if (this.epoch === null) this.epoch = at;
        const elapsedSeconds: number = (at - this.epoch) / 1000;

        for (const [name, attack] of Object.entries(this.config.security.attackPatterns)) {
            const state: AttackState | undefined = this.attackStates.get(name);
            if (!state || !attack.burst) continue;
            const inBurst: boolean = attack.enabled
                && (elapsedSeconds % attack.burst.everySeconds) < attack.burst.durationSeconds;
            if (inBurst && !state.inBurst) state.burstsStarted += 1;
            state.inBurst = inBurst;
        }
    }

    /**
     * Probability an event of `pattern` is an attack right now.
     */
    attackIntensity_effective(pattern: AttackPatternName): number {
        const attack: AttackConfig | undefined = this.attack_get(pattern);
        if (!attack || !attack.enabled) return 0;
        const state: AttackState | undefined = this.attackStates.get(pattern);
        if (attack.burst && state?.inBurst) {
            return Math.max(attack.intensity, attack.burst.intensity);
        }
        return attack.intensity;
    }

    attack_sample(pattern: AttackPatternName, random: RandomSource): boolean {
        const state: AttackState | undefined = this.attackStates.get(pattern);
        const intensity: number = this.attackIntensity_effective(pattern);
        if (!state) return false;

        state.sampled += 1;
        const hit: boolean = random.chance(intensity);
        if (hit) state.injected += 1;
        return hit;
    }

    /**
     * An attacker address from the pattern's pool.
     */
    attackSource_pick(pattern: AttackPatternName, random: RandomSource): string {
        const pool: readonly string[] = this.attack_get(pattern)?.sourceIps ?? [];
        return pool.length > 0 ? random.pick(pool) : random.ipv4();
    }

    attack_get(pattern: AttackPatternName): AttackConfig | undefined {
        return this.config.security.attackPatterns[pattern];
    }

    // ─── Failures ───────────────────────────────────────────────────────────

    failure_sample(scenario: FailureScenarioName, random: RandomSource): boolean {
        const config: FailureScenario | undefined = this.failure_get(scenario);
        const state: FailureState | undefined = this.failureStates.get(scenario);
        if (!config || !state) return false;

        state.sampled += 1;
        const hit: boolean = random.chance(config.probability);
        if (hit) state.injected += 1;
        return hit;
    }

    failure_get(scenario: FailureScenarioName): FailureScenario | undefined {
        return this.business.failureScenarios[scenario];
    }

    // ─── Introspection ──────────────────────────────────────────────────────

    state_snapshot(): ScenarioSnapshot {
        return {
            attacks: Array.from(this.attackStates.values(), (s: AttackState): AttackState => ({ ...s })),
            failures: Array.from(this.failureStates.values(), (s: FailureState): FailureState => ({ ...s })),
        };
    }
}
