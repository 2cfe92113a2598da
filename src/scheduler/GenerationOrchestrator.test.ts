import { describe, it, expect, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { GenerationOrchestrator, type StateChange } from './GenerationOrchestrator.js';
import { SimulatedClock, SystemClock } from './Clock.js';
import { SERVICE_TYPES, type ServiceType } from '../config/types.js';
import { OperationalLog } from '../logging/OperationalLog.js';
import { FileSink } from '../sink/FileSink.js';
import { MemorySink } from '../sink/MemorySink.js';
import type { LogSink } from '../sink/types.js';
import { sinkStats_empty } from '../sink/types.js';
import { ATTACKER_IPS, config_create, rates_create } from '../testing/fixtures.js';

const START: number = new Date(2026, 9, 19, 12, 0, 0).getTime();

const scenarioConfig = config_create({
    security: {
        attack_patterns: {
            brute_force: { intensity: 0.2, source_ips: [...ATTACKER_IPS] },
            api_abuse: { intensity: 0.1, source_ips: [...ATTACKER_IPS] },
        },
    },
    business: {
        peak_hours: { start: '09:00', end: '17:00', multiplier: 2 },
        failure_scenarios: { payment_gateway_outage: 0.1, database_slowdown: { probability: 0.2, slowdown_factor: 5 } },
    },
});

async function transcript_simulate(seed: number): Promise<string> {
    const sink = new MemorySink();
    const orchestrator = new GenerationOrchestrator({
        config: scenarioConfig,
        sink,
        clock: new SimulatedClock(START),
        seed,
    });
    await orchestrator.run({ durationMs: 5_000 });
    return sink.transcript_get(SERVICE_TYPES);
}

function log_capture(): { log: OperationalLog; lines: string[] } {
    const lines: string[] = [];
    return {
        log: new OperationalLog({ level: 'debug', transports: [(line: string): void => { lines.push(line); }] }),
        lines,
    };
}

describe('GenerationOrchestrator', (): void => {
    it('produces byte-identical output for the same seed', async (): Promise<void> => {
        const first: string = await transcript_simulate(42);
        const second: string = await transcript_simulate(42);

        expect(first.length).toBeGreaterThan(0);
        expect(second).toBe(first);
    });

    it('produces different output for a different seed', async (): Promise<void> => {
        expect(await transcript_simulate(42)).not.toBe(await transcript_simulate(43));
    });

    it('starts one controller per positive rate, in service order', (): void => {
        const { log, lines } = log_capture();
        const orchestrator = new GenerationOrchestrator({
            config: config_create({ rates: { cdn: 1, nginx: 3, kubernetes: 0 } }),
            sink: new MemorySink(),
            log,
        });

        expect(orchestrator.services_list()).toEqual(['nginx', 'cdn']);
        expect(lines.some(l => l.endsWith(' - INFO - Generator for kubernetes disabled (rate 0)'))).toBe(true);
    });

    it('moves through idle, running, draining and stopped', async (): Promise<void> => {
        const orchestrator = new GenerationOrchestrator({
            config: config_create({ rates: { docker: 1 } }),
            sink: new MemorySink(),
            clock: new SimulatedClock(START),
        });
        const changes: StateChange[] = [];
        orchestrator.state_subscribe((change: StateChange): void => { changes.push(change); });

        expect(orchestrator.state_get()).toBe('idle');
        const summary = await orchestrator.run({ durationMs: 3_000 });

        expect(changes.map(c => `${c.from}>${c.to}`)).toEqual(['idle>running', 'running>draining', 'draining>stopped']);
        expect(changes[0]?.at).toBe(START);
        expect(summary).toEqual({
            reason: 'duration',
            startedAt: START,
            stoppedAt: START + 3_000,
            services: { docker: { generated: 4, written: 4, dropped: 0, failed: 0 } },
            drained: true,
        });
    });

    it('makes stop() idempotent', async (): Promise<void> => {
        const orchestrator = new GenerationOrchestrator({
            config: config_create({ rates: { docker: 1 } }),
            sink: new MemorySink(),
            clock: new SimulatedClock(START),
        });
        orchestrator.start();

        const first = orchestrator.stop();
        expect(orchestrator.stop()).toBe(first);
        await first;
        expect(orchestrator.state_get()).toBe('stopped');
    });

    it('keeps the other nine services running when one sink fails', async (): Promise<void> => {
        const sink = new MemorySink({ failing: ['nginx'] });
        const orchestrator = new GenerationOrchestrator({
            config: config_create(),
            sink,
            clock: new SimulatedClock(START),
            seed: 1,
        });

        const summary = await orchestrator.run({ durationMs: 10_000 });

        expect(summary.services.nginx).toEqual({ generated: 11, written: 0, dropped: 11, failed: 0 });
        for (const service of SERVICE_TYPES.filter((s: ServiceType): boolean => s !== 'nginx')) {
            expect(sink.lines_get(service)).toHaveLength(11);
        }
    });

    it('writes nothing once a timed run has returned', async (): Promise<void> => {
        const sink = new MemorySink();
        const orchestrator = new GenerationOrchestrator({
            config: config_create({ rates: rates_create(20) }),
            sink,
            clock: new SystemClock(),
        });

        const summary = await orchestrator.run({ durationMs: 300 });
        const counts: number[] = SERVICE_TYPES.map((s: ServiceType): number => sink.lines_get(s).length);
        await new Promise<void>((resolve): void => { setTimeout(resolve, 200); });

        expect(summary.reason).toBe('duration');
        expect(orchestrator.state_get()).toBe('stopped');
        expect(counts.every((n: number): boolean => n > 0)).toBe(true);
        expect(SERVICE_TYPES.map((s: ServiceType): number => sink.lines_get(s).length)).toEqual(counts);
    });

    it('stops on an external signal', async (): Promise<void> => {
        const orchestrator = new GenerationOrchestrator({
            config: config_create({ rates: { cicd: 5 } }),
            sink: new MemorySink(),
            clock: new SystemClock(),
        });
        const abort = new AbortController();
        setTimeout((): void => abort.abort(), 100);

        const summary = await orchestrator.run({ signal: abort.signal });

        expect(summary.reason).toBe('signal');
        expect(summary.services.cicd?.written).toBeGreaterThan(0);
    });

    it('gives up on a stuck sink after the drain timeout', async (): Promise<void> => {
        let closed: boolean = false;
        const stuck: LogSink = {
            line_write: (): Promise<boolean> => new Promise<boolean>((): void => undefined),
            sink_close: async (): Promise<void> => { closed = true; },
            stats_get: sinkStats_empty,
        };
        const { log, lines } = log_capture();
        const orchestrator = new GenerationOrchestrator({
            config: config_create({ rates: { docker: 1 } }),
            sink: stuck,
            clock: new SystemClock(),
            log,
            drainTimeoutMs: 100,
        });

        const summary = await orchestrator.run({ durationMs: 50 });

        expect(summary.drained).toBe(false);
        expect(closed).toBe(true);
        expect(orchestrator.state_get()).toBe('stopped');
        expect(lines.some(l => l.includes(' - WARN - Drain timed out after 100 ms'))).toBe(true);
    });

    it('stops within the drain timeout when file writes hang', async (): Promise<void> => {
        const dir: string = await fs.mkdtemp(path.join(os.tmpdir(), 'synthlog-drain-'));
        const open = fs.open;
        vi.spyOn(fs, 'open').mockImplementation(async (file, flags, mode) => {
            const handle = await open(file, flags, mode);
            vi.spyOn(handle, 'write').mockImplementation((): Promise<never> => new Promise<never>((): void => undefined));
            return handle;
        });
        const { log, lines } = log_capture();
        const orchestrator = new GenerationOrchestrator({
            config: config_create({ rates: { docker: 5 } }),
            sink: new FileSink({ directory: dir, rotation: { maxSizeMb: 100, maxAgeSeconds: 0 }, log }),
            clock: new SystemClock(),
            log,
            drainTimeoutMs: 100,
        });

        try {
            const summary = await orchestrator.run({ durationMs: 50 });

            expect(summary.drained).toBe(false);
            expect(summary.services.docker?.written).toBe(0);
            expect(orchestrator.state_get()).toBe('stopped');
            expect(lines.some(l => l.includes(' - WARN - Drain timed out after 100 ms'))).toBe(true);
        } finally {
            vi.restoreAllMocks();
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
