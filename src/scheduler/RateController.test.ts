import { describe, it, expect } from 'vitest';
import { RateController } from './RateController.js';
import { SimulatedClock } from './Clock.js';
import type { GenerationConfig, ServiceType } from '../config/types.js';
import { generator_create } from '../generators/index.js';
import type { ServiceGenerator } from '../generators/types.js';
import { CorrelationFabric } from '../identity/CorrelationFabric.js';
import { IdentityFabric } from '../identity/IdentityFabric.js';
import { randomSource_create } from '../identity/RandomSource.js';
import { OperationalLog } from '../logging/OperationalLog.js';
import { ScenarioEngine } from '../scenario/ScenarioEngine.js';
import { MemorySink } from '../sink/MemorySink.js';
import type { LogSink } from '../sink/types.js';
import { sinkStats_empty } from '../sink/types.js';
import { config_create } from '../testing/fixtures.js';

const START: number = new Date(2026, 9, 19, 12, 0, 0).getTime();

interface Harness {
    controller: RateController;
    clock: SimulatedClock;
    lines: string[];
}

function harness_create(options: {
    service?: ServiceType;
    rate: number;
    config?: GenerationConfig;
    sink?: LogSink;
    generator?: ServiceGenerator;
    start?: number;
}): Harness {
    const service: ServiceType = options.service ?? 'kubernetes';
    const config: GenerationConfig = options.config ?? config_create();
    const clock = new SimulatedClock(options.start ?? START);
    const lines: string[] = [];
    const log = new OperationalLog({ level: 'debug', transports: [(line: string): void => { lines.push(line); }] });
    const controller = new RateController({
        service,
        baseRate: options.rate,
        profile: { description: '', hosts: [] },
        generator: options.generator ?? generator_create(service),
        random: randomSource_create(1, service),
        clock,
        sink: options.sink ?? new MemorySink(),
        scenario: new ScenarioEngine(config),
        correlation: new CorrelationFabric(config.correlation),
        identities: new IdentityFabric(config, randomSource_create(1, 'identity')),
        log,
    });
    return { controller, clock, lines };
}

async function controller_runFor(harness: Harness, durationMs: number): Promise<void> {
    const abort = new AbortController();
    const running = harness.controller.run(abort.signal);
    await harness.clock.run_for(durationMs, new AbortController().signal, (): number => 1);
    abort.abort();
    await running;
}

describe('RateController', (): void => {
    it('fires at the configured rate, from the first instant to the last', async (): Promise<void> => {
        const sink = new MemorySink();
        const harness = harness_create({ rate: 2, sink });

        await controller_runFor(harness, 10_000);

        expect(sink.lines_get('kubernetes')).toHaveLength(21);
        expect(harness.controller.counters_get()).toEqual({ generated: 21, written: 21, dropped: 0, failed: 0 });
    });

    it('holds fractional rates on average', async (): Promise<void> => {
        const sink = new MemorySink();
        const harness = harness_create({ rate: 0.5, sink });

        await controller_runFor(harness, 60_000);

        expect(sink.lines_get('kubernetes')).toHaveLength(31);
    });

    it('scales with the peak multiplier', (): void => {
        const config = config_create({ business: { peak_hours: { start: '09:00', end: '17:00', multiplier: 3 } } });
        const { controller } = harness_create({ rate: 4, config });

        expect(controller.rate_effective(new Date(2026, 9, 19, 12, 0, 0))).toBe(12);
        expect(controller.rate_effective(new Date(2026, 9, 19, 20, 0, 0))).toBe(4);
    });

    it('stays silent through a zero-multiplier window and resumes at its end', async (): Promise<void> => {
        const config = config_create({ business: { peak_hours: { start: '09:00', end: '09:01', multiplier: 0 } } });
        const start: number = new Date(2026, 9, 19, 8, 59, 50).getTime();
        const sink = new MemorySink();
        const harness = harness_create({ rate: 1, config, sink, start });

        await controller_runFor(harness, 80_000);

        const offsets: number[] = sink.lines_get('kubernetes').map((line: string): number => {
            const entry: unknown = JSON.parse(line);
            if (entry === null || typeof entry !== 'object' || !('timestamp' in entry) || typeof entry.timestamp !== 'string') {
                throw new Error(`unexpected line: ${line}`);
            }
            return (new Date(entry.timestamp).getTime() - start) / 1000;
        });
        expect(offsets).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 70, 71, 72, 73, 74, 75, 76, 77, 78, 79, 80]);
    });

    it('counts and logs a generator failure, then carries on', async (): Promise<void> => {
        let calls: number = 0;
        const real: ServiceGenerator = generator_create('cdn');
        const flaky: ServiceGenerator = {
            service: 'cdn',
            format: 'text',
            record_produce: (context) => {
                calls += 1;
                if (calls === 2) throw new Error('boom');
                return real.record_produce(context);
            },
        };
        const sink = new MemorySink();
        const harness = harness_create({ service: 'cdn', rate: 1, sink, generator: flaky });

        await controller_runFor(harness, 4_000);

        expect(harness.controller.counters_get()).toEqual({ generated: 4, written: 4, dropped: 0, failed: 1 });
        expect(harness.lines.filter(l => l.includes(' - WARN - [cdn] record skipped: boom'))).toHaveLength(1);
    });

    it('counts a rejected write as dropped', async (): Promise<void> => {
        const rejecting: LogSink = {
            line_write: (): Promise<boolean> => Promise.reject(new Error('socket closed')),
            sink_close: (): Promise<void> => Promise.resolve(),
            stats_get: sinkStats_empty,
        };
        const harness = harness_create({ rate: 1, sink: rejecting });

        await harness.controller.tick_fire(new Date(START));

        expect(harness.controller.counters_get()).toEqual({ generated: 1, written: 0, dropped: 1, failed: 0 });
        expect(harness.lines).toEqual([
            expect.stringMatching(/ - ERROR - \[kubernetes\] sink rejected write, record dropped: socket closed$/),
        ]);
    });
});
