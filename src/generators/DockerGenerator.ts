/**
 * @file Container Runtime Event Generator
 *
 * JSON container events; `exit_code` is null except for stop and OOM kill.
 */

import type { GenerationContext, LogRecord, ServiceGenerator, WireFormat } from './types.js';

const EVENTS: readonly string[] = ['start', 'stop', 'restart', 'oom_kill', 'health_check'];
const IMAGES: readonly string[] = ['nginx', 'postgres', 'redis', 'app'];
const EXIT_CODES: readonly number[] = [0, 1, 125, 137];

export class DockerGenerator implements ServiceGenerator {
    readonly service = 'docker' as const;
    readonly format: WireFormat = 'json';

    record_produce(context: GenerationContext): LogRecord {
        const { random } = context;
        const event: string = random.pick(EVENTS);

        const entry = {
            timestamp: context.timestamp.toISOString(),
            container_id: random.hex(12),
            image: `${random.pick(IMAGES)}:${random.int(1, 5)}.${random.int(0, 9)}`,
            event,
            exit_code: event === 'stop' || event === 'oom_kill' ? random.pick(EXIT_CODES) : null,
            correlation_id: context.correlation.id,
            host: context.host.name,
        };

        return {
            service: this.service,
            timestamp: context.timestamp,
            text: JSON.stringify(entry),
            fields: entry,
        };
    }
}
