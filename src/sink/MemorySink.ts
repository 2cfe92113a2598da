/**
 * @file Memory Sink
 *
 * Keeps lines in memory per service. Used by tests and by dry runs that
 * only want the generated text.
 *
 * `failing` names services whose writes fail, exercising the same
 * log-and-drop path as a real write error.
 *
 * @module sink
 */

import type { ServiceType } from '../config/types.js';
import { SinkError } from '../errors.js';
import type { OperationalLog } from '../logging/OperationalLog.js';
import { operationalLog_silent } from '../logging/OperationalLog.js';
import { sinkStats_empty, type LogSink, type SinkStats } from './types.js';

export interface MemorySinkOptions {
    failing?: readonly ServiceType[];
    log?: OperationalLog;
}

export class MemorySink implements LogSink {
    private readonly lines: Map<ServiceType, string[]> = new Map<ServiceType, string[]>();
    private readonly stats: Map<ServiceType, SinkStats> = new Map<ServiceType, SinkStats>();
    private readonly failing: ReadonlySet<ServiceType>;
    private readonly log: OperationalLog;
    private closed: boolean = false;

    constructor(options: MemorySinkOptions = {}) {
        this.failing = new Set<ServiceType>(options.failing ?? []);
        this.log = options.log ?? operationalLog_silent();
    }

    async line_write(service: ServiceType, line: string): Promise<boolean> {
        const stats: SinkStats = this.stats_for(service);
        if (this.closed) {
            stats.dropped += 1;
            return false;
        }
        if (this.failing.has(service)) {
            const failure: SinkError = new SinkError(service, null, 'write failed, record dropped');
            this.log.error(failure.message, new Error('EACCES: permission denied'));
            stats.dropped += 1;
            return false;
        }

        const bucket: string[] = this.lines.get(service) ?? [];
        bucket.push(line);
        this.lines.set(service, bucket);
        stats.written += 1;
        stats.bytes += Buffer.byteLength(`${line}\n`, 'utf-8');
        return true;
    }

    async sink_close(): Promise<void> {
        this.closed = true;
    }

    stats_get(service: ServiceType): SinkStats {
        return { ...this.stats_for(service) };
    }

    lines_get(service: ServiceType): readonly string[] {
        return [...(this.lines.get(service) ?? [])];
    }

    /** All services' lines, newline-terminated, in service listing order. */
    transcript_get(services: readonly ServiceType[]): string {
        return services
            .map((s: ServiceType): string => this.lines_get(s).map((l: string): string => `${l}\n`).join(''))
            .join('');
    }

    private stats_for(service: ServiceType): SinkStats {
        let stats: SinkStats | undefined = this.stats.get(service);
        if (!stats) {
            stats = sinkStats_empty();
            this.stats.set(service, stats);
        }
        return stats;
    }
}
