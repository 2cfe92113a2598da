/**
 * @file Sink Type Definitions
 *
 * The scheduler never touches I/O directly: every line goes through a
 * `LogSink`. Swap the sink (files, memory), everything else stays the same.
 *
 * Methods follow the project's subject_verb naming convention.
 *
 * @module sink
 */

import type { ServiceType } from '../config/types.js';

export interface SinkStats {
    written: number;
    dropped: number;
    bytes: number;
    rotations: number;
}

export interface SinkCloseOptions {
    force?: boolean;
}

export interface LogSink {
    /**
     * Append `line` plus a newline to the service's current output.
     *
     * Never rejects. Resolves `false` when the line was dropped because the
     * write failed or the sink is closed.
     */
    line_write(service: ServiceType, line: string): Promise<boolean>;

    /**
     * Wait for pending writes, then release every open file. Idempotent.
     * With `force`, pending writes are not awaited; lines still queued are
     * dropped.
     */
    sink_close(options?: SinkCloseOptions): Promise<void>;

    stats_get(service: ServiceType): SinkStats;
}

export function sinkStats_empty(): SinkStats {
    return { written: 0, dropped: 0, bytes: 0, rotations: 0 };
}
