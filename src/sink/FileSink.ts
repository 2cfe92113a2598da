/**
 * @file File Sink
 *
 * Appends lines to `<directory>/<service>/<service>_<yyyyMMdd_HHmmss>[_n].log`.
 *
 * Rotation closes the active file and opens a new one when the next line
 * would push it past `maxSizeMb`, or once it is older than `maxAgeSeconds`.
 * A line is always written whole to one file. Files are created with the
 * exclusive flag, so an existing file (one a shipper may be tailing) is
 * never truncated or rewritten; a name collision picks the next suffix.
 *
 * Writes for one service are serialized; services are independent.
 * A failed write is logged as a SinkError and the line is dropped. The file
 * it failed on is closed, so a partial line is never followed by the next.
 *
 * @module sink
 */

import fs, { type FileHandle } from 'fs/promises';
import path from 'path';
import type { RotationPolicy, ServiceType } from '../config/types.js';
import { SinkError } from '../errors.js';
import { fileStamp_format } from '../generators/format.js';
import type { OperationalLog } from '../logging/OperationalLog.js';
import { sinkStats_empty, type LogSink, type SinkCloseOptions, type SinkStats } from './types.js';

interface ActiveFile {
    path: string;
    handle: FileHandle;
    size: number;
    openedAt: number;
}

export interface FileSinkOptions {
    directory: string;
    rotation: RotationPolicy;
    log: OperationalLog;
    /** Epoch milliseconds; drives file names and age-based rotation. */
    now?: () => number;
}

const MAX_NAME_SUFFIX: number = 1000;

export class FileSink implements LogSink {
    private readonly active: Map<ServiceType, ActiveFile> = new Map<ServiceType, ActiveFile>();
    private readonly tails: Map<ServiceType, Promise<boolean>> = new Map<ServiceType, Promise<boolean>>();
    private readonly stats: Map<ServiceType, SinkStats> = new Map<ServiceType, SinkStats>();
    private readonly created: string[] = [];
    private readonly maxBytes: number;
    private readonly now: () => number;
    private closed: boolean = false;

    constructor(private readonly options: FileSinkOptions) {
        this.maxBytes = options.rotation.maxSizeMb * 1024 * 1024;
        this.now = options.now ?? ((): number => Date.now());
    }

    line_write(service: ServiceType, line: string): Promise<boolean> {
        const previous: Promise<boolean> = this.tails.get(service) ?? Promise.resolve(true);
        const next: Promise<boolean> = previous.then((): Promise<boolean> => this.line_append(service, line));
        this.tails.set(service, next);
        return next;
    }

    async sink_close(options: SinkCloseOptions = {}): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        if (!options.force) {
            await Promise.all(this.tails.values());
        }
        for (const [service, file] of [...this.active]) {
            await this.file_close(service, file);
        }
    }

    stats_get(service: ServiceType): SinkStats {
        return { ...this.stats_for(service) };
    }

    /**
     * Every file created during this run, in creation order.
     */
    files_list(): string[] {
        return [...this.created];
    }

    activePath_get(service: ServiceType): string | null {
        return this.active.get(service)?.path ?? null;
    }

    serviceDirectory_get(service: ServiceType): string {
        return path.join(this.options.directory, service);
    }

    private async line_append(service: ServiceType, line: string): Promise<boolean> {
        const stats: SinkStats = this.stats_for(service);
        if (this.closed) {
            stats.dropped += 1;
            return false;
        }

        const payload: string = `${line}\n`;
        const bytes: number = Buffer.byteLength(payload, 'utf-8');
        let file: ActiveFile | undefined = this.active.get(service);

        try {
            if (file && this.rotation_due(file, bytes)) {
                await this.file_close(service, file);
                stats.rotations += 1;
                file = undefined;
            }
            if (!file) {
                file = await this.file_open(service);
                if (stats.rotations > 0) {
                    this.options.log.info(`Rotated log file: ${file.path}`);
                }
            }
            await file.handle.write(payload);
            file.size += bytes;
            stats.written += 1;
            stats.bytes += bytes;
            return true;
        } catch (err: unknown) {
            const failure: SinkError = new SinkError(service, file?.path ?? null, 'write failed, record dropped', { cause: err });
            this.options.log.error(failure.message, err);
            stats.dropped += 1;
            if (file && this.active.get(service) === file) {
                // part of the line may be on disk; the next line starts a new file
                await this.file_close(service, file);
            }
            return false;
        }
    }

    private rotation_due(file: ActiveFile, incomingBytes: number): boolean {
        if (file.size > 0 && file.size + incomingBytes > this.maxBytes) return true;
        const maxAgeMs: number = this.options.rotation.maxAgeSeconds * 1000;
        return maxAgeMs > 0 && this.now() - file.openedAt >= maxAgeMs;
    }

    private async file_open(service: ServiceType): Promise<ActiveFile> {
        const dir: string = this.serviceDirectory_get(service);
        await fs.mkdir(dir, { recursive: true });

        const openedAt: number = this.now();
        const stamp: string = fileStamp_format(new Date(openedAt));
        for (let suffix = 0; suffix < MAX_NAME_SUFFIX; suffix++) {
            const name: string = suffix === 0 ? `${service}_${stamp}.log` : `${service}_${stamp}_${suffix}.log`;
            const filePath: string = path.join(dir, name);
            try {
                const handle: FileHandle = await fs.open(filePath, 'ax');
                const file: ActiveFile = { path: filePath, handle, size: 0, openedAt };
                this.active.set(service, file);
                this.created.push(filePath);
                this.options.log.info(`Created log file: ${filePath}`);
                return file;
            } catch (err: unknown) {
                if (!fileExists_is(err)) throw err;
            }
        }
        throw new SinkError(service, null, `no free file name for ${stamp} in ${dir}`);
    }

    private async file_close(service: ServiceType, file: ActiveFile): Promise<void> {
        this.active.delete(service);
        try {
            await file.handle.close();
        } catch (err: unknown) {
            this.options.log.warn(`Closing ${file.path} failed: ${err instanceof Error ? err.message : String(err)}`);
        }
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

function fileExists_is(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}
