/**
 * @file CDN Edge Log Generator
 *
 * Space-delimited, column order frozen:
 *
 *   <yyyy-MM-dd HH:mm:ss> <edge> <client_ip> <method> <uri> <status> <cache_status> <bytes> correlation_id="<id>"
 */

import type { GenerationContext, LogRecord, ServiceGenerator, WireFormat } from './types.js';
import type { WeightedChoice } from '../identity/RandomSource.js';
import { cdnTime_format } from './format.js';

export type CacheStatus = 'HIT' | 'MISS' | 'STALE';

const CACHE_WEIGHTS: readonly WeightedChoice<CacheStatus>[] = [
    { value: 'HIT', weight: 70 },
    { value: 'MISS', weight: 25 },
    { value: 'STALE', weight: 5 },
];

const EDGE_LOCATIONS: readonly string[] = ['us-west-1', 'us-east-1', 'eu-west-1', 'ap-southeast-1'];
const STATUSES: readonly number[] = [200, 304, 404, 502];

export class CdnGenerator implements ServiceGenerator {
    readonly service = 'cdn' as const;
    readonly format: WireFormat = 'text';

    record_produce(context: GenerationContext): LogRecord {
        const { random } = context;
        const cacheStatus: CacheStatus = random.weighted(CACHE_WEIGHTS);
        const edge: string = random.pick(EDGE_LOCATIONS);
        const clientIp: string = random.ipv4();
        const method: string = random.pick(['GET', 'POST']);
        // uri must stay one column
        const uri: string = `/static/${random.fileName().replace(/\s+/g, '_')}`;
        const status: number = random.pick(STATUSES);
        const bytes: number = random.int(100, 50000);
        const correlationId: string = context.correlation.id;

        const text: string =
            `${cdnTime_format(context.timestamp)} ${edge} ` +
            `${clientIp} ${method} ${uri} ${status} ` +
            `${cacheStatus} ${bytes} ` +
            `correlation_id="${correlationId}"`;

        return {
            service: this.service,
            timestamp: context.timestamp,
            text,
            fields: {
                edge_location: edge,
                client_ip: clientIp,
                method,
                uri,
                status,
                cache_status: cacheStatus,
                bytes,
                correlation_id: correlationId,
                host: context.host.name,
            },
        };
    }
}
