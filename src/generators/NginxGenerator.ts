/**
 * @file Web Server Access Log Generator
 *
 * Common Log Format with response time and correlation suffix:
 *
 *   <ip> - - [<dd/MMM/yyyy:HH:mm:ss xx>] "<method> <uri> HTTP/1.1" <status> <bytes> "-" "<ua>" rt=<s.sss> correlation_id="<id>"
 *
 * Brute-force attack requests come from the attacker pool, hit login
 * endpoints and are refused.
 */

import type { GenerationContext, LogRecord, ServiceGenerator, WireFormat } from './types.js';
import type { WeightedChoice } from '../identity/RandomSource.js';
import { clfTime_format, value_clamp, value_round } from './format.js';

export const HTTP_STATUS_WEIGHTS: readonly WeightedChoice<number>[] = [
    { value: 200, weight: 70 },
    { value: 404, weight: 15 },
    { value: 500, weight: 5 },
    { value: 403, weight: 3 },
    { value: 502, weight: 2 },
    { value: 301, weight: 3 },
    { value: 400, weight: 2 },
];

export const USER_AGENTS: readonly string[] = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36',
    'curl/7.68.0',
    'Go-http-client/1.1',
    'python-requests/2.28.0',
];

const PAGES: readonly string[] = [
    '/', '/products', '/api/users', '/health', '/metrics',
    '/api/orders', '/login', '/checkout', '/search',
];

const ATTACK_URIS: readonly string[] = ['/admin/login', '/wp-admin', '/api/auth/login'];
const ATTACK_STATUSES: readonly number[] = [401, 403, 404];
const POST_ONLY: readonly string[] = ['/login', '/api/auth/login', '/checkout'];

export class NginxGenerator implements ServiceGenerator {
    readonly service = 'nginx' as const;
    readonly format: WireFormat = 'clf';

    record_produce(context: GenerationContext): LogRecord {
        const { random, scenario } = context;
        const attack: boolean = scenario.attack_sample('brute_force', random);

        const remoteAddr: string = attack ? scenario.attackSource_pick('brute_force', random) : random.ipv4();
        const status: number = attack ? random.pick(ATTACK_STATUSES) : random.weighted(HTTP_STATUS_WEIGHTS);
        const uri: string = attack ? random.pick(ATTACK_URIS) : random.pick(PAGES);
        const method: string = POST_ONLY.includes(uri) ? 'POST' : random.pick(['GET', 'POST', 'PUT']);
        const responseTime: number = value_clamp(
            status === 200 ? random.float(0.001, 2.5) : random.float(2.0, 10.0),
            0.001,
        );
        const bytesSent: number = status === 200 ? random.int(200, 50000) : random.int(100, 1000);
        const userAgent: string = random.pick(USER_AGENTS);
        const correlationId: string = context.correlation.id;

        const text: string =
            `${remoteAddr} - - [${clfTime_format(context.timestamp)}] ` +
            `"${method} ${uri} HTTP/1.1" ${status} ${bytesSent} ` +
            `"-" "${userAgent}" ` +
            `rt=${responseTime.toFixed(3)} correlation_id="${correlationId}"`;

        return {
            service: this.service,
            timestamp: context.timestamp,
            text,
            fields: {
                remote_addr: remoteAddr,
                method,
                request_uri: uri,
                status,
                bytes_sent: bytesSent,
                response_time: value_round(responseTime, 3),
                user_agent: userAgent,
                attack,
                correlation_id: correlationId,
                host: context.host.name,
            },
        };
    }
}
