/**
 * @file API Gateway Log Generator
 *
 * JSON access records. API abuse hits one of the pattern's target
 * endpoints from the attacker pool and is rate limited (429, quota 0).
 */

import type { GenerationContext, LogRecord, ServiceGenerator, WireFormat } from './types.js';
import type { WeightedChoice } from '../identity/RandomSource.js';
import { value_clamp, value_round } from './format.js';

const ENDPOINTS: readonly string[] = [
    '/api/v1/auth/login', '/api/v1/users', '/api/v1/orders',
    '/api/v1/payments', '/api/v1/products', '/api/v1/search',
    '/api/v2/analytics', '/api/v1/health',
];

const CLIENT_TYPES: readonly string[] = ['mobile_app', 'web_app', 'partner_api', 'internal_service'];
const METHODS: readonly string[] = ['GET', 'POST', 'PUT', 'DELETE'];

const RESPONSE_WEIGHTS: readonly WeightedChoice<number>[] = [
    { value: 200, weight: 70 },
    { value: 201, weight: 10 },
    { value: 400, weight: 8 },
    { value: 401, weight: 5 },
    { value: 404, weight: 4 },
    { value: 500, weight: 3 },
];

export class ApiGatewayGenerator implements ServiceGenerator {
    readonly service = 'api_gateway' as const;
    readonly format: WireFormat = 'json';

    record_produce(context: GenerationContext): LogRecord {
        const { random, scenario } = context;
        const abuse: boolean = scenario.attack_sample('api_abuse', random);
        const targets: readonly string[] = scenario.attack_get('api_abuse')?.targetEndpoints ?? [];

        const endpoint: string = abuse && targets.length > 0 ? random.pick(targets) : random.pick(ENDPOINTS);
        const apiKey: string = abuse ? `suspicious_key_${random.uuid().slice(0, 8)}` : random.uuid();
        const clientIp: string = abuse ? scenario.attackSource_pick('api_abuse', random) : random.ipv4();
        const responseCode: number = abuse ? 429 : random.weighted(RESPONSE_WEIGHTS);
        const responseTime: number = value_round(value_clamp(random.float(10, 500), 1), 2);

        const entry = {
            timestamp: context.timestamp.toISOString(),
            endpoint,
            method: random.pick(METHODS),
            api_key: apiKey,
            client_id: random.uuid(),
            client_type: random.pick(CLIENT_TYPES),
            client_ip: clientIp,
            response_code: responseCode,
            response_time: responseTime,
            rate_limit_exceeded: abuse,
            quota_remaining: abuse ? 0 : random.int(0, 1000),
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
