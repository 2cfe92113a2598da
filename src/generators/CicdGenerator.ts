/**
 * @file CI/CD Pipeline Event Generator
 */

import type { GenerationContext, LogRecord, ServiceGenerator, WireFormat } from './types.js';
import type { WeightedChoice } from '../identity/RandomSource.js';

const STAGES: readonly string[] = ['build', 'test', 'security_scan', 'deploy'];
const BRANCHES: readonly string[] = ['main', 'develop', 'feature/auth', 'hotfix/payment'];

const STATUS_WEIGHTS: readonly WeightedChoice<string>[] = [
    { value: 'success', weight: 85 },
    { value: 'failure', weight: 15 },
];

export class CicdGenerator implements ServiceGenerator {
    readonly service = 'cicd' as const;
    readonly format: WireFormat = 'json';

    record_produce(context: GenerationContext): LogRecord {
        const { random } = context;

        const entry = {
            timestamp: context.timestamp.toISOString(),
            build_id: random.uuid(),
            stage: random.pick(STAGES),
            status: random.weighted(STATUS_WEIGHTS),
            duration: random.int(30, 600),
            commit_hash: random.sha1(),
            branch: random.pick(BRANCHES),
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
