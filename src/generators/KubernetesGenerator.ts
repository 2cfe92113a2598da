/**
 * @file Orchestration Event Generator
 *
 * One JSON object per line; key order is fixed.
 */

import type { GenerationContext, LogRecord, ServiceGenerator, WireFormat } from './types.js';
import type { WeightedChoice } from '../identity/RandomSource.js';

type Level = 'INFO' | 'WARN' | 'ERROR';

const NAMESPACES: readonly string[] = ['default', 'kube-system', 'monitoring', 'app-prod', 'app-staging'];
const WORKLOADS: readonly string[] = ['nginx', 'api-server', 'worker', 'redis'];
const CONTAINERS: readonly string[] = ['main', 'sidecar', 'init'];
const CLUSTER: string = 'production-cluster';

const LEVEL_WEIGHTS: readonly WeightedChoice<Level>[] = [
    { value: 'INFO', weight: 70 },
    { value: 'WARN', weight: 20 },
    { value: 'ERROR', weight: 10 },
];

const MESSAGES: Record<Level, readonly string[]> = {
    ERROR: [
        'Pod failed to start: ImagePullBackOff',
        'Container crashed with exit code 1',
        'Failed to mount volume: permission denied',
        'Readiness probe failed: HTTP probe failed with statuscode: 503',
    ],
    WARN: [
        'Pod memory usage above 80%',
        'Container restart count increased',
        'Slow startup detected: 45s to ready',
        'Deprecated API version detected',
    ],
    INFO: [
        'Pod successfully scheduled on node',
        'Container started successfully',
        'Health check passed',
        'Resource limits updated',
    ],
};

export class KubernetesGenerator implements ServiceGenerator {
    readonly service = 'kubernetes' as const;
    readonly format: WireFormat = 'json';

    record_produce(context: GenerationContext): LogRecord {
        const { random } = context;
        const level: Level = random.weighted(LEVEL_WEIGHTS);

        const entry = {
            timestamp: context.timestamp.toISOString(),
            namespace: random.pick(NAMESPACES),
            pod: `${random.pick(WORKLOADS)}-${random.int(1000, 9999)}-${random.letters(5)}`,
            container: random.pick(CONTAINERS),
            level,
            message: random.pick(MESSAGES[level]),
            correlation_id: context.correlation.id,
            node: context.host.name,
            cluster: CLUSTER,
        };

        return {
            service: this.service,
            timestamp: context.timestamp,
            text: JSON.stringify(entry),
            fields: entry,
        };
    }
}
