/**
 * @file Database Query Log Generator
 *
 * PostgreSQL statement log with duration:
 *
 *   <yyyy-MM-dd HH:mm:ss.SSS> UTC [<pid>] LOG: duration: <ms.mmm> ms statement: <sql> correlation_id="<id>"
 *
 * A database slowdown multiplies the sampled duration by the scenario's
 * slowdown factor.
 */

import type { GenerationContext, LogRecord, ServiceGenerator, WireFormat } from './types.js';
import { postgresTime_format, value_clamp, value_round } from './format.js';

type QueryType = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE';

const QUERY_TYPES: readonly QueryType[] = ['SELECT', 'INSERT', 'UPDATE', 'DELETE'];
const TABLES: readonly string[] = ['users', 'orders', 'products', 'payments', 'sessions'];

/** Same layout for every query type, so the table name keeps its column. */
function statement_build(queryType: QueryType, table: string): string {
    return `${queryType} * FROM ${table} WHERE id = $1`;
}

export class DatabaseGenerator implements ServiceGenerator {
    readonly service = 'database' as const;
    readonly format: WireFormat = 'text';

    record_produce(context: GenerationContext): LogRecord {
        const { random, scenario } = context;
        const slow: boolean = scenario.failure_sample('database_slowdown', random);
        const slowdownFactor: number = slow ? scenario.failure_get('database_slowdown')?.slowdownFactor ?? 1 : 1;

        const queryType: QueryType = random.pick(QUERY_TYPES);
        const table: string = random.pick(TABLES);
        const durationMs: number = value_clamp(random.float(0.001, 1.0) * slowdownFactor * 1000, 0.001);
        const pid: number = random.int(1000, 9999);
        const statement: string = statement_build(queryType, table);
        const correlationId: string = context.correlation.id;

        const text: string =
            `${postgresTime_format(context.timestamp)} UTC ` +
            `[${pid}] LOG: duration: ${durationMs.toFixed(3)} ms ` +
            `statement: ${statement} ` +
            `correlation_id="${correlationId}"`;

        return {
            service: this.service,
            timestamp: context.timestamp,
            text,
            fields: {
                pid,
                query_type: queryType,
                table_name: table,
                duration_ms: value_round(durationMs, 3),
                slow,
                correlation_id: correlationId,
                host: context.host.name,
            },
        };
    }
}
