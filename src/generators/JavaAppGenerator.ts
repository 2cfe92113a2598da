/**
 * @file Application Server Log Generator
 *
 * Logback-style text with trailing key="value" pairs:
 *
 *   <iso> [<LEVEL>] [<thread>] <logger> - <message> correlation_id="<id>" host="<host>" service="<svc>" version="<v>"
 *
 * ERROR lines append exception_class, exception_message and stack_trace.
 * A payment gateway outage turns payment-service lines into gateway
 * timeout errors.
 */

import type { GenerationContext, LogRecord, ServiceGenerator, WireFormat } from './types.js';
import type { RandomSource, WeightedChoice } from '../identity/RandomSource.js';

type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG' | 'TRACE';

const LEVEL_WEIGHTS: readonly WeightedChoice<Level>[] = [
    { value: 'INFO', weight: 60 },
    { value: 'WARN', weight: 20 },
    { value: 'ERROR', weight: 10 },
    { value: 'DEBUG', weight: 8 },
    { value: 'TRACE', weight: 2 },
];

const LOGGERS: readonly string[] = [
    'com.example.controller.UserController',
    'com.example.service.PaymentService',
    'com.example.repository.OrderRepository',
    'com.example.security.AuthenticationFilter',
    'org.springframework.web.servlet.DispatcherServlet',
    'org.hibernate.SQL',
];

const SERVICE_NAME: string = 'user-service';
const SERVICE_VERSION: string = '1.2.3';

const EXCEPTION = {
    class: 'java.sql.SQLException',
    message: 'Connection timeout after 30000ms',
    stackTrace: 'java.sql.SQLException: Connection timeout\\n\\tat com.example.repository.OrderRepository.findById(OrderRepository.java:45)',
} as const;

export class JavaAppGenerator implements ServiceGenerator {
    readonly service = 'java_app' as const;
    readonly format: WireFormat = 'text';

    record_produce(context: GenerationContext): LogRecord {
        const { random, scenario } = context;
        const iso: string = context.timestamp.toISOString();
        const logger: string = random.pick(LOGGERS);
        const thread: string = `http-nio-8080-exec-${random.int(1, 20)}`;

        let level: Level = random.weighted(LEVEL_WEIGHTS);
        const outage: boolean = logger.includes('PaymentService')
            && scenario.failure_sample('payment_gateway_outage', random);
        if (outage) level = 'ERROR';

        const message: string = outage
            ? `Failed to process payment for order ${random.uuid()}: Gateway timeout`
            : message_build(level, logger, random);
        const correlationId: string = context.correlation.id;

        let text: string =
            `${iso} [${level.padEnd(5)}] [${thread}] ${logger} - ${message} ` +
            `correlation_id="${correlationId}" host="${context.host.name}" ` +
            `service="${SERVICE_NAME}" version="${SERVICE_VERSION}"`;
        if (level === 'ERROR') {
            text += ` exception_class="${EXCEPTION.class}" exception_message="${EXCEPTION.message}" stack_trace="${EXCEPTION.stackTrace}"`;
        }

        return {
            service: this.service,
            timestamp: context.timestamp,
            text,
            fields: {
                level,
                logger,
                thread,
                message,
                correlation_id: correlationId,
                host: context.host.name,
                service: SERVICE_NAME,
                version: SERVICE_VERSION,
                exception_class: level === 'ERROR' ? EXCEPTION.class : null,
            },
        };
    }
}

function message_build(level: Level, logger: string, random: RandomSource): string {
    if (logger.includes('Controller')) {
        return `Processing ${random.pick(['GET', 'POST', 'PUT'])} request to /api/${random.pick(['users', 'orders', 'payments'])}`;
    }
    if (logger.includes('Service')) {
        if (level === 'ERROR') {
            return `Failed to process payment for order ${random.uuid()}: Gateway timeout`;
        }
        return `Successfully processed ${random.pick(['payment', 'order', 'user registration'])} for user ${random.uuid()}`;
    }
    if (logger.includes('Repository')) {
        return `Executing query: SELECT * FROM ${random.pick(['users', 'orders', 'payments'])} WHERE id = ?`;
    }
    if (logger.includes('security')) {
        return `User authentication ${level === 'ERROR' ? 'failed' : 'successful'} for user: ${random.userName()}`;
    }
    return `Application event: ${random.sentence()}`;
}
