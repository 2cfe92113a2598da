/**
 * @file E-commerce Transaction Generator
 *
 * JSON transactions. `error_code` is present only on non-completed orders.
 * A payment gateway outage forces `failed` / `GATEWAY_TIMEOUT` with a
 * 30-60 s processing time.
 */

import type { GenerationContext, LogRecord, ServiceGenerator, WireFormat } from './types.js';
import type { WeightedChoice } from '../identity/RandomSource.js';
import { value_clamp, value_round } from './format.js';

type OrderStatus = 'completed' | 'failed' | 'pending' | 'cancelled';

const PAYMENT_METHODS: readonly string[] = ['credit_card', 'paypal', 'apple_pay', 'google_pay', 'bank_transfer'];

const STATUS_WEIGHTS: readonly WeightedChoice<OrderStatus>[] = [
    { value: 'completed', weight: 85 },
    { value: 'failed', weight: 10 },
    { value: 'pending', weight: 3 },
    { value: 'cancelled', weight: 2 },
];

const DECLINE_CODES: readonly string[] = ['INSUFFICIENT_FUNDS', 'CARD_DECLINED', 'FRAUD_DETECTED'];

export class EcommerceGenerator implements ServiceGenerator {
    readonly service = 'ecommerce' as const;
    readonly format: WireFormat = 'json';

    record_produce(context: GenerationContext): LogRecord {
        const { random, scenario } = context;
        const outage: boolean = scenario.failure_sample('payment_gateway_outage', random);

        const orderId: string = random.uuid();
        const customerId: string = random.uuid();
        const paymentMethod: string = random.pick(PAYMENT_METHODS);
        const amount: number = value_round(value_clamp(random.float(10.99, 999.99), 0.01), 2);

        let status: OrderStatus;
        let errorCode: string | null;
        let processingTime: number;
        if (outage) {
            status = 'failed';
            errorCode = 'GATEWAY_TIMEOUT';
            processingTime = random.float(30.0, 60.0);
        } else {
            status = random.weighted(STATUS_WEIGHTS);
            errorCode = status === 'completed' ? null : random.pick(DECLINE_CODES);
            processingTime = random.float(0.5, 5.0);
        }

        const entry: Record<string, string | number> = {
            timestamp: context.timestamp.toISOString(),
            event_type: 'transaction',
            order_id: orderId,
            customer_id: customerId,
            payment_method: paymentMethod,
            amount,
            currency: 'USD',
            status,
            processing_time: value_round(value_clamp(processingTime, 0), 3),
            correlation_id: context.correlation.id,
            host: context.host.name,
        };
        if (errorCode !== null) {
            entry['error_code'] = errorCode;
        }

        return {
            service: this.service,
            timestamp: context.timestamp,
            text: JSON.stringify(entry),
            fields: entry,
        };
    }
}
