/**
 * @file Authentication (sshd) Log Generator
 *
 * Syslog line:
 *
 *   <MMM dd HH:mm:ss> <host> sshd[<pid>]: <SUCCESS|FAILED> <action> for user <user> from <ip> port <port> session_id="<sid>" correlation_id="<id>"
 *
 * Every event samples the brute-force pattern once. A hit substitutes an
 * attacker identity and address and forces `FAILED login` without a session.
 */

import type { GenerationContext, LogRecord, ServiceGenerator, WireFormat } from './types.js';
import type { WeightedChoice } from '../identity/RandomSource.js';
import type { Identity } from '../identity/IdentityFabric.js';
import { syslogTime_format } from './format.js';

export type AccessResult = 'SUCCESS' | 'FAILED';

const ACTION_WEIGHTS: readonly WeightedChoice<string>[] = [
    { value: 'login', weight: 40 },
    { value: 'logout', weight: 35 },
    { value: 'sudo', weight: 15 },
    { value: 'ssh_key_auth', weight: 5 },
    { value: 'password_change', weight: 5 },
];

const LEGITIMATE_FAILURE_RATE: number = 0.05;

export class SystemAccessGenerator implements ServiceGenerator {
    readonly service = 'system_access' as const;
    readonly format: WireFormat = 'syslog';

    record_produce(context: GenerationContext): LogRecord {
        const { random, scenario, identities } = context;
        const attack: boolean = scenario.attack_sample('brute_force', random);

        let user: Identity;
        let sourceIp: string;
        let action: string;
        let result: AccessResult;
        let sessionId: string;

        if (attack) {
            user = identities.user_pick(random, 'attacker');
            sourceIp = scenario.attackSource_pick('brute_force', random);
            action = 'login';
            result = 'FAILED';
            sessionId = 'none';
        } else {
            user = identities.user_pick(random, 'legitimate');
            sourceIp = random.ipv4();
            action = random.weighted(ACTION_WEIGHTS);
            result = random.chance(LEGITIMATE_FAILURE_RATE) ? 'FAILED' : 'SUCCESS';
            sessionId = result === 'SUCCESS' ? random.uuid() : 'none';
        }

        const pid: number = random.int(1000, 9999);
        const port: number = random.int(30000, 65000);
        const correlationId: string = context.correlation.id;

        const text: string =
            `${syslogTime_format(context.timestamp)} ${context.host.name} ` +
            `sshd[${pid}]: ${result} ${action} for user ${user.name} ` +
            `from ${sourceIp} port ${port} ` +
            `session_id="${sessionId}" correlation_id="${correlationId}"`;

        return {
            service: this.service,
            timestamp: context.timestamp,
            text,
            fields: {
                user: user.name,
                source_ip: sourceIp,
                action,
                result,
                session_id: sessionId,
                attack,
                correlation_id: correlationId,
                host: context.host.name,
            },
        };
    }
}
