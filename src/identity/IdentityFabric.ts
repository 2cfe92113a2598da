/**
 * @file Identity Fabric
 *
 * Host and user pools shared by all generators. Both pools are fixed for
 * the run: hosts come from the topology, users from the configured account
 * names plus a handful of generated ones, attacker identities from the
 * brute-force pattern's target users.
 *
 * @module identity
 */

import type { GenerationConfig, Host, ServiceType } from '../config/types.js';
import type { RandomSource } from './RandomSource.js';

export interface Identity {
    readonly name: string;
    readonly attacker: boolean;
}

/**
 * - `uniform`: any identity, attacker-tagged included.
 * - `legitimate`: identities without the attacker tag.
 * - `attacker`: attacker-tagged identities only.
 */
export type IdentityPolicy = 'uniform' | 'legitimate' | 'attacker';

const GENERATED_USERS: number = 10;

export class IdentityFabric {
    private readonly users: readonly Identity[];
    private readonly eligibleHosts: Map<ServiceType, readonly Host[]> = new Map<ServiceType, readonly Host[]>();

    constructor(private readonly config: GenerationConfig, random: RandomSource) {
        const legitimate: Identity[] = config.topology.users.map((name: string): Identity => ({ name, attacker: false }));
        for (let i = 0; i < GENERATED_USERS; i++) {
            legitimate.push({ name: random.userName(), attacker: false });
        }

        const attackerNames: readonly string[] =
            config.security.attackPatterns['brute_force']?.targetUsers ?? ['admin', 'root', 'administrator'];
        const attackers: Identity[] = attackerNames.map((name: string): Identity => ({ name, attacker: true }));

        this.users = Object.freeze([...legitimate, ...attackers].map((u: Identity): Identity => Object.freeze(u)));
    }

    /**
     * Uniform choice among the hosts eligible for `service`; the first
     * configured host when none is.
     */
    host_pick(service: ServiceType, random: RandomSource): Host {
        const eligible: readonly Host[] = this.hosts_eligible(service);
        if (eligible.length === 0) {
            return this.config.topology.hosts[0];
        }
        return random.pick(eligible);
    }

    /**
     * Hosts listed in the service profile, or else hosts that declare the service.
     */
    hosts_eligible(service: ServiceType): readonly Host[] {
        const cached: readonly Host[] | undefined = this.eligibleHosts.get(service);
        if (cached) return cached;

        const profileHosts: readonly string[] = this.config.topology.services[service]?.hosts ?? [];
        const eligible: Host[] = profileHosts.length > 0
            ? this.config.topology.hosts.filter((h: Host): boolean => profileHosts.includes(h.name))
            : this.config.topology.hosts.filter((h: Host): boolean => h.services.includes(service));

        this.eligibleHosts.set(service, eligible);
        return eligible;
    }

    user_pick(random: RandomSource, policy: IdentityPolicy): Identity {
        const pool: readonly Identity[] = this.users_list(policy);
        return random.pick(pool.length > 0 ? pool : this.users);
    }

    users_list(policy: IdentityPolicy): readonly Identity[] {
        switch (policy) {
            case 'uniform':    return this.users;
            case 'legitimate': return this.users.filter((u: Identity): boolean => !u.attacker);
            case 'attacker':   return this.users.filter((u: Identity): boolean => u.attacker);
        }
    }
}
