import { describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { config_fromObject, config_load, config_parse } from './loader.js';
import { ConfigError } from '../errors.js';
import { document_create, rates_create, topology_create } from '../testing/fixtures.js';

function configError_catch(fn: () => unknown): ConfigError {
    try {
        fn();
    } catch (err: unknown) {
        if (err instanceof ConfigError) return err;
        throw err;
    }
    throw new Error('expected a ConfigError');
}

describe('config_parse', (): void => {
    it('builds a camelCase snapshot with defaults filled in', (): void => {
        const config = config_parse(yaml.dump(document_create()));

        expect(config.rates.nginx).toBe(1);
        expect(config.topology.hosts.map(h => h.name)).toEqual(['web-01', 'app-01']);
        expect(config.topology.services.cdn).toEqual({ description: '', hosts: [] });
        expect(config.topology.users).toEqual(['admin', 'deploy', 'monitoring', 'backup']);
        expect(config.correlation).toEqual({ shareProbability: 0.3, window: 64 });
        expect(config.output).toEqual({ directory: './logs', rotation: { maxSizeMb: 100, maxAgeSeconds: 0 } });
        expect(config.seed).toBeNull();
    });

    it('rejects a negative rate', (): void => {
        const rates = { ...rates_create(), nginx: -1 };
        const err = configError_catch(() => config_fromObject(document_create({ rates })));

        expect(err.issues).toEqual(['[rates.nginx] rate must be >= 0']);
    });

    it('rejects seeds outside the unsigned 32-bit range', (): void => {
        expect(configError_catch(() => config_fromObject(document_create({ seed: 4294967296 }))).issues)
            .toEqual(['[seed] seed must be <= 4294967295']);
        expect(configError_catch(() => config_fromObject(document_create({ seed: -1 }))).issues)
            .toEqual(['[seed] seed must be >= 0']);
        expect(config_fromObject(document_create({ seed: 4294967295 })).seed).toBe(4294967295);
    });

    it('rejects rates for unknown services', (): void => {
        const rates = { ...rates_create(), mainframe: 2 };
        const err = configError_catch(() => config_fromObject(document_create({ rates })));

        expect(err.issues).toEqual(["[rates.mainframe] unknown service type 'mainframe'"]);
    });

    it('rejects rates for services missing from the topology', (): void => {
        const err = configError_catch(() => config_fromObject(document_create({ topology: topology_create(['cdn']) })));

        expect(err.issues).toEqual(['[rates.cdn] service is not declared in topology.services']);
    });

    it('reports every reference problem at once', (): void => {
        const err = configError_catch(() => config_fromObject(document_create({
            rates: { nginx: 1 },
            topology: {
                hosts: [
                    { name: 'web-01', ip: '10.0.1.10', services: ['nginx'] },
                    { name: 'web-01', ip: '10.0.1.11', services: ['mainframe'] },
                ],
                services: { nginx: { hosts: ['web-09'] } },
            },
        })));

        expect(err.summary).toBe('Invalid configuration');
        expect(err.issues).toEqual([
            "[topology.hosts.1.name] duplicate host 'web-01'",
            "[topology.hosts.1.services] unknown service type 'mainframe'",
            "[topology.services.nginx.hosts] unknown host 'web-09'",
        ]);
    });

    it('rejects intensities outside [0, 1]', (): void => {
        const err = configError_catch(() => config_fromObject(document_create({
            security: { attack_patterns: { brute_force: { intensity: 1.5, source_ips: ['203.0.113.15'] } } },
        })));

        expect(err.issues).toEqual(['[security.attack_patterns.brute_force.intensity] must be <= 1']);
    });

    it('requires a source pool for enabled attack patterns', (): void => {
        const err = configError_catch(() => config_fromObject(document_create({
            security: { attack_patterns: { api_abuse: { intensity: 0.1 } } },
        })));

        expect(err.issues).toEqual([
            '[security.attack_patterns.api_abuse.source_ips] enabled pattern needs at least one source IP',
        ]);
    });

    it('accepts a disabled attack pattern without sources', (): void => {
        const config = config_fromObject(document_create({
            security: { attack_patterns: { api_abuse: { enabled: false, intensity: 0.1 } } },
        }));

        expect(config.security.attackPatterns['api_abuse']?.enabled).toBe(false);
    });

    it('rejects malformed peak-hour times', (): void => {
        const err = configError_catch(() => config_fromObject(document_create({
            business: { peak_hours: { start: '9am', end: '17:00', multiplier: 2 } },
        })));

        expect(err.issues).toEqual(['[business.peak_hours.start] must be HH:MM or HH:MM:SS']);
    });

    it('accepts failure scenarios as bare probabilities or objects', (): void => {
        const config = config_fromObject(document_create({
            business: {
                peak_hours: { start: '09:00', end: '17:00', multiplier: 1 },
                failure_scenarios: {
                    payment_gateway_outage: 0.01,
                    database_slowdown: { probability: 0.05, slowdown_factor: 8 },
                },
            },
        }));

        expect(config.business.failureScenarios).toEqual({
            payment_gateway_outage: { probability: 0.01, slowdownFactor: 1 },
            database_slowdown: { probability: 0.05, slowdownFactor: 8 },
        });
    });

    it('accepts the document nested under log_generator', (): void => {
        const flat = config_parse(yaml.dump(document_create()));
        const nested = config_parse(yaml.dump({ log_generator: document_create() }));

        expect(nested).toEqual(flat);
    });

    it('is idempotent', (): void => {
        const text: string = yaml.dump(document_create({ seed: 42 }));

        expect(config_parse(text)).toEqual(config_parse(text));
    });

    it('returns a deep-frozen snapshot', (): void => {
        const config = config_parse(yaml.dump(document_create()));

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.rates)).toBe(true);
        expect(Object.isFrozen(config.topology.hosts[0])).toBe(true);
    });

    it('wraps YAML syntax errors', (): void => {
        const err = configError_catch(() => config_parse('rates: [1, 2'));

        expect(err.summary).toBe('Configuration is not valid YAML');
        expect(err.issues).toHaveLength(1);
    });
});

describe('config_load', (): void => {
    it('reads the repository example configuration', async (): Promise<void> => {
        const config = await config_load(path.resolve('config.yaml'));

        expect(Object.keys(config.rates)).toHaveLength(10);
        expect(config.security.attackPatterns['brute_force']?.burst).toEqual({
            everySeconds: 600,
            durationSeconds: 30,
            intensity: 0.6,
        });
    });

    it('reports an unreadable file as a ConfigError', async (): Promise<void> => {
        const dir: string = await fs.mkdtemp(path.join(os.tmpdir(), 'synthlog-config-'));
        const missing: string = path.join(dir, 'absent.yaml');

        await expect(config_load(missing)).rejects.toBeInstanceOf(ConfigError);
        await expect(config_load(missing)).rejects.toThrow(`Configuration file not readable: ${missing}`);
        await fs.rm(dir, { recursive: true, force: true });
    });
});
