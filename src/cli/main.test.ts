import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { EXIT_CONFIG, EXIT_OK, EXIT_USAGE, cli_run, type CliIo } from './main.js';
import { fileStamp_format } from '../generators/format.js';
import { document_create } from '../testing/fixtures.js';

interface CapturedIo extends CliIo {
    stdout: string[];
    stderr: string[];
}

function io_capture(): CapturedIo {
    const stdout: string[] = [];
    const stderr: string[] = [];
    return {
        stdout,
        stderr,
        out: (text: string): void => { stdout.push(text); },
        err: (text: string): void => { stderr.push(text); },
    };
}

describe('cli_run', (): void => {
    let dir: string;

    beforeEach(async (): Promise<void> => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'synthlog-cli-'));
    });

    afterEach(async (): Promise<void> => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    async function config_write(doc: Record<string, unknown>): Promise<string> {
        const file: string = path.join(dir, 'config.yaml');
        await fs.writeFile(file, yaml.dump(doc));
        return file;
    }

    it('prints usage for --help', async (): Promise<void> => {
        const io = io_capture();

        expect(await cli_run(['--help'], { io, env: {} })).toBe(EXIT_OK);
        expect(io.stdout[0]).toMatch(/^Usage: synthlog \[options\]/);
    });

    it('exits 2 on a usage error', async (): Promise<void> => {
        const io = io_capture();

        expect(await cli_run(['--bogus'], { io, env: {} })).toBe(EXIT_USAGE);
        expect(io.stderr[0]).toContain('Unknown option: --bogus');
    });

    it('exits 1 and lists every issue on an invalid configuration', async (): Promise<void> => {
        const file: string = await config_write(document_create({ rates: { nginx: -2, mainframe: 1 } }));
        const io = io_capture();

        expect(await cli_run(['--config', file], { io, env: {} })).toBe(EXIT_CONFIG);
        expect(io.stderr).toHaveLength(2);
        expect(io.stderr[0]).toContain(`Configuration error (${file}): Invalid configuration`);
        expect(io.stderr[1]).toContain('  - [rates.nginx] rate must be >= 0');
    });

    it('exits 1 when the configuration file is missing', async (): Promise<void> => {
        const io = io_capture();
        const missing: string = path.join(dir, 'absent.yaml');

        expect(await cli_run(['-c', missing], { io, env: {} })).toBe(EXIT_CONFIG);
        expect(io.stderr[0]).toContain(`Configuration file not readable: ${missing}`);
    });

    it('prints the status report without generating', async (): Promise<void> => {
        const output: string = path.join(dir, 'logs');
        const file: string = await config_write(document_create({ output: { directory: output } }));
        const io = io_capture();

        expect(await cli_run(['--config', file, '--status'], { io, env: {} })).toBe(EXIT_OK);
        expect(io.stdout).toHaveLength(1);
        expect(io.stdout[0]).toContain('LOG GENERATOR STATUS');
        await expect(fs.stat(output)).rejects.toThrow();
    });

    it('backfills simulated time into rotating files', async (): Promise<void> => {
        const output: string = path.join(dir, 'logs');
        const file: string = await config_write(document_create({ rates: { nginx: 2, database: 1 } }));
        const from: string = '2026-10-19T12:00:00.000Z';
        const opLines: string[] = [];

        const code: number = await cli_run(
            ['--config', file, '--simulate-from', from, '--duration', '5', '--seed', '7', '--output', output, '--log-level', 'error'],
            { io: io_capture(), env: {}, transports: [(line: string): void => { opLines.push(line); }] },
        );

        const stamp: string = fileStamp_format(new Date(from));
        const nginx: string = await fs.readFile(path.join(output, 'nginx', `nginx_${stamp}.log`), 'utf-8');
        const database: string = await fs.readFile(path.join(output, 'database', `database_${stamp}.log`), 'utf-8');

        expect(code).toBe(EXIT_OK);
        expect(nginx.trimEnd().split('\n')).toHaveLength(11);
        expect(database.trimEnd().split('\n')).toHaveLength(6);
        expect((await fs.readdir(output)).sort()).toEqual(['database', 'nginx']);
        expect(opLines).toEqual([]);
    });
});
