#!/usr/bin/env node
/**
 * @file synthlog entry point
 *
 * Process wiring for `cli_run`: SIGINT and SIGTERM start a graceful drain,
 * and the returned code becomes the exit code.
 *
 * Usage:
 *   synthlog --config config.yaml --duration 60
 *   synthlog --status
 *
 * @module cli
 */

import chalk from 'chalk';
import { errorMessage_get } from '../errors.js';
import { cli_run } from './main.js';

const shutdown: AbortController = new AbortController();
const onSignal = (): void => shutdown.abort();
process.once('SIGINT', onSignal);
process.once('SIGTERM', onSignal);

cli_run(process.argv.slice(2), { signal: shutdown.signal })
    .then((code: number): void => {
        process.exitCode = code;
    })
    .catch((err: unknown): void => {
        console.error(chalk.red(`synthlog failed: ${errorMessage_get(err)}`));
        process.exitCode = 1;
    })
    .finally((): void => {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
    });
