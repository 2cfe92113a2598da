/**
 * @file Error Taxonomy
 *
 * Three failure classes with distinct propagation rules:
 *   - ConfigError: fatal, raised before any producer starts.
 *   - GenerationError: one record could not be produced; logged, stream continues.
 *   - SinkError: one line could not be written; logged, line dropped.
 *
 * @module
 */

export type ErrorKind = 'config' | 'generation' | 'sink';

/**
 * Common base so callers can narrow on `kind` instead of `instanceof` chains.
 */
export abstract class SynthlogError extends Error {
    public abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Invalid or unreadable configuration document.
 */
export class ConfigError extends SynthlogError {
    public readonly kind = 'config' as const;
    public readonly issues: readonly string[];
    /** Message without the issue list. */
    public readonly summary: string;

    constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
        this.summary = message;
        this.issues = issues;
    }
}

export class GenerationError extends SynthlogError {
    public readonly kind = 'generation' as const;

    constructor(public readonly service: string, message: string, options?: { cause?: unknown }) {
        super(`[${service}] ${message}`, options);
    }
}

export class SinkError extends SynthlogError {
    public readonly kind = 'sink' as const;

    constructor(
        public readonly service: string,
        public readonly path: string | null,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(`[${service}] ${message}`, options);
    }
}

/**
 * Render any thrown value as a one-line message.
 */
export function errorMessage_get(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
