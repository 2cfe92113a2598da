/**
 * @file Random Source
 *
 * Every random draw in the engine goes through a `RandomSource`. The
 * Faker-backed implementation is deterministic when seeded and random
 * otherwise.
 *
 * Each service gets its own stream, seeded from the run seed and the
 * service name, so the records of one service do not depend on how many
 * draws another service made before it.
 *
 * @module identity
 */

import { Faker, base, en } from '@faker-js/faker';

export interface WeightedChoice<T> {
    value: T;
    weight: number;
}

export interface RandomSource {
    /** Uniform float in [min, max]. */
    float(min: number, max: number): number;
    /** Uniform integer in [min, max], both inclusive. */
    int(min: number, max: number): number;
    /** True with probability `p`; exactly false at p <= 0 and true at p >= 1. */
    chance(p: number): boolean;
    pick<T>(items: readonly T[]): T;
    weighted<T>(choices: readonly WeightedChoice<T>[]): T;
    uuid(): string;
    ipv4(): string;
    userName(): string;
    sha1(): string;
    fileName(): string;
    sentence(): string;
    /** Lowercase letters. */
    letters(length: number): string;
    /** Lowercase hex digits. */
    hex(length: number): string;
}

const FLOAT_STEP: number = 0.000001;

export class FakerRandomSource implements RandomSource {
    private readonly faker: Faker;

    constructor(seed: number | null) {
        this.faker = new Faker({ locale: [en, base] });
        if (seed !== null) {
            this.faker.seed(seed);
        }
    }

    float(min: number, max: number): number {
        if (max <= min) return min;
        return this.faker.number.float({ min, max, multipleOf: FLOAT_STEP });
    }

    int(min: number, max: number): number {
        if (max <= min) return min;
        return this.faker.number.int({ min, max });
    }

    chance(p: number): boolean {
        if (p <= 0) return false;
        if (p >= 1) return true;
        return this.faker.number.float({ min: 0, max: 1, multipleOf: FLOAT_STEP }) < p;
    }

    pick<T>(items: readonly T[]): T {
        return this.faker.helpers.arrayElement(items);
    }

    weighted<T>(choices: readonly WeightedChoice<T>[]): T {
        return this.faker.helpers.weightedArrayElement(choices);
    }

    uuid(): string {
        return this.faker.string.uuid();
    }

    ipv4(): string {
        return this.faker.internet.ipv4();
    }

    userName(): string {
        return this.faker.internet.userName().toLowerCase();
    }

    sha1(): string {
        return this.faker.git.commitSha();
    }

    fileName(): string {
        return this.faker.system.fileName();
    }

    sentence(): string {
        return this.faker.lorem.sentence();
    }

    letters(length: number): string {
        return this.faker.string.alpha({ length, casing: 'lower' });
    }

    hex(length: number): string {
        return this.faker.string.hexadecimal({ length, casing: 'lower', prefix: '' });
    }
}

/**
 * FNV-1a over the label, mixed with the run seed.
 */
export function seed_derive(seed: number, label: string): number {
    let hash: number = 0x811c9dc5;
    for (let i = 0; i < label.length; i++) {
        hash ^= label.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return ((hash ^ seed) >>> 0);
}

/**
 * Build the random stream for one label (a service name, or `identity`).
 */
export function randomSource_create(seed: number | null, label: string): RandomSource {
    return new FakerRandomSource(seed === null ? null : seed_derive(seed, label));
}
