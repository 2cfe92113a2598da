/**
 * @file Clocks
 *
 * The scheduler reads time and waits only through a `Clock`.
 *
 * `SystemClock` is wall time. `SimulatedClock` is a discrete-event clock:
 * sleeping registers a wake-up at a virtual instant, and `run_for` advances
 * virtual time one wake-up at a time, only once every participant is
 * parked. Output on a simulated clock depends only on the seed and the
 * configuration, which makes runs byte-for-byte reproducible and lets a
 * backfill cover hours of traffic in seconds.
 *
 * @module scheduler
 */

export interface Clock {
    /** Epoch milliseconds. */
    now(): number;

    /**
     * Resolve after `ms`, or as soon as `signal` aborts. Never rejects.
     */
    sleep(ms: number, signal: AbortSignal): Promise<void>;

    /**
     * Let `durationMs` elapse (or until `signal` aborts) while
     * `participants()` producers run.
     */
    run_for(durationMs: number, signal: AbortSignal, participants: () => number): Promise<void>;
}

export class SystemClock implements Clock {
    now(): number {
        return Date.now();
    }

    sleep(ms: number, signal: AbortSignal): Promise<void> {
        return new Promise<void>((resolve): void => {
            if (signal.aborted) {
                resolve();
                return;
            }
            const onAbort = (): void => {
                clearTimeout(timer);
                resolve();
            };
            const timer: NodeJS.Timeout = setTimeout((): void => {
                signal.removeEventListener('abort', onAbort);
                resolve();
            }, Math.max(0, ms));
            signal.addEventListener('abort', onAbort, { once: true });
        });
    }

    run_for(durationMs: number, signal: AbortSignal): Promise<void> {
        return this.sleep(durationMs, signal);
    }
}

interface Waiter {
    at: number;
    seq: number;
    wake: () => void;
}

/** Upper bound on idle polls before the simulation gives up on a stuck producer. */
const SETTLE_POLL_LIMIT: number = 100000;

export class SimulatedClock implements Clock {
    private current: number;
    private seq: number = 0;
    private waiters: Waiter[] = [];

    constructor(start: Date | number) {
        this.current = typeof start === 'number' ? start : start.getTime();
    }

    now(): number {
        return this.current;
    }

    sleep(ms: number, signal: AbortSignal): Promise<void> {
        return new Promise<void>((resolve): void => {
            if (signal.aborted) {
                resolve();
                return;
            }
            const waiter: Waiter = {
                at: this.current + Math.max(0, ms),
                seq: this.seq++,
                wake: (): void => {
                    signal.removeEventListener('abort', onAbort);
                    resolve();
                },
            };
            const onAbort = (): void => {
                this.waiters = this.waiters.filter((w: Waiter): boolean => w !== waiter);
                resolve();
            };
            this.waiters.push(waiter);
            signal.addEventListener('abort', onAbort, { once: true });
        });
    }

    /**
     * Number of parked sleepers.
     */
    waiting_count(): number {
        return this.waiters.length;
    }

    /**
     * Wake the earliest sleeper due at or before `until`. Returns false and
     * moves time to `until` when there is none.
     */
    step(until: number): boolean {
        this.waiters.sort((a: Waiter, b: Waiter): number => a.at - b.at || a.seq - b.seq);
        const next: Waiter | undefined = this.waiters[0];
        if (!next || next.at > until) {
            this.current = Math.max(this.current, until);
            return false;
        }
        this.waiters.shift();
        this.current = Math.max(this.current, next.at);
        next.wake();
        return true;
    }

    async run_for(durationMs: number, signal: AbortSignal, participants: () => number): Promise<void> {
        const until: number = this.current + durationMs;
        while (!signal.aborted) {
            await this.participants_settle(participants, signal);
            if (signal.aborted || !this.step(until)) break;
        }
    }

    /**
     * Yield to the event loop until every running participant is parked.
     */
    private async participants_settle(participants: () => number, signal: AbortSignal): Promise<void> {
        for (let polls = 0; polls < SETTLE_POLL_LIMIT; polls++) {
            if (signal.aborted || this.waiters.length >= participants()) return;
            await new Promise<void>((resolve): void => {
                setImmediate(resolve);
            });
        }
        throw new Error(`simulation stalled: ${participants() - this.waiters.length} producer(s) never parked`);
    }
}
