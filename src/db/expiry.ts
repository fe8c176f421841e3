import type { FastifyBaseLogger } from 'fastify';
import type { WrapperStore } from '../modules/wrapper/types';
import { epochSeconds } from '../modules/wrapper/service';

type Purgeable = Pick<WrapperStore, 'purgeExpired'>;
type SweepLogger = Pick<FastifyBaseLogger, 'debug' | 'error'>;

/**
 * Deletes every expired record once and logs how many went.
 *
 * @param {Purgeable} store - Store to purge
 * @param {number} nowSeconds - Current time in epoch seconds
 * @param {SweepLogger} log - Logger for the purge count
 * @returns {Promise<number>} Number of records removed
 */
export async function sweepExpired(store: Purgeable, nowSeconds: number, log: SweepLogger): Promise<number> {
    const purged = await store.purgeExpired(nowSeconds);
    if (purged > 0) {
        log.debug({ purged }, 'expired wrappers purged');
    }
    return purged;
}

export interface ExpirySweepOptions {
    intervalMs: number;
    log: SweepLogger;
    now?: () => number;
}

/**
 * Runs {@link sweepExpired} on a fixed interval. SQLite has no native TTL, so
 * this plays the part of the store's own background expiry.
 *
 * The timer does not keep the process alive. Returns a function that stops it.
 * An interval of 0 disables the sweep.
 *
 * @param {Purgeable} store - Store to purge
 * @param {ExpirySweepOptions} options - Interval, logger and clock
 * @returns {() => void} Stops the sweep
 */
export function scheduleExpirySweep(store: Purgeable, options: ExpirySweepOptions): () => void {
    if (options.intervalMs <= 0) {
        return () => {};
    }
    const now = options.now ?? epochSeconds;

    const timer = setInterval(() => {
        sweepExpired(store, now(), options.log).catch((error: unknown) => {
            options.log.error({ err: error }, 'expiry sweep failed');
        });
    }, options.intervalMs);
    timer.unref();

    return () => clearInterval(timer);
}
