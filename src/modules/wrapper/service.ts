import crypto from 'node:crypto';
import { config } from '../../config';
import type { CreatedWrapper, WrapperRecord, WrapperStore } from './types';

/**
 * Generates a wrapper id: 128 random bits as 32 lowercase hex characters.
 *
 * @returns {string} Fresh wrapper id
 */
export function generateWrapperId(): string {
    return crypto.randomBytes(16).toString('hex');
}

/** Current time in whole epoch seconds. */
export function epochSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

export interface SecretStoreGatewayOptions {
    /** Clock in epoch seconds */
    now?: () => number;
    generateId?: () => string;
    /** How many fresh ids to try before giving up on a create */
    maxIdAttempts?: number;
}

/**
 * Create-with-expiry and read-once retrieval over a {@link WrapperStore}.
 *
 * Expiry is left to the store: the gateway stamps each record with an
 * absolute instant and never sweeps.
 */
export class SecretStoreGateway {
    private readonly now: () => number;
    private readonly generateId: () => string;
    private readonly maxIdAttempts: number;

    constructor(private readonly store: WrapperStore, options: SecretStoreGatewayOptions = {}) {
        this.now = options.now ?? epochSeconds;
        this.generateId = options.generateId ?? generateWrapperId;
        this.maxIdAttempts = options.maxIdAttempts ?? config.limits.idAttempts;
    }

    /**
     * Stores `value` under a fresh id until `now + ttl`.
     *
     * The write is conditional, so an id that is already live is never
     * overwritten; a colliding id is replaced with a new one.
     *
     * @param {string} value - Secret to store, kept verbatim
     * @param {number} ttl - Lifetime in seconds, already validated
     * @returns {Promise<CreatedWrapper>} The new id and its expiry in epoch seconds
     * @throws {Error} if no free id was found within the attempt limit, or the store fails
     */
    async create(value: string, ttl: number): Promise<CreatedWrapper> {
        const expireAt = this.now() + ttl;

        for (let attempt = 1; attempt <= this.maxIdAttempts; attempt++) {
            const id = this.generateId();
            const inserted = await this.store.insertIfAbsent({ id, value, expireAt });
            if (inserted) {
                return { id, expireAt };
            }
        }

        throw new Error(`Failed to allocate a unique wrapper id after ${this.maxIdAttempts} attempts`);
    }

    /**
     * Removes the record and returns what it held. Resolves to null when the id
     * was never created, was already retrieved, or has expired; callers cannot
     * tell these apart.
     *
     * @param {string} id - Validated wrapper id
     * @returns {Promise<WrapperRecord | null>} The record as it was stored, or null
     */
    async retrieveAndDelete(id: string): Promise<WrapperRecord | null> {
        return this.store.takeById(id, this.now());
    }
}
