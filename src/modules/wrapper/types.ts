/**
 * A stored one-time secret. `expireAt` is an absolute instant in epoch seconds.
 */
export interface WrapperRecord {
    id: string;
    value: string;
    expireAt: number;
}

/**
 * Key-value backend for wrapper records.
 *
 * Implementations must make {@link WrapperStore.takeById} atomic: when several
 * callers race on one id, exactly one of them receives the record.
 */
export interface WrapperStore {
    /** Stores the record unless its id is already taken. Returns false on conflict. */
    insertIfAbsent(record: WrapperRecord): Promise<boolean>;
    /**
     * Deletes the record and returns its prior contents in one operation.
     * Resolves to null when nothing was stored under `id` or the record was
     * already expired at `nowSeconds`.
     */
    takeById(id: string, nowSeconds: number): Promise<WrapperRecord | null>;
    /** Removes every record whose expiry is at or before `nowSeconds`; returns how many. */
    purgeExpired(nowSeconds: number): Promise<number>;
}

export interface CreatedWrapper {
    id: string;
    expireAt: number;
}

/** Validated input for creating a wrapper. */
export interface CreateWrapperInput {
    value: string;
    ttl: number;
}

/** A single field-level validation failure. */
export interface ValidationIssue {
    field: string;
    message: string;
}

export type ValidationResult<T> =
    | { success: true; data: T }
    | { success: false; error: ValidationIssue[] };

export interface CreateWrapperData {
    id: string;
    expire: number;
}

export interface RetrieveWrapperData {
    id: string;
    value: string;
    expire: number;
}

/**
 * Body of every wrapper API response. The HTTP status is always 200;
 * `status` carries the outcome.
 */
export type WrapperEnvelope<T> =
    | { status: 'success'; data: T; ref: string }
    | { status: 'failed'; error: ValidationIssue[] | string; ref: string };

export const NOT_FOUND_MESSAGE = 'wrapper id not found or expired';
export const INTERNAL_ERROR_MESSAGE = 'internal error';
export const ROUTE_NOT_FOUND_MESSAGE = 'route not found';
