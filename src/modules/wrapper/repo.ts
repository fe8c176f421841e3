import { eq, lte } from 'drizzle-orm';
import type { WrapperDb } from '../../db';
import type { WrapperRecord, WrapperStore } from './types';

/**
 * SQLite-backed wrapper store.
 *
 * Retrieval is a single `DELETE ... RETURNING` statement, and SQLite runs
 * statements on one connection one at a time, so no two callers can both take
 * the same row.
 */
export class SqliteWrapperStore implements WrapperStore {
    constructor(private readonly db: WrapperDb) {}

    /**
     * Inserts the record unless a row with its id already exists.
     *
     * @param {WrapperRecord} record - Record to store
     * @returns {Promise<boolean>} False if the id was taken and nothing was written
     */
    async insertIfAbsent(record: WrapperRecord): Promise<boolean> {
        const { orm, table } = this.db;
        const result = await orm
            .insert(table)
            .values({ id: record.id, value: record.value, expireAt: record.expireAt })
            .onConflictDoNothing()
            .run();
        return result.rowsAffected === 1;
    }

    /**
     * Deletes the row for `id` and returns it, unless it had already expired.
     *
     * @param {string} id - Wrapper id
     * @param {number} nowSeconds - Current time in epoch seconds
     * @returns {Promise<WrapperRecord | null>} The deleted record, or null if there was none or it had expired
     */
    async takeById(id: string, nowSeconds: number): Promise<WrapperRecord | null> {
        const { orm, table } = this.db;
        const rows = await orm.delete(table).where(eq(table.id, id)).returning();
        const row = rows[0];
        if (!row) return null;

        // Rows the sweep has not reached yet are consumed but never handed out
        if (row.expireAt <= nowSeconds) return null;

        return { id: row.id, value: row.value, expireAt: row.expireAt };
    }

    /**
     * Deletes every row whose expiry is at or before `nowSeconds`.
     *
     * @param {number} nowSeconds - Current time in epoch seconds
     * @returns {Promise<number>} Number of rows removed
     */
    async purgeExpired(nowSeconds: number): Promise<number> {
        const { orm, table } = this.db;
        const result = await orm.delete(table).where(lte(table.expireAt, nowSeconds)).run();
        return result.rowsAffected;
    }
}
