import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

/**
 * Builds the drizzle table definition for wrapper records.
 *
 * The table name is deployment configuration, so the definition is created at
 * startup rather than declared once at module level.
 */
export function createWrapperTable(name: string) {
    return sqliteTable(name, {
        /** Server-generated 32 character hex identifier */
        id: text('id').primaryKey(),
        value: text('value').notNull(),
        /** Absolute expiry in epoch seconds */
        expireAt: integer('expireAt', { mode: 'number' }).notNull(),
    });
}

export type WrapperTable = ReturnType<typeof createWrapperTable>;
