import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { createClient } from '@libsql/client';
import { drizzle } from 'drizzle-orm/libsql';
import type { LibSQLDatabase } from 'drizzle-orm/libsql';
import { createWrapperTable, type WrapperTable } from './schema';

export interface CreateDbOptions {
    /** SQLite file path, or `:memory:` */
    path: string;
    tableName: string;
}

/**
 * An open wrapper database: the drizzle handle, the table it operates on and
 * a way to release the underlying connection.
 */
export interface WrapperDb {
    orm: LibSQLDatabase;
    table: WrapperTable;
    close(): void;
}

/**
 * Opens the SQLite database backing the wrapper store.
 *
 * Performs the following initialization:
 * - Creates the parent directory of a file-backed database
 * - Sets up WAL journal mode
 * - Creates the wrapper table and its expiry index if they don't exist
 *
 * Called once per process; the returned handle is passed to whatever needs it.
 *
 * @param {CreateDbOptions} options - Database location and table name
 * @returns {Promise<WrapperDb>} Open database handle
 */
export async function createDb(options: CreateDbOptions): Promise<WrapperDb> {
    let url = ':memory:';
    if (options.path !== ':memory:') {
        mkdirSync(path.dirname(options.path), { recursive: true });
        url = `file:${options.path}`;
    }
    const client = createClient({ url });

    await client.execute('PRAGMA journal_mode = WAL');

    // tableName is validated as a plain identifier by the config schema
    const name = options.tableName;
    await client.executeMultiple(`
        CREATE TABLE IF NOT EXISTS "${name}" (
            id TEXT PRIMARY KEY,
            value TEXT NOT NULL,
            expireAt INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS "idx_${name}_expireAt" ON "${name}"(expireAt);
    `);

    return {
        orm: drizzle(client),
        table: createWrapperTable(name),
        close: () => client.close(),
    };
}
