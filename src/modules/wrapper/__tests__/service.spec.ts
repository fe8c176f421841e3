import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createDb, type WrapperDb } from '../../../db';
import { SqliteWrapperStore } from '../repo';
import { SecretStoreGateway, generateWrapperId } from '../service';
import type { WrapperStore } from '../types';

describe('generateWrapperId', () => {
    it('produces distinct 32 character hex ids', () => {
        const a = generateWrapperId();
        const b = generateWrapperId();
        expect(a).toMatch(/^[0-9a-f]{32}$/);
        expect(b).toMatch(/^[0-9a-f]{32}$/);
        expect(a).not.toBe(b);
    });
});

describe('SecretStoreGateway', () => {
    let db: WrapperDb;
    let store: SqliteWrapperStore;
    let now: number;

    beforeEach(async () => {
        db = await createDb({ path: ':memory:', tableName: 'wrappers' });
        store = new SqliteWrapperStore(db);
        now = 1_000;
    });

    afterEach(() => {
        db.close();
    });

    it('stamps the record with now + ttl', async () => {
        const gateway = new SecretStoreGateway(store, { now: () => now });

        const created = await gateway.create('s3cr3t', 45);

        expect(created.expireAt).toBe(1_045);
        expect(created.id).toMatch(/^[0-9a-f]{32}$/);
        expect(await gateway.retrieveAndDelete(created.id)).toEqual({
            id: created.id,
            value: 's3cr3t',
            expireAt: 1_045,
        });
    });

    it('hands a record out only once', async () => {
        const gateway = new SecretStoreGateway(store, { now: () => now });
        const { id } = await gateway.create('once', 60);

        expect(await gateway.retrieveAndDelete(id)).not.toBeNull();
        expect(await gateway.retrieveAndDelete(id)).toBeNull();
    });

    it('resolves concurrent retrievals to a single winner', async () => {
        const gateway = new SecretStoreGateway(store, { now: () => now });
        const { id } = await gateway.create('race', 60);

        const results = await Promise.all([
            gateway.retrieveAndDelete(id),
            gateway.retrieveAndDelete(id),
            gateway.retrieveAndDelete(id),
        ]);

        expect(results.filter((r) => r !== null)).toHaveLength(1);
    });

    it('treats a record at its expiry instant as gone', async () => {
        const gateway = new SecretStoreGateway(store, { now: () => now });
        const { id } = await gateway.create('brief', 30);

        now = 1_030;
        expect(await gateway.retrieveAndDelete(id)).toBeNull();
    });

    it('picks a new id when the generated one is already live', async () => {
        const ids = ['aaa', 'aaa', 'bbb'];
        const gateway = new SecretStoreGateway(store, {
            now: () => now,
            generateId: () => ids.shift() ?? 'zzz',
        });

        const first = await gateway.create('first', 60);
        const second = await gateway.create('second', 60);

        expect(first.id).toBe('aaa');
        expect(second.id).toBe('bbb');
        expect((await gateway.retrieveAndDelete('aaa'))?.value).toBe('first');
    });

    it('gives up after the configured number of colliding ids', async () => {
        const gateway = new SecretStoreGateway(store, {
            now: () => now,
            generateId: () => 'same',
            maxIdAttempts: 2,
        });

        await gateway.create('first', 60);
        await expect(gateway.create('second', 60)).rejects.toThrow(
            'Failed to allocate a unique wrapper id after 2 attempts',
        );
    });

    it('propagates store failures', async () => {
        const failing: WrapperStore = {
            insertIfAbsent: vi.fn(async () => {
                throw new Error('store unavailable');
            }),
            takeById: vi.fn(async () => null),
            purgeExpired: vi.fn(async () => 0),
        };
        const gateway = new SecretStoreGateway(failing, { now: () => now });

        await expect(gateway.create('value', 60)).rejects.toThrow('store unavailable');
    });
});
