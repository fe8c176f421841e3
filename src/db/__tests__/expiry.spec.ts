import { describe, it, expect, afterEach, vi } from 'vitest';
import { scheduleExpirySweep, sweepExpired } from '../expiry';

function stubLogger() {
    return { debug: vi.fn(), error: vi.fn() };
}

describe('sweepExpired', () => {
    it('purges as of the given instant and returns the count', async () => {
        const purgeExpired = vi.fn(async (_now: number) => 3);
        const log = stubLogger();

        expect(await sweepExpired({ purgeExpired }, 1_234, log)).toBe(3);
        expect(purgeExpired).toHaveBeenCalledWith(1_234);
        expect(log.debug).toHaveBeenCalledWith({ purged: 3 }, 'expired wrappers purged');
    });

    it('stays quiet when nothing expired', async () => {
        const log = stubLogger();

        expect(await sweepExpired({ purgeExpired: vi.fn(async () => 0) }, 1, log)).toBe(0);
        expect(log.debug).not.toHaveBeenCalled();
    });
});

describe('scheduleExpirySweep', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('sweeps on every interval until stopped', () => {
        vi.useFakeTimers();
        const purgeExpired = vi.fn(async (_now: number) => 0);

        const stop = scheduleExpirySweep({ purgeExpired }, { intervalMs: 1_000, log: stubLogger(), now: () => 500 });
        vi.advanceTimersByTime(3_000);
        expect(purgeExpired).toHaveBeenCalledTimes(3);
        expect(purgeExpired).toHaveBeenCalledWith(500);

        stop();
        vi.advanceTimersByTime(3_000);
        expect(purgeExpired).toHaveBeenCalledTimes(3);
    });

    it('does nothing with a zero interval', () => {
        vi.useFakeTimers();
        const purgeExpired = vi.fn(async () => 0);

        const stop = scheduleExpirySweep({ purgeExpired }, { intervalMs: 0, log: stubLogger() });
        vi.advanceTimersByTime(60_000);
        expect(purgeExpired).not.toHaveBeenCalled();
        stop();
    });

    it('logs a failed sweep and keeps running', async () => {
        const purgeExpired = vi.fn(async () => {
            throw new Error('database is locked');
        });
        const log = stubLogger();

        const stop = scheduleExpirySweep({ purgeExpired }, { intervalMs: 5, log });
        try {
            await vi.waitFor(() => {
                expect(purgeExpired.mock.calls.length).toBeGreaterThanOrEqual(2);
                expect(log.error).toHaveBeenCalledWith({ err: expect.any(Error) }, 'expiry sweep failed');
            });
        } finally {
            stop();
        }
    });
});
