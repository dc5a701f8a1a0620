import { describe, it, expect, vi } from 'vitest';
import { SingleFlight } from '../../src/utils/single-flight.js';

describe('SingleFlight', () => {
    it('shares one call between concurrent callers of the same key', async () => {
        const flights = new SingleFlight<number>();
        let release: (value: number) => void = () => undefined;
        const fn = vi.fn(() => new Promise<number>((resolve) => (release = resolve)));

        const leader = flights.run('fp', fn);
        const follower = flights.run('fp', fn);
        release(42);

        expect(leader.shared).toBe(false);
        expect(follower.shared).toBe(true);
        expect(await follower.promise).toBe(42);
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('releases the key once the call settles', async () => {
        const flights = new SingleFlight<number>();

        await expect(flights.run('fp', () => Promise.reject(new Error('boom'))).promise).rejects.toThrow('boom');
        expect(flights.size).toBe(0);

        const next = flights.run('fp', () => Promise.resolve(7));
        expect(next.shared).toBe(false);
        expect(await next.promise).toBe(7);
    });

    it('keeps different keys apart', async () => {
        const flights = new SingleFlight<string>();

        const a = flights.run('a', () => Promise.resolve('A'));
        const b = flights.run('b', () => Promise.resolve('B'));

        expect(b.shared).toBe(false);
        expect(await Promise.all([a.promise, b.promise])).toEqual(['A', 'B']);
    });
});
