import { KeyedMutex } from '../../src/shared/keyed-mutex';

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('KeyedMutex', () => {
    it('runs tasks on the same key one at a time, in call order', async () => {
        const mutex = new KeyedMutex();
        const log: string[] = [];

        const task = (label: string, delay: number) => async () => {
            log.push(`${label}:start`);
            await tick(delay);
            log.push(`${label}:end`);
            return label;
        };

        const results = await Promise.all([
            mutex.runExclusive('BTC', task('a', 20)),
            mutex.runExclusive('BTC', task('b', 1)),
        ]);

        expect(results).toEqual(['a', 'b']);
        expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });

    it('lets different keys proceed concurrently', async () => {
        const mutex = new KeyedMutex();
        const log: string[] = [];

        await Promise.all([
            mutex.runExclusive('BTC', async () => {
                log.push('btc:start');
                await tick(20);
                log.push('btc:end');
            }),
            mutex.runExclusive('ETH', async () => {
                log.push('eth:start');
                await tick(1);
                log.push('eth:end');
            }),
        ]);

        expect(log).toEqual(['btc:start', 'eth:start', 'eth:end', 'btc:end']);
    });

    it('releases the key when a task throws', async () => {
        const mutex = new KeyedMutex();

        await expect(
            mutex.runExclusive('BTC', async () => {
                throw new Error('boom');
            })
        ).rejects.toThrow('boom');

        await expect(mutex.runExclusive('BTC', () => 'next')).resolves.toBe('next');
        expect(mutex.isLocked('BTC')).toBe(false);
        expect(mutex.size).toBe(0);
    });

    it('serializes read-modify-write on a shared counter', async () => {
        const mutex = new KeyedMutex();
        let counter = 0;

        await Promise.all(
            Array.from({ length: 10 }, () =>
                mutex.runExclusive('counter', async () => {
                    const read = counter;
                    await tick(1);
                    counter = read + 1;
                })
            )
        );

        expect(counter).toBe(10);
    });
});
