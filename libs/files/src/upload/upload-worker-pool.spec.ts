import { UploadWorkerPool } from './upload-worker-pool';
import { resolveUploadSettings } from './upload.settings';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('UploadWorkerPool', () => {
    it('should never run more tasks than its capacity', async () => {
        const pool = new UploadWorkerPool(resolveUploadSettings({ workerPoolSize: 2 }));
        let running = 0;
        let peak = 0;

        const results = await Promise.all([1, 2, 3, 4, 5].map((n) => pool.run(async () => {
            running += 1;
            peak = Math.max(peak, running);
            await sleep(5);
            running -= 1;
            return n * 10;
        })));

        expect(results).toEqual([10, 20, 30, 40, 50]);
        expect(peak).toBe(2);
        expect(pool.active).toBe(0);
        expect(pool.waiting).toBe(0);
    });

    it('should queue callers while full', async () => {
        const pool = new UploadWorkerPool(resolveUploadSettings({ workerPoolSize: 1 }));
        let release: () => void = () => undefined;
        const first = pool.run(() => new Promise<void>((resolve) => {
            release = resolve;
        }));
        const second = pool.run(async () => 'second');

        await sleep(0);
        expect(pool.active).toBe(1);
        expect(pool.waiting).toBe(1);

        release();
        await first;
        await expect(second).resolves.toBe('second');
        expect(pool.active).toBe(0);
    });

    it('should free the slot when a task fails', async () => {
        const pool = new UploadWorkerPool(resolveUploadSettings({ workerPoolSize: 1 }));

        await expect(pool.run(async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        expect(pool.active).toBe(0);
        await expect(pool.run(async () => 'next')).resolves.toBe('next');
    });

    it('should refuse an invalid capacity', () => {
        const settings = { ...resolveUploadSettings(), workerPoolSize: 0 };

        expect(() => new UploadWorkerPool(settings)).toThrow('invalid worker pool size=0');
    });
});
