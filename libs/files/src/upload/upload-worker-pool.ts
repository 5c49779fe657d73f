import { Inject, Injectable } from '@nestjs/common';
import { UPLOAD_SETTINGS, UploadSettings } from './upload.settings';

/**
 * Process-wide cap on part uploads in flight, shared by every upload.
 * Active tasks never exceed `capacity`; waiters are served first come, first served.
 */
@Injectable()
export class UploadWorkerPool {
    private available: number;
    private readonly waiters: Array<() => void> = [];

    readonly capacity: number;

    constructor(@Inject(UPLOAD_SETTINGS) settings: UploadSettings) {
        if (!Number.isSafeInteger(settings.workerPoolSize) || settings.workerPoolSize <= 0) {
            throw new Error(`invalid worker pool size=${settings.workerPoolSize}`);
        }
        this.capacity = settings.workerPoolSize;
        this.available = this.capacity;
    }

    get active(): number {
        return this.capacity - this.available;
    }

    get waiting(): number {
        return this.waiters.length;
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }

    private async acquire(): Promise<void> {
        if (this.available > 0) {
            this.available -= 1;
            return;
        }
        await new Promise<void>((resolve) => {
            this.waiters.push(resolve);
        });
    }

    private release(): void {
        const next = this.waiters.shift();
        if (next) {
            // hand the slot straight to the next waiter
            next();
            return;
        }
        this.available += 1;
    }
}
