import { Inject, Injectable, Logger } from '@nestjs/common';
import { OBJECT_STORE_GATEWAY, ObjectStoreGateway } from '../object-store.gateway';
import { UploadPartError } from './upload.errors';
import { MultipartSession, PartResult } from './upload.types';
import { UploadWorkerPool } from './upload-worker-pool';

const MiB = 1024 * 1024;

@Injectable()
export class PartUploader {
    private readonly logger = new Logger(PartUploader.name);

    constructor(
        @Inject(OBJECT_STORE_GATEWAY) private readonly gateway: ObjectStoreGateway,
        private readonly workerPool: UploadWorkerPool,
    ) { }

    /**
     * Sends one part through the shared worker pool.
     * @throws UploadPartError when the store rejects the part
     */
    async upload(session: MultipartSession, partNumber: number, body: Buffer): Promise<PartResult> {
        return this.workerPool.run(async () => {
            const startedAt = performance.now();
            let etag: string;
            try {
                etag = await this.gateway.putPart(session.key, session.uploadId, partNumber, body);
            } catch (error) {
                throw new UploadPartError(partNumber, error);
            }
            const durationMs = performance.now() - startedAt;

            const seconds = durationMs / 1000;
            const throughput = seconds > 0 ? body.length / MiB / seconds : 0;
            this.logger.debug(
                `Part ${partNumber}/${session.plan.totalParts} of ${session.key}: ${body.length} bytes in ${durationMs.toFixed(1)}ms (${throughput.toFixed(2)} MiB/s)`,
            );

            return { partNumber, etag, size: body.length, durationMs };
        });
    }
}
