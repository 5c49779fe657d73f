import { Inject, Injectable } from '@nestjs/common';
import { ChunkPlan, UploadStrategy } from './upload.types';
import { UPLOAD_SETTINGS, UploadSettings } from './upload.settings';

/**
 * Picks the upload strategy, chunk size and concurrency for a file size.
 * Pure: the same size and settings always give an equal plan.
 */
export function classify(fileSize: number, settings: UploadSettings): ChunkPlan {
    if (fileSize < settings.multipartThreshold) {
        return {
            strategy: UploadStrategy.SINGLE_SHOT,
            totalSize: fileSize,
            chunkSize: fileSize,
            totalParts: 1,
            lastPartSize: fileSize,
            concurrency: 1,
        };
    }

    const chunkSize = chunkSizeFor(fileSize, settings);
    const totalParts = Math.ceil(fileSize / chunkSize);
    const lastPartSize = fileSize - chunkSize * (totalParts - 1);

    if (fileSize >= settings.streamingThreshold) {
        return {
            strategy: UploadStrategy.STREAMING_MULTIPART,
            totalSize: fileSize,
            chunkSize,
            totalParts,
            lastPartSize,
            concurrency: 1,
        };
    }

    return {
        strategy: UploadStrategy.CONCURRENT_MULTIPART,
        totalSize: fileSize,
        chunkSize,
        totalParts,
        lastPartSize,
        concurrency: concurrencyFor(totalParts, settings),
    };
}

export function chunkSizeFor(fileSize: number, settings: UploadSettings): number {
    const { small, medium, large } = settings.chunkBands;
    if (fileSize <= small.maxFileSize) {
        return small.chunkSize;
    }
    if (fileSize <= medium.maxFileSize) {
        return medium.chunkSize;
    }
    return large.chunkSize;
}

// Step ladder: too few parts to gain anything, every part at once, a moderate fixed
// level, then the configured maximum.
export function concurrencyFor(totalParts: number, settings: UploadSettings): number {
    if (totalParts < settings.minChunksForConcurrency) {
        return 1;
    }
    if (totalParts < settings.fullConcurrencyCeiling) {
        return Math.min(totalParts, settings.maxConcurrentUploads);
    }
    if (totalParts < settings.limitedConcurrencyCeiling) {
        return Math.min(settings.limitedConcurrencyValue, settings.maxConcurrentUploads);
    }
    return settings.maxConcurrentUploads;
}

@Injectable()
export class SizeClassifier {
    constructor(@Inject(UPLOAD_SETTINGS) private readonly settings: UploadSettings) { }

    classify(fileSize: number): ChunkPlan {
        return classify(fileSize, this.settings);
    }
}
