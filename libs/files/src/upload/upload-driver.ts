import { Inject, Injectable, Logger } from '@nestjs/common';
import * as path from 'path';
import { OBJECT_STORE_GATEWAY, ObjectStoreGateway } from '../object-store.gateway';
import {
    PutObjectError,
    UploadCancelledError,
    UploadError,
    UploadFailedError,
    ValidationError,
} from './upload.errors';
import { ByteSource, ChunkPlan, UploadOptions, UploadOutcome, UploadSpec, UploadStrategy } from './upload.types';
import { UPLOAD_SETTINGS, UploadSettings } from './upload.settings';
import { SizeClassifier } from './size-classifier';
import { MultipartUploadOrchestrator } from './multipart-upload.orchestrator';
import { readWhole } from './part-reader';

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

// Control characters (0x00-0x1f, 0x7f) or backslashes
function hasUnsafeChars(str: string): boolean {
    for (let i = 0; i < str.length; i++) {
        const code = str.charCodeAt(i);
        if (code <= 0x1f || code === 0x7f || str[i] === '\\') {
            return true;
        }
    }
    return false;
}

/**
 * Normalizes an object key.
 * @throws ValidationError for empty, absolute or traversing keys and unsafe characters
 */
export function sanitizeObjectKey(key: string): string {
    if (!key) {
        throw new ValidationError('Object key is required');
    }
    if (hasUnsafeChars(key)) {
        throw new ValidationError('Invalid character in key: control characters and backslashes not allowed');
    }
    if (key.startsWith('/')) {
        throw new ValidationError('Absolute paths not allowed');
    }
    const normalized = path.posix.normalize(key);
    if (normalized.startsWith('..') || normalized === '.' || normalized === '') {
        throw new ValidationError('Directory traversal not allowed');
    }
    return normalized;
}

/**
 * Entry point of the upload core: validates, classifies, then stores the bytes with a
 * single request, a concurrent multipart session or a sequential one.
 */
@Injectable()
export class UploadDriver {
    private readonly logger = new Logger(UploadDriver.name);

    constructor(
        @Inject(UPLOAD_SETTINGS) private readonly settings: UploadSettings,
        @Inject(OBJECT_STORE_GATEWAY) private readonly gateway: ObjectStoreGateway,
        private readonly classifier: SizeClassifier,
        private readonly orchestrator: MultipartUploadOrchestrator,
    ) { }

    /**
     * @throws ValidationError before any store call when the key, size or extension is rejected
     * @throws UploadFailedError wrapping the failure of the transfer itself
     */
    async upload(spec: UploadSpec, source: ByteSource, options: UploadOptions = {}): Promise<UploadOutcome> {
        const validated = this.validate(spec);
        const plan = this.classifier.classify(validated.totalSize);
        const startedAt = performance.now();

        this.logger.log(
            `Uploading ${validated.key} (${validated.totalSize} bytes) as ${plan.strategy}: ${plan.totalParts} part(s) of ${plan.chunkSize} bytes, concurrency ${plan.concurrency}`,
        );

        let etag: string;
        try {
            etag = await this.transfer(validated, plan, source, options);
        } catch (error) {
            if (error instanceof UploadError) {
                this.logger.error(`Upload of ${validated.key} failed [${error.code}]: ${error.message}`);
                throw new UploadFailedError(error);
            }
            throw error;
        }

        const durationMs = performance.now() - startedAt;
        this.logger.log(`Uploaded ${validated.key} in ${durationMs.toFixed(0)}ms`);

        return {
            success: true,
            key: validated.key,
            url: this.objectUrl(validated.key),
            etag,
            strategy: plan.strategy,
            partCount: plan.totalParts,
            durationMs,
        };
    }

    private async transfer(spec: UploadSpec, plan: ChunkPlan, source: ByteSource, options: UploadOptions): Promise<string> {
        switch (plan.strategy) {
            case UploadStrategy.SINGLE_SHOT:
                return this.putWhole(spec, source, options);
            case UploadStrategy.CONCURRENT_MULTIPART: {
                const result = await this.orchestrator.run(spec, plan, source, {
                    concurrency: plan.concurrency,
                    failFast: false,
                    signal: options.signal,
                });
                return result.etag;
            }
            case UploadStrategy.STREAMING_MULTIPART: {
                const result = await this.orchestrator.run(spec, plan, source, {
                    concurrency: 1,
                    failFast: true,
                    signal: options.signal,
                });
                return result.etag;
            }
        }
    }

    private async putWhole(spec: UploadSpec, source: ByteSource, options: UploadOptions): Promise<string> {
        const body = await readWhole(source, spec.totalSize);
        if (options.signal?.aborted) {
            throw new UploadCancelledError(options.signal.reason);
        }
        try {
            return await this.gateway.putWhole(spec.key, body, spec.contentType);
        } catch (error) {
            throw new PutObjectError(spec.key, error);
        }
    }

    private validate(spec: UploadSpec): UploadSpec {
        const key = sanitizeObjectKey(spec.key);

        if (!Number.isSafeInteger(spec.totalSize) || spec.totalSize < 0) {
            throw new ValidationError(`File size must be a non-negative integer, got ${spec.totalSize}`);
        }
        if (spec.totalSize > this.settings.maxFileSize) {
            throw new ValidationError(
                `File size ${spec.totalSize} exceeds maximum allowed size ${this.settings.maxFileSize}`,
            );
        }

        const fileName = key.slice(key.lastIndexOf('/') + 1);
        const dot = fileName.lastIndexOf('.');
        if (dot !== -1) {
            const ext = fileName.slice(dot + 1).toLowerCase();
            if (!this.settings.allowedExtensions.includes(ext)) {
                throw new ValidationError(
                    `File extension '${ext}' is not allowed. Allowed extensions: ${this.settings.allowedExtensions.join(', ')}`,
                );
            }
        }

        return {
            key,
            totalSize: spec.totalSize,
            contentType: spec.contentType || DEFAULT_CONTENT_TYPE,
            ownerId: spec.ownerId,
        };
    }

    private objectUrl(key: string): string {
        return `${this.settings.publicUrl}/${key.split('/').map(encodeURIComponent).join('/')}`;
    }
}
