import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
    PutObjectCommand,
    S3Client,
    CreateMultipartUploadCommand,
    UploadPartCommand,
    CompleteMultipartUploadCommand,
    AbortMultipartUploadCommand,
    S3ServiceException
} from "@aws-sdk/client-s3";
import { CompletedPartRef, ObjectStoreGateway } from "./object-store.gateway";
import { describeCause } from "./upload/upload.errors";

interface RetryConfig {
    maxRetries: number;
    baseDelay: number;
    maxDelay: number;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 3,
    baseDelay: 1000, // 1 second
    maxDelay: 5000   // 5 seconds
};

const RETRYABLE_ERRORS = [
    'RequestTimeout',
    'RequestTimeoutException',
    'PriorRequestNotComplete',
    'ConnectionError',
    'NetworkingError',
    'ThrottlingException',
    'TooManyRequestsException',
    'InternalError',
    'ServiceUnavailable',
    'SlowDown',
];

@Injectable()
export class S3ObjectStoreGateway implements ObjectStoreGateway {
    private readonly logger = new Logger(S3ObjectStoreGateway.name);
    private readonly s3Client: S3Client;
    private readonly bucketName: string;
    private readonly retryConfig: RetryConfig;

    constructor(private readonly configService: ConfigService) {
        this.s3Client = new S3Client({
            region: this.configService.get<string>('s3.region'),
            endpoint: this.configService.get<string>('s3.endpoint'),
            credentials: {
                accessKeyId: this.configService.getOrThrow<string>('s3.accessKeyId'),
                secretAccessKey: this.configService.getOrThrow<string>('s3.secretAccessKey'),
            },
            forcePathStyle: true,
            // retries are ours, see executeWithRetry
            maxAttempts: 1,
        });
        this.bucketName = this.configService.getOrThrow<string>('s3.bucketName');
        this.retryConfig = {
            maxRetries: this.configService.get<number>('s3.maxRetries') ?? DEFAULT_RETRY_CONFIG.maxRetries,
            baseDelay: this.configService.get<number>('s3.retryBaseDelayMs') ?? DEFAULT_RETRY_CONFIG.baseDelay,
            maxDelay: this.configService.get<number>('s3.retryMaxDelayMs') ?? DEFAULT_RETRY_CONFIG.maxDelay,
        };
    }

    /**
     * Determines if an S3 error is retryable: throttling, timeouts and 5xx responses.
     */
    private isRetryableError(error: unknown): boolean {
        if (!(error instanceof S3ServiceException)) {
            return false;
        }

        return RETRYABLE_ERRORS.includes(error.name) ||
            (error.$metadata?.httpStatusCode ?? 0) >= 500;
    }

    /**
     * Exponential backoff with ±25% jitter, capped at maxDelay.
     */
    private getBackoffDelay(retryCount: number): number {
        const delay = Math.min(
            this.retryConfig.maxDelay,
            this.retryConfig.baseDelay * Math.pow(2, retryCount)
        );
        return delay * (0.75 + Math.random() * 0.5);
    }

    /**
     * Executes an S3 operation with retries.
     * @throws The last error encountered if all retries fail
     */
    private async executeWithRetry<T>(operation: () => Promise<T>): Promise<T> {
        const { maxRetries } = this.retryConfig;

        for (let attempt = 0; ; attempt++) {
            try {
                return await operation();
            } catch (error) {
                if (!this.isRetryableError(error) || attempt >= maxRetries) {
                    throw error;
                }

                const delay = this.getBackoffDelay(attempt);
                this.logger.debug(`Retrying operation after ${Math.round(delay)}ms (attempt ${attempt + 1}/${maxRetries})`);
                await new Promise(resolve => setTimeout(resolve, delay));
            }
        }
    }

    /**
     * Uploads an object with a single PutObject command.
     * @returns The ETag of the stored object.
     */
    async putWhole(key: string, body: Buffer, contentType: string): Promise<string> {
        const command = new PutObjectCommand({
            Bucket: this.bucketName,
            Key: key,
            Body: body,
            ContentType: contentType,
        });

        try {
            const response = await this.executeWithRetry(() => this.s3Client.send(command));
            this.logger.debug(`Stored ${key} (${body.length} bytes) in one request`);
            return response.ETag ?? '';
        } catch (err) {
            this.logger.error(`Unable to upload ${key} to S3`, err instanceof Error ? err.stack : undefined);
            throw new Error(`Unable to upload file to S3: ${describeCause(err)}`, { cause: err });
        }
    }

    /**
     * Initiates a multipart upload.
     * @returns The UploadId for the multipart upload.
     */
    async createSession(key: string, contentType: string): Promise<string> {
        const command = new CreateMultipartUploadCommand({
            Bucket: this.bucketName,
            Key: key,
            ContentType: contentType,
        });

        try {
            const response = await this.executeWithRetry(() => this.s3Client.send(command));
            if (!response.UploadId) {
                throw new Error('S3 did not return an UploadId');
            }
            this.logger.debug(`Initiated multipart upload for ${key} with UploadId: ${response.UploadId}`);
            return response.UploadId;
        } catch (err) {
            this.logger.error(`Failed to initiate multipart upload for ${key}`, err instanceof Error ? err.stack : undefined);
            throw new Error(`Unable to initiate multipart upload: ${describeCause(err)}`, { cause: err });
        }
    }

    /**
     * Uploads one part of a multipart upload.
     * @param partNumber - The sequential number (1-based) of the part.
     * @returns The ETag of the uploaded part.
     */
    async putPart(key: string, uploadId: string, partNumber: number, body: Buffer): Promise<string> {
        const command = new UploadPartCommand({
            Bucket: this.bucketName,
            Key: key,
            UploadId: uploadId,
            PartNumber: partNumber,
            Body: body,
        });

        try {
            const response = await this.executeWithRetry(() => this.s3Client.send(command));
            if (!response.ETag) {
                throw new Error('S3 did not return an ETag for the uploaded part');
            }
            return response.ETag;
        } catch (err) {
            this.logger.error(`Failed to upload part ${partNumber} for ${key} (UploadId: ${uploadId})`, err instanceof Error ? err.stack : undefined);
            throw new Error(`Unable to upload part ${partNumber}: ${describeCause(err)}`, { cause: err });
        }
    }

    /**
     * Completes a multipart upload. Parts are sent in ascending part number order.
     * @returns The final ETag of the object, or its location when the store omits one.
     */
    async complete(key: string, uploadId: string, parts: CompletedPartRef[]): Promise<string> {
        const sortedParts = [...parts].sort((a, b) => a.partNumber - b.partNumber);

        const command = new CompleteMultipartUploadCommand({
            Bucket: this.bucketName,
            Key: key,
            UploadId: uploadId,
            MultipartUpload: {
                Parts: sortedParts.map((part) => ({ PartNumber: part.partNumber, ETag: part.etag })),
            },
        });

        try {
            const response = await this.executeWithRetry(() => this.s3Client.send(command));
            this.logger.debug(`Completed multipart upload for ${key} (UploadId: ${uploadId})`);
            return response.ETag ?? response.Location ?? '';
        } catch (err) {
            this.logger.error(`Failed to complete multipart upload for ${key} (UploadId: ${uploadId})`, err instanceof Error ? err.stack : undefined);
            throw new Error(`Unable to complete multipart upload: ${describeCause(err)}`, { cause: err });
        }
    }

    /**
     * Aborts a multipart upload. Failures are logged and reported as `false`.
     */
    async abort(key: string, uploadId: string): Promise<boolean> {
        const command = new AbortMultipartUploadCommand({
            Bucket: this.bucketName,
            Key: key,
            UploadId: uploadId,
        });

        try {
            await this.executeWithRetry(() => this.s3Client.send(command));
            this.logger.debug(`Aborted multipart upload for ${key} (UploadId: ${uploadId})`);
            return true;
        } catch (err) {
            this.logger.warn(`Failed to abort multipart upload for ${key} (UploadId: ${uploadId}): ${describeCause(err)}`);
            return false;
        }
    }
}
