import {
    BadGatewayException,
    BadRequestException,
    HttpException,
    Inject,
    Injectable,
    InternalServerErrorException,
    Logger,
} from '@nestjs/common';
import { createReadStream } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
    CommitError,
    PartUploadError,
    UPLOAD_SETTINGS,
    UploadCancelledError,
    UploadDriver,
    UploadFailedError,
    UploadSettings,
    ValidationError,
} from '@files';
import { UploadResponseDto } from '../dto/upload-response.dto';

/**
 * Opens the spooled file on the first read, so a rejected upload never touches it.
 */
async function* readSpooledFile(filePath: string): AsyncGenerator<Buffer> {
    for await (const chunk of createReadStream(filePath)) {
        yield chunk;
    }
}

@Injectable()
export class UploadService {
    private readonly logger = new Logger(UploadService.name);

    constructor(
        private readonly uploadDriver: UploadDriver,
        @Inject(UPLOAD_SETTINGS) private readonly settings: UploadSettings,
    ) { }

    /**
     * Stores one received file, read from its spooled copy when multer wrote one to disk.
     * @throws BadRequestException when the file is rejected before any transfer
     * @throws BadGatewayException when the transfer failed and may be retried
     * @throws InternalServerErrorException when the store could not commit the upload
     */
    async uploadFile(file: Express.Multer.File, ownerId?: string): Promise<UploadResponseDto> {
        const key = this.generateObjectKey(file.originalname, ownerId);

        try {
            const outcome = await this.uploadDriver.upload(
                { key, totalSize: file.size, contentType: file.mimetype, ownerId },
                file.path ? readSpooledFile(file.path) : file.buffer,
                { signal: AbortSignal.timeout(this.settings.uploadTimeoutMs) },
            );

            return {
                success: true,
                message: 'File uploaded successfully',
                fileKey: outcome.key,
                fileUrl: outcome.url,
                strategy: outcome.strategy,
                partCount: outcome.partCount,
                durationMs: Math.round(outcome.durationMs),
            };
        } catch (error) {
            throw this.toHttpException(error, file.originalname);
        }
    }

    /**
     * Stores files one after another. A failed file is reported in its own entry.
     */
    async uploadFiles(files: Express.Multer.File[], ownerId?: string): Promise<UploadResponseDto[]> {
        if (files.length === 0) {
            throw new BadRequestException('No files provided');
        }
        if (files.length > this.settings.maxFilesPerRequest) {
            throw new BadRequestException(`Maximum ${this.settings.maxFilesPerRequest} files allowed per upload`);
        }

        const results: UploadResponseDto[] = [];
        for (const file of files) {
            try {
                results.push(await this.uploadFile(file, ownerId));
            } catch (error) {
                results.push({
                    success: false,
                    message: `Failed to upload ${file.originalname}: ${error instanceof Error ? error.message : String(error)}`,
                });
            }
        }
        return results;
    }

    generateObjectKey(originalName: string, ownerId?: string): string {
        const fileName = `${uuidv4()}_${path.basename(originalName).replace(/ /g, '_')}`;
        return ownerId ? `users/${ownerId}/${fileName}` : `public/${fileName}`;
    }

    private toHttpException(error: unknown, fileName: string): HttpException {
        if (error instanceof ValidationError) {
            this.logger.warn(`Rejected ${fileName}: ${error.message}`);
            return new BadRequestException({ message: error.message, code: error.code });
        }

        if (error instanceof UploadFailedError) {
            const { cause } = error;
            const body = {
                message: error.message,
                code: cause.code,
                ...(cause instanceof PartUploadError || (cause instanceof UploadCancelledError && cause.failedParts.length > 0)
                    ? { failedParts: cause.failedParts }
                    : {}),
            };
            return cause instanceof CommitError
                ? new InternalServerErrorException(body)
                : new BadGatewayException(body);
        }

        this.logger.error(`Unexpected error uploading ${fileName}`, error instanceof Error ? error.stack : String(error));
        return new InternalServerErrorException('Failed to upload file');
    }
}
