import { BadRequestException, Inject, Logger } from '@nestjs/common';
import { CommandHandler, ICommandHandler } from '@nestjs/cqrs';
import { OBJECT_STORE_GATEWAY, ObjectStoreGateway, ValidationError, sanitizeObjectKey } from '@files';
import { AbortUploadCommand } from './abort-upload.command';
import { AbortSessionResponseDto } from '../dto/abort-session.dto';

/**
 * Best-effort cleanup of a multipart session a client left behind.
 */
@CommandHandler(AbortUploadCommand)
export class AbortUploadHandler implements ICommandHandler<AbortUploadCommand, AbortSessionResponseDto> {
    private readonly logger = new Logger(AbortUploadHandler.name);

    constructor(
        @Inject(OBJECT_STORE_GATEWAY) private readonly gateway: ObjectStoreGateway,
    ) { }

    async execute(command: AbortUploadCommand): Promise<AbortSessionResponseDto> {
        const { uploadId } = command.payload;

        let key: string;
        try {
            key = sanitizeObjectKey(command.payload.key);
        } catch (error) {
            if (error instanceof ValidationError) {
                throw new BadRequestException({ message: error.message, code: error.code });
            }
            throw error;
        }

        const aborted = await this.gateway.abort(key, uploadId);
        this.logger.log(`Abort of ${key} (UploadId: ${uploadId}) ${aborted ? 'succeeded' : 'failed'}`);

        return aborted
            ? { success: true, message: 'Multipart upload aborted' }
            : { success: false, message: 'Unable to abort multipart upload' };
    }
}
