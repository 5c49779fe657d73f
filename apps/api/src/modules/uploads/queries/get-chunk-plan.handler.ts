import { BadRequestException, Inject } from '@nestjs/common';
import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';
import { SizeClassifier, UPLOAD_SETTINGS, UploadSettings } from '@files';
import { GetChunkPlanQuery } from './get-chunk-plan.query';
import { ChunkPlanResponseDto } from '../dto/chunk-plan.dto';

@QueryHandler(GetChunkPlanQuery)
export class GetChunkPlanHandler implements IQueryHandler<GetChunkPlanQuery, ChunkPlanResponseDto> {
    constructor(
        private readonly sizeClassifier: SizeClassifier,
        @Inject(UPLOAD_SETTINGS) private readonly settings: UploadSettings,
    ) { }

    async execute(query: GetChunkPlanQuery): Promise<ChunkPlanResponseDto> {
        const { fileSize } = query;

        if (fileSize > this.settings.maxFileSize) {
            throw new BadRequestException(`File size ${fileSize} exceeds maximum allowed size ${this.settings.maxFileSize}`);
        }

        const plan = this.sizeClassifier.classify(fileSize);

        return {
            fileSize,
            strategy: plan.strategy,
            chunkSize: plan.chunkSize,
            totalParts: plan.totalParts,
            lastPartSize: plan.lastPartSize,
            concurrency: plan.concurrency,
        };
    }
}
