import { ApiProperty } from '@nestjs/swagger';
import { IsInt, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { UploadStrategy } from '@files';

export class ChunkPlanQueryDto {
    @ApiProperty({ type: 'number', description: 'File size in bytes', example: 629145600 })
    @Type(() => Number)
    @IsInt()
    @Min(0)
    fileSize!: number;
}

export class ChunkPlanResponseDto {
    @ApiProperty({ description: 'File size in bytes', example: 629145600 })
    fileSize!: number;

    @ApiProperty({ enum: UploadStrategy, example: UploadStrategy.CONCURRENT_MULTIPART })
    strategy!: UploadStrategy;

    @ApiProperty({ description: 'Bytes per part', example: 104857600 })
    chunkSize!: number;

    @ApiProperty({ description: 'Number of parts', example: 6 })
    totalParts!: number;

    @ApiProperty({ description: 'Bytes in the final part', example: 104857600 })
    lastPartSize!: number;

    @ApiProperty({ description: 'Parts sent at once', example: 6 })
    concurrency!: number;
}
