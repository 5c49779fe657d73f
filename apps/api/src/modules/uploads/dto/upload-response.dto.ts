import { ApiProperty } from '@nestjs/swagger';
import { UploadStrategy } from '@files';

export class UploadResponseDto {
    @ApiProperty({ description: 'Whether the file was stored', example: true })
    success!: boolean;

    @ApiProperty({ description: 'Human readable result', example: 'File uploaded successfully' })
    message!: string;

    @ApiProperty({ required: false, description: 'Object key in the bucket', example: 'users/user-42/0b6c3f5e-2f4e-4c1b-9a57-1c1f0a7b2d11_report.pdf' })
    fileKey?: string;

    @ApiProperty({ required: false, description: 'Public link to the object' })
    fileUrl?: string;

    @ApiProperty({ required: false, enum: UploadStrategy, example: UploadStrategy.CONCURRENT_MULTIPART })
    strategy?: UploadStrategy;

    @ApiProperty({ required: false, description: 'Number of parts sent', example: 6 })
    partCount?: number;

    @ApiProperty({ required: false, description: 'Transfer time in milliseconds', example: 1840 })
    durationMs?: number;
}
