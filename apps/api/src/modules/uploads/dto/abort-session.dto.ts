import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class AbortSessionQueryDto {
    @ApiProperty({ type: 'string', description: 'Object key of the multipart upload', example: 'public/0b6c3f5e-2f4e-4c1b-9a57-1c1f0a7b2d11_video.mp4' })
    @IsString()
    @IsNotEmpty()
    key!: string;

    @ApiProperty({ type: 'string', description: 'UploadId issued by the store' })
    @IsString()
    @IsNotEmpty()
    uploadId!: string;
}

export class AbortSessionResponseDto {
    @ApiProperty({ description: 'Whether the store accepted the abort', example: true })
    success!: boolean;

    @ApiProperty({ example: 'Multipart upload aborted' })
    message!: string;
}
