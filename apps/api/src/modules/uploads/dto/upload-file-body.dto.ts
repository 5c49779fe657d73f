import { ApiProperty } from '@nestjs/swagger';
import { IsOptional, IsString, Matches, MaxLength } from 'class-validator';

export class UploadFileBodyDto {
    @ApiProperty({ type: 'string', required: false, description: 'Owner tag; groups the object under users/<ownerId>/', example: 'user-42' })
    @IsOptional()
    @IsString()
    @MaxLength(64)
    @Matches(/^[\w-]+$/, {
        message: 'ownerId may only contain letters, digits, underscores and hyphens'
    })
    ownerId?: string;
}

export class UploadFileDto extends UploadFileBodyDto {
    @ApiProperty({ type: 'string', format: 'binary', description: 'File to store' })
    file!: Express.Multer.File;
}

export class UploadFilesDto extends UploadFileBodyDto {
    @ApiProperty({ type: 'array', items: { type: 'string', format: 'binary' }, description: 'Files to store' })
    files!: Express.Multer.File[];
}
