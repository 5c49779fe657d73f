import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { OBJECT_STORE_GATEWAY } from './object-store.gateway';
import { S3ObjectStoreGateway } from './s3-object-store.gateway';
import { UPLOAD_SETTINGS, UploadSettingsOverrides, resolveUploadSettings } from './upload/upload.settings';
import { SizeClassifier } from './upload/size-classifier';
import { UploadWorkerPool } from './upload/upload-worker-pool';
import { PartUploader } from './upload/part-uploader';
import { MultipartUploadOrchestrator } from './upload/multipart-upload.orchestrator';
import { UploadDriver } from './upload/upload-driver';

@Module({
    imports: [ConfigModule],
    providers: [
        {
            provide: UPLOAD_SETTINGS,
            useFactory: (configService: ConfigService) => resolveUploadSettings({
                ...configService.get<UploadSettingsOverrides>('upload'),
                publicUrl: configService.get<string>('s3.publicUrl'),
            }),
            inject: [ConfigService],
        },
        {
            provide: OBJECT_STORE_GATEWAY,
            useClass: S3ObjectStoreGateway,
        },
        SizeClassifier,
        UploadWorkerPool,
        PartUploader,
        MultipartUploadOrchestrator,
        UploadDriver,
    ],
    exports: [UPLOAD_SETTINGS, OBJECT_STORE_GATEWAY, SizeClassifier, UploadDriver],
})
export class FilesModule { }
