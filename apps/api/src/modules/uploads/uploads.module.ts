import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { CqrsModule } from "@nestjs/cqrs";
import { MulterModule, MulterModuleOptions } from "@nestjs/platform-express";
import { tmpdir } from "os";
import { FilesModule, UPLOAD_SETTINGS, UploadSettings } from "@files";
import { UploadController } from "./controllers/upload.controller";
import { UploadService } from "./services/upload.service";
import { GetChunkPlanHandler } from "./queries/get-chunk-plan.handler";
import { AbortUploadHandler } from "./commands/abort-upload.handler";

@Module({
    imports: [
        FilesModule,
        CqrsModule,
        MulterModule.registerAsync({
            imports: [FilesModule],
            useFactory: (configService: ConfigService, settings: UploadSettings): MulterModuleOptions => ({
                dest: configService.get<string>('upload.spoolDir') ?? tmpdir(),
                limits: {
                    fileSize: settings.maxFileSize,
                    files: settings.maxFilesPerRequest,
                },
            }),
            inject: [ConfigService, UPLOAD_SETTINGS],
        }),
    ],
    controllers: [
        UploadController],
    providers: [
        GetChunkPlanHandler,
        AbortUploadHandler,
        UploadService,
    ],
})
export class UploadsModule { }
