import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';
import { CommandBus, QueryBus } from '@nestjs/cqrs';
import { Readable } from 'stream';
import { UploadStrategy } from '@files';
import { UploadController } from './upload.controller';
import { UploadService } from '../services/upload.service';
import { GetChunkPlanQuery } from '../queries/get-chunk-plan.query';
import { AbortUploadCommand } from '../commands/abort-upload.command';

function multerFile(originalname: string, content: string): Express.Multer.File {
    const buffer = Buffer.from(content);
    return {
        fieldname: 'file',
        originalname,
        encoding: '7bit',
        mimetype: 'text/plain',
        size: buffer.length,
        stream: Readable.from([buffer]),
        destination: '',
        filename: '',
        path: '',
        buffer,
    };
}

describe('UploadController', () => {
    let controller: UploadController;

    const mockUploadService = {
        uploadFile: jest.fn(),
        uploadFiles: jest.fn(),
    };

    const mockQueryBus = {
        execute: jest.fn(),
    };

    const mockCommandBus = {
        execute: jest.fn(),
    };

    beforeEach(async () => {
        const module: TestingModule = await Test.createTestingModule({
            controllers: [UploadController],
            providers: [
                {
                    provide: UploadService,
                    useValue: mockUploadService,
                },
                {
                    provide: QueryBus,
                    useValue: mockQueryBus,
                },
                {
                    provide: CommandBus,
                    useValue: mockCommandBus,
                },
            ],
        }).compile();

        controller = module.get<UploadController>(UploadController);

        jest.clearAllMocks();
    });

    it('should be defined', () => {
        expect(controller).toBeDefined();
    });

    describe('uploadFile', () => {
        it('should pass the file and owner to the service', async () => {
            const file = multerFile('notes.txt', 'hello');
            const response = {
                success: true,
                message: 'File uploaded successfully',
                fileKey: 'users/user-42/id_notes.txt',
                strategy: UploadStrategy.SINGLE_SHOT,
            };
            mockUploadService.uploadFile.mockResolvedValue(response);

            const result = await controller.uploadFile(file, { ownerId: 'user-42' });

            expect(result).toEqual(response);
            expect(mockUploadService.uploadFile).toHaveBeenCalledWith(file, 'user-42');
        });
    });

    describe('uploadFiles', () => {
        it('should pass every file to the service', async () => {
            const files = [multerFile('a.txt', 'a'), multerFile('b.txt', 'b')];
            mockUploadService.uploadFiles.mockResolvedValue([{ success: true }, { success: false }]);

            const result = await controller.uploadFiles(files, {});

            expect(result).toEqual([{ success: true }, { success: false }]);
            expect(mockUploadService.uploadFiles).toHaveBeenCalledWith(files, undefined);
        });

        it('should reject a request without files', async () => {
            await expect(controller.uploadFiles(undefined, {})).rejects.toThrow(BadRequestException);
            await expect(controller.uploadFiles([], {})).rejects.toThrow('No files provided');
            expect(mockUploadService.uploadFiles).not.toHaveBeenCalled();
        });
    });

    describe('getChunkPlan', () => {
        it('should query the plan for the given size', async () => {
            const plan = {
                fileSize: 629145600,
                strategy: UploadStrategy.CONCURRENT_MULTIPART,
                chunkSize: 104857600,
                totalParts: 6,
                lastPartSize: 104857600,
                concurrency: 6,
            };
            mockQueryBus.execute.mockResolvedValue(plan);

            const result = await controller.getChunkPlan({ fileSize: 629145600 });

            expect(result).toEqual(plan);
            expect(mockQueryBus.execute).toHaveBeenCalledWith(new GetChunkPlanQuery(629145600));
        });
    });

    describe('abortSession', () => {
        it('should send an abort command', async () => {
            mockCommandBus.execute.mockResolvedValue({ success: true, message: 'Multipart upload aborted' });

            const result = await controller.abortSession({ key: 'public/id_video.mp4', uploadId: 'upload-1' });

            expect(result).toEqual({ success: true, message: 'Multipart upload aborted' });
            expect(mockCommandBus.execute).toHaveBeenCalledWith(
                new AbortUploadCommand({ key: 'public/id_video.mp4', uploadId: 'upload-1' }),
            );
        });
    });
});
