import { BadRequestException, Body, Controller, Delete, Get, ParseFilePipe, Post, Query, UploadedFile, UploadedFiles, UseInterceptors } from "@nestjs/common";
import { ApiBody, ApiConsumes, ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { FileInterceptor, FilesInterceptor } from "@nestjs/platform-express";
import { CommandBus, QueryBus } from "@nestjs/cqrs";
import { SpooledFilesInterceptor } from "../../../common/interceptors/spooled-files.interceptor";
import { UploadService } from "../services/upload.service";
import { UploadFileBodyDto, UploadFileDto, UploadFilesDto } from "../dto/upload-file-body.dto";
import { UploadResponseDto } from "../dto/upload-response.dto";
import { ChunkPlanQueryDto, ChunkPlanResponseDto } from "../dto/chunk-plan.dto";
import { AbortSessionQueryDto, AbortSessionResponseDto } from "../dto/abort-session.dto";
import { GetChunkPlanQuery } from "../queries/get-chunk-plan.query";
import { AbortUploadCommand } from "../commands/abort-upload.command";

@ApiTags('Upload')
@Controller('upload')
@UseInterceptors(SpooledFilesInterceptor)
export class UploadController {
    constructor(
        private readonly uploadService: UploadService,
        private readonly queryBus: QueryBus,
        private readonly commandBus: CommandBus,
    ) { }

    @ApiOperation({
        summary: 'Upload a file',
        description: 'Stores one file. Small files go in a single request, larger ones as a concurrent multipart upload, the largest strictly part by part.'
    })
    @ApiResponse({ status: 201, description: 'File stored', type: UploadResponseDto })
    @ApiResponse({ status: 400, description: 'Missing file, disallowed extension or size over the limit' })
    @ApiResponse({ status: 413, description: 'File is larger than the upload limit' })
    @ApiResponse({ status: 500, description: 'Every part was stored but the store did not commit the upload' })
    @ApiResponse({ status: 502, description: 'Transfer to the store failed; the upload may be retried' })
    @ApiConsumes('multipart/form-data')
    @ApiBody({ description: 'File with an optional owner tag', type: UploadFileDto })
    @Post()
    @UseInterceptors(FileInterceptor('file'))
    async uploadFile(
        @UploadedFile(new ParseFilePipe({ fileIsRequired: true })) file: Express.Multer.File,
        @Body() body: UploadFileBodyDto,
    ): Promise<UploadResponseDto> {
        return this.uploadService.uploadFile(file, body.ownerId);
    }

    @ApiOperation({
        summary: 'Upload several files',
        description: 'Stores files one after another. A file that fails is reported in its own entry without failing the others.'
    })
    @ApiResponse({ status: 201, description: 'One entry per file, in request order', type: [UploadResponseDto] })
    @ApiResponse({ status: 400, description: 'No files, or more than allowed per request' })
    @ApiResponse({ status: 413, description: 'A file is larger than the upload limit' })
    @ApiConsumes('multipart/form-data')
    @ApiBody({ description: 'Files with an optional owner tag', type: UploadFilesDto })
    @Post('multiple')
    @UseInterceptors(FilesInterceptor('files'))
    async uploadFiles(
        @UploadedFiles() files: Express.Multer.File[] | undefined,
        @Body() body: UploadFileBodyDto,
    ): Promise<UploadResponseDto[]> {
        if (!files || files.length === 0) {
            throw new BadRequestException('No files provided');
        }
        return this.uploadService.uploadFiles(files, body.ownerId);
    }

    @ApiOperation({ summary: 'Preview an upload plan', description: 'Returns the strategy, part layout and concurrency a file of the given size would be uploaded with.' })
    @ApiResponse({ status: 200, description: 'Plan computed', type: ChunkPlanResponseDto })
    @ApiResponse({ status: 400, description: 'Size is not a non-negative integer or exceeds the limit' })
    @Get('plan')
    async getChunkPlan(@Query() query: ChunkPlanQueryDto): Promise<ChunkPlanResponseDto> {
        return this.queryBus.execute<GetChunkPlanQuery, ChunkPlanResponseDto>(new GetChunkPlanQuery(query.fileSize));
    }

    @ApiOperation({ summary: 'Abort a multipart upload', description: 'Best-effort cleanup of a multipart session left open in the store.' })
    @ApiResponse({ status: 200, description: 'Abort attempted; success tells whether the store accepted it', type: AbortSessionResponseDto })
    @ApiResponse({ status: 400, description: 'Invalid key or missing UploadId' })
    @Delete('session')
    async abortSession(@Query() query: AbortSessionQueryDto): Promise<AbortSessionResponseDto> {
        return this.commandBus.execute<AbortUploadCommand, AbortSessionResponseDto>(
            new AbortUploadCommand({ key: query.key, uploadId: query.uploadId }),
        );
    }
}
