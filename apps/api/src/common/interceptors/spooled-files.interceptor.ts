import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Request } from 'express';
import { rm } from 'fs/promises';
import { Observable, catchError, concatMap, from, map, throwError } from 'rxjs';

/**
 * Deletes the files multer spooled to disk once the request is over, whether the
 * handler ran, failed, or was never reached because a pipe rejected the request.
 * Must be applied outside the multer interceptor.
 */
@Injectable()
export class SpooledFilesInterceptor implements NestInterceptor {
    private readonly logger = new Logger(SpooledFilesInterceptor.name);

    intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
        const request = context.switchToHttp().getRequest<Request>();

        return next.handle().pipe(
            concatMap((body: unknown) => from(this.removeSpooledFiles(request)).pipe(map(() => body))),
            catchError((error: unknown) => from(this.removeSpooledFiles(request)).pipe(
                concatMap(() => throwError(() => error)),
            )),
        );
    }

    private async removeSpooledFiles(request: Request): Promise<void> {
        const { file, files } = request;
        const received = Array.isArray(files) ? files : Object.values(files ?? {}).flat();
        const paths = (file ? [file, ...received] : received)
            .map((spooled) => spooled.path)
            .filter((filePath) => Boolean(filePath));

        await Promise.all(paths.map((filePath) => rm(filePath, { force: true }).catch((error: unknown) => {
            this.logger.warn(`Unable to remove temporary file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
        })));
    }
}
