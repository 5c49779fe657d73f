import { Inject, Injectable, Logger } from '@nestjs/common';
import { CompletedPartRef, OBJECT_STORE_GATEWAY, ObjectStoreGateway } from '../object-store.gateway';
import {
    CommitError,
    PartUploadError,
    SessionError,
    SourceReadError,
    UploadCancelledError,
    UploadError,
    UploadPartError,
} from './upload.errors';
import { ByteSource, ChunkPlan, MultipartSession, PartResult, UploadSpec, UploadState } from './upload.types';
import { PartUploader } from './part-uploader';
import { readParts, SourcePart } from './part-reader';

export interface MultipartRunOptions {
    /** Parts of this upload allowed in flight at once. 1 means strictly sequential. */
    concurrency: number;
    /** Stop reading further parts after the first failure. */
    failFast: boolean;
    signal?: AbortSignal;
}

export interface MultipartRunResult {
    uploadId: string;
    etag: string;
    parts: PartResult[];
}

interface PartsOutcome {
    results: PartResult[];
    failure?: UploadError;
}

/**
 * Sorts part results into the manifest the store commits, requiring exactly parts
 * 1..totalParts.
 */
export function buildCommitManifest(results: PartResult[], totalParts: number): CompletedPartRef[] {
    const sorted = [...results].sort((a, b) => a.partNumber - b.partNumber);
    sorted.forEach((result, index) => {
        if (result.partNumber !== index + 1) {
            throw new Error(`Commit manifest expected part ${index + 1} but found part ${result.partNumber}`);
        }
    });
    if (sorted.length !== totalParts) {
        throw new Error(`Commit manifest holds ${sorted.length} of ${totalParts} parts`);
    }
    return sorted.map(({ partNumber, etag }) => ({ partNumber, etag }));
}

/**
 * Drives one multipart session from create to complete or abort.
 *
 * Concurrent and streaming uploads share this state machine; they differ only in
 * `concurrency` and `failFast`. A new part is read from the source only once a slot
 * is free, so no more than `concurrency` parts are held in memory. Every submitted
 * part is joined before the commit/abort decision, and a failed run aborts the
 * session exactly once.
 */
@Injectable()
export class MultipartUploadOrchestrator {
    private readonly logger = new Logger(MultipartUploadOrchestrator.name);

    constructor(
        @Inject(OBJECT_STORE_GATEWAY) private readonly gateway: ObjectStoreGateway,
        private readonly partUploader: PartUploader,
    ) { }

    async run(spec: UploadSpec, plan: ChunkPlan, source: ByteSource, options: MultipartRunOptions): Promise<MultipartRunResult> {
        if (options.signal?.aborted) {
            throw new UploadCancelledError(options.signal.reason);
        }

        let uploadId: string;
        try {
            uploadId = await this.gateway.createSession(spec.key, spec.contentType);
        } catch (error) {
            throw new SessionError(spec.key, error);
        }

        const session: MultipartSession = { key: spec.key, uploadId, plan, state: UploadState.IDLE };
        this.transition(session, UploadState.SESSION_OPEN);

        const { results, failure } = await this.uploadParts(session, source, options);
        if (failure) {
            await this.abortSession(session, failure);
            throw failure;
        }

        let manifest: CompletedPartRef[];
        try {
            manifest = buildCommitManifest(results, plan.totalParts);
        } catch (error) {
            await this.abortSession(session, error);
            throw error;
        }

        this.transition(session, UploadState.COMMITTING);
        let etag: string;
        try {
            etag = await this.gateway.complete(session.key, session.uploadId, manifest);
        } catch (error) {
            this.logger.error(`Commit of ${session.key} (UploadId: ${session.uploadId}) failed; session left for the store to reap`);
            throw new CommitError(session.key, session.uploadId, error);
        }
        this.transition(session, UploadState.COMMITTED);

        return {
            uploadId,
            etag,
            parts: [...results].sort((a, b) => a.partNumber - b.partNumber),
        };
    }

    private async uploadParts(session: MultipartSession, source: ByteSource, options: MultipartRunOptions): Promise<PartsOutcome> {
        const { concurrency, failFast, signal } = options;
        const results: PartResult[] = [];
        const failures: UploadPartError[] = [];
        const inFlight = new Set<Promise<void>>();
        let readFailure: UploadError | undefined;

        this.transition(session, UploadState.PARTS_IN_FLIGHT);
        const parts = readParts(source, session.plan);
        try {
            while (true) {
                while (inFlight.size >= concurrency) {
                    await Promise.race(inFlight);
                }
                if (signal?.aborted || (failFast && failures.length > 0)) {
                    break;
                }

                let next: IteratorResult<SourcePart>;
                try {
                    next = await parts.next();
                } catch (error) {
                    readFailure = error instanceof UploadError ? error : new SourceReadError(error);
                    break;
                }
                if (next.done) {
                    break;
                }

                const { partNumber, body } = next.value;
                const task: Promise<void> = this.partUploader.upload(session, partNumber, body)
                    .then(
                        (result) => {
                            results.push(result);
                        },
                        (error: unknown) => {
                            failures.push(error instanceof UploadPartError ? error : new UploadPartError(partNumber, error));
                        },
                    )
                    .finally(() => {
                        inFlight.delete(task);
                    });
                inFlight.add(task);
            }

            await Promise.all(inFlight);
        } finally {
            await parts.return(undefined);
        }

        if (signal?.aborted) {
            return {
                results,
                failure: new UploadCancelledError(signal.reason, failures.map((failure) => failure.partNumber)),
            };
        }
        if (failures.length > 0) {
            return { results, failure: new PartUploadError(failures) };
        }
        if (readFailure) {
            return { results, failure: readFailure };
        }
        return { results };
    }

    private async abortSession(session: MultipartSession, reason: unknown): Promise<void> {
        this.transition(session, UploadState.ABORTING);
        this.logger.error(
            `Aborting multipart upload for ${session.key} (UploadId: ${session.uploadId}): ${reason instanceof Error ? reason.message : String(reason)}`,
        );

        const aborted = await this.gateway.abort(session.key, session.uploadId).catch((error: unknown) => {
            this.logger.warn(`Abort of ${session.key} threw: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        });
        if (!aborted) {
            this.logger.warn(`Multipart upload ${session.uploadId} for ${session.key} may be left open`);
        }
        this.transition(session, UploadState.ABORTED);
    }

    private transition(session: MultipartSession, state: UploadState): void {
        this.logger.debug(`${session.key} (UploadId: ${session.uploadId}): ${session.state} -> ${state}`);
        session.state = state;
    }
}
