import { Readable } from 'stream';

export enum UploadStrategy {
    SINGLE_SHOT = 'SINGLE_SHOT',
    CONCURRENT_MULTIPART = 'CONCURRENT_MULTIPART',
    STREAMING_MULTIPART = 'STREAMING_MULTIPART',
}

export enum UploadState {
    IDLE = 'IDLE',
    SESSION_OPEN = 'SESSION_OPEN',
    PARTS_IN_FLIGHT = 'PARTS_IN_FLIGHT',
    COMMITTING = 'COMMITTING',
    COMMITTED = 'COMMITTED',
    ABORTING = 'ABORTING',
    ABORTED = 'ABORTED',
}

/**
 * What the caller wants stored. Built once per upload and never mutated.
 */
export interface UploadSpec {
    readonly key: string;
    readonly totalSize: number;
    readonly contentType: string;
    readonly ownerId?: string;
}

/**
 * How a file of a given size is split and sent.
 *
 * `chunkSize * (totalParts - 1) < totalSize <= chunkSize * totalParts` holds for every
 * multipart plan. Single-shot plans carry the whole body as their one part.
 */
export interface ChunkPlan {
    readonly strategy: UploadStrategy;
    readonly totalSize: number;
    readonly chunkSize: number;
    readonly totalParts: number;
    readonly lastPartSize: number;
    readonly concurrency: number;
}

/**
 * Store-issued context for one multipart upload. Owned by exactly one orchestrator run.
 */
export interface MultipartSession {
    readonly key: string;
    readonly uploadId: string;
    readonly plan: ChunkPlan;
    state: UploadState;
}

export interface PartResult {
    readonly partNumber: number;
    readonly etag: string;
    readonly size: number;
    readonly durationMs: number;
}

export interface UploadOutcome {
    readonly success: true;
    readonly key: string;
    readonly url: string;
    readonly etag: string;
    readonly strategy: UploadStrategy;
    readonly partCount: number;
    readonly durationMs: number;
}

/**
 * Anything the driver can read object bytes from.
 */
export type ByteSource = Buffer | Uint8Array | Readable | AsyncIterable<Uint8Array>;

export interface UploadOptions {
    signal?: AbortSignal;
}
