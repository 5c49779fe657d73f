export type UploadErrorCode =
    | 'VALIDATION_FAILED'
    | 'SESSION_CREATE_FAILED'
    | 'PART_FAILED'
    | 'PARTS_FAILED'
    | 'COMMIT_FAILED'
    | 'PUT_OBJECT_FAILED'
    | 'SIZE_MISMATCH'
    | 'SOURCE_READ_FAILED'
    | 'UPLOAD_CANCELLED'
    | 'UPLOAD_FAILED';

export abstract class UploadError extends Error {
    abstract readonly code: UploadErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Rejected before any call to the store. The caller has to fix the input.
 */
export class ValidationError extends UploadError {
    readonly code = 'VALIDATION_FAILED';
}

export class SessionError extends UploadError {
    readonly code = 'SESSION_CREATE_FAILED';

    constructor(public readonly key: string, cause: unknown) {
        super(`Unable to open multipart session for ${key}: ${describeCause(cause)}`, { cause });
    }
}

/**
 * One part could not be stored.
 */
export class UploadPartError extends UploadError {
    readonly code = 'PART_FAILED';

    constructor(public readonly partNumber: number, cause: unknown) {
        super(`Part ${partNumber} failed: ${describeCause(cause)}`, { cause });
    }
}

/**
 * Aggregate of every part that failed in one multipart run.
 */
export class PartUploadError extends UploadError {
    readonly code = 'PARTS_FAILED';
    readonly failedParts: number[];

    constructor(public readonly failures: UploadPartError[]) {
        const failedParts = failures.map((failure) => failure.partNumber).sort((a, b) => a - b);
        super(`Failed to upload ${failedParts.length} part(s): ${failedParts.join(', ')}`);
        this.failedParts = failedParts;
    }
}

/**
 * Every part is stored but the store rejected completion. The session is left as is.
 */
export class CommitError extends UploadError {
    readonly code = 'COMMIT_FAILED';

    constructor(public readonly key: string, public readonly uploadId: string, cause: unknown) {
        super(`Unable to complete multipart upload ${uploadId} for ${key}: ${describeCause(cause)}`, { cause });
    }
}

export class PutObjectError extends UploadError {
    readonly code = 'PUT_OBJECT_FAILED';

    constructor(public readonly key: string, cause: unknown) {
        super(`Unable to store ${key}: ${describeCause(cause)}`, { cause });
    }
}

export class SizeMismatchError extends UploadError {
    readonly code = 'SIZE_MISMATCH';

    constructor(public readonly expected: number, public readonly actual: number) {
        super(actual > expected
            ? `Source holds more than the declared ${expected} bytes`
            : `Source ended after ${actual} of the declared ${expected} bytes`);
    }
}

export class SourceReadError extends UploadError {
    readonly code = 'SOURCE_READ_FAILED';

    constructor(cause: unknown) {
        super(`Unable to read upload source: ${describeCause(cause)}`, { cause });
    }
}

/**
 * The caller's signal fired. Parts that had already failed in the same run are kept in `failedParts`.
 */
export class UploadCancelledError extends UploadError {
    readonly code = 'UPLOAD_CANCELLED';
    readonly failedParts: number[];

    constructor(cause?: unknown, failedParts: number[] = []) {
        const sorted = [...failedParts].sort((a, b) => a - b);
        super(sorted.length > 0 ? `Upload cancelled after part(s) ${sorted.join(', ')} failed` : 'Upload cancelled', { cause });
        this.failedParts = sorted;
    }
}

/**
 * Terminal failure of an upload attempt after validation passed.
 */
export class UploadFailedError extends UploadError {
    readonly code = 'UPLOAD_FAILED';

    constructor(public readonly cause: UploadError) {
        super(`Upload failed: ${cause.message}`, { cause });
    }
}

export function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}
