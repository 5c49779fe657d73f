export const OBJECT_STORE_GATEWAY = Symbol('OBJECT_STORE_GATEWAY');

export interface CompletedPartRef {
    partNumber: number;
    etag: string;
}

/**
 * The five store primitives the upload core relies on. Implementations own retries
 * within a single call; to callers each call either succeeds once or fails once.
 */
export interface ObjectStoreGateway {
    createSession(key: string, contentType: string): Promise<string>;
    putPart(key: string, uploadId: string, partNumber: number, body: Buffer): Promise<string>;
    complete(key: string, uploadId: string, parts: CompletedPartRef[]): Promise<string>;
    /** Best effort: resolves false instead of rejecting. */
    abort(key: string, uploadId: string): Promise<boolean>;
    putWhole(key: string, body: Buffer, contentType: string): Promise<string>;
}
