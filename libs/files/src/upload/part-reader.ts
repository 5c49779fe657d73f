import { SizeMismatchError, SourceReadError } from './upload.errors';
import { ByteSource, ChunkPlan } from './upload.types';

export interface SourcePart {
    partNumber: number;
    body: Buffer;
}

/**
 * Cuts a byte source into the plan's parts, holding at most one part plus one source
 * chunk in memory. The byte count must match `plan.totalSize` exactly.
 * @throws SizeMismatchError when the source is shorter or longer than declared
 * @throws SourceReadError when the source itself fails
 */
export async function* readParts(source: ByteSource, plan: ChunkPlan): AsyncGenerator<SourcePart> {
    let partNumber = 1;
    let pending: Buffer[] = [];
    let pendingBytes = 0;
    let totalRead = 0;

    for await (const chunk of sourceChunks(source, plan.chunkSize)) {
        totalRead += chunk.length;
        if (totalRead > plan.totalSize) {
            throw new SizeMismatchError(plan.totalSize, totalRead);
        }
        pending.push(chunk);
        pendingBytes += chunk.length;

        while (pendingBytes >= plan.chunkSize) {
            const joined = pending.length === 1 ? pending[0] : Buffer.concat(pending, pendingBytes);
            const rest = joined.subarray(plan.chunkSize);
            pending = rest.length > 0 ? [rest] : [];
            pendingBytes = rest.length;
            yield { partNumber: partNumber++, body: joined.subarray(0, plan.chunkSize) };
        }
    }

    if (totalRead !== plan.totalSize) {
        throw new SizeMismatchError(plan.totalSize, totalRead);
    }
    if (pendingBytes > 0) {
        yield { partNumber, body: pending.length === 1 ? pending[0] : Buffer.concat(pending, pendingBytes) };
    }
}

/**
 * Reads a whole source into one buffer, checking it against the declared size.
 */
export async function readWhole(source: ByteSource, declaredSize: number): Promise<Buffer> {
    const chunks: Buffer[] = [];
    let totalRead = 0;
    for await (const chunk of sourceChunks(source, Math.max(declaredSize, 1))) {
        totalRead += chunk.length;
        if (totalRead > declaredSize) {
            throw new SizeMismatchError(declaredSize, totalRead);
        }
        chunks.push(chunk);
    }
    if (totalRead !== declaredSize) {
        throw new SizeMismatchError(declaredSize, totalRead);
    }
    return chunks.length === 1 ? chunks[0] : Buffer.concat(chunks, totalRead);
}

async function* sourceChunks(source: ByteSource, sliceSize: number): AsyncGenerator<Buffer> {
    if (source instanceof Uint8Array) {
        const buffer = Buffer.isBuffer(source) ? source : Buffer.from(source.buffer, source.byteOffset, source.byteLength);
        for (let offset = 0; offset < buffer.length; offset += sliceSize) {
            yield buffer.subarray(offset, offset + sliceSize);
        }
        return;
    }

    try {
        for await (const chunk of source) {
            yield toBuffer(chunk);
        }
    } catch (error) {
        throw error instanceof SourceReadError ? error : new SourceReadError(error);
    }
}

function toBuffer(chunk: unknown): Buffer {
    if (Buffer.isBuffer(chunk)) {
        return chunk;
    }
    if (chunk instanceof Uint8Array) {
        return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
    }
    if (typeof chunk === 'string') {
        return Buffer.from(chunk);
    }
    throw new SourceReadError(new TypeError(`Unsupported chunk type ${typeof chunk}`));
}
