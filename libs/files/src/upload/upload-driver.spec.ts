import { Test, TestingModule } from '@nestjs/testing';
import { Readable } from 'stream';
import { UploadDriver, sanitizeObjectKey } from './upload-driver';
import { SizeClassifier } from './size-classifier';
import { UploadWorkerPool } from './upload-worker-pool';
import { PartUploader } from './part-uploader';
import { MultipartUploadOrchestrator } from './multipart-upload.orchestrator';
import { UPLOAD_SETTINGS, resolveUploadSettings } from './upload.settings';
import { UploadFailedError, ValidationError } from './upload.errors';
import { UploadStrategy } from './upload.types';
import { OBJECT_STORE_GATEWAY } from '../object-store.gateway';
import { InMemoryGatewayOptions, InMemoryObjectStoreGateway } from '../../test/in-memory-object-store.gateway';

const settings = resolveUploadSettings({
    multipartThreshold: 10,
    streamingThreshold: 40,
    chunkBands: {
        small: { maxFileSize: 20, chunkSize: 4 },
        medium: { maxFileSize: 30, chunkSize: 6 },
        large: { chunkSize: 8 },
    },
    maxFileSize: 100,
    publicUrl: 'http://store.test/bucket/',
});

function bytes(size: number): Buffer {
    return Buffer.from(Array.from({ length: size }, (_, i) => 97 + (i % 26)));
}

describe('UploadDriver', () => {
    let driver: UploadDriver;
    let gateway: InMemoryObjectStoreGateway;

    async function setup(options: InMemoryGatewayOptions = {}): Promise<void> {
        gateway = new InMemoryObjectStoreGateway(options);

        const module: TestingModule = await Test.createTestingModule({
            providers: [
                UploadDriver,
                SizeClassifier,
                UploadWorkerPool,
                PartUploader,
                MultipartUploadOrchestrator,
                { provide: UPLOAD_SETTINGS, useValue: settings },
                { provide: OBJECT_STORE_GATEWAY, useValue: gateway },
            ],
        }).compile();

        driver = module.get<UploadDriver>(UploadDriver);
    }

    beforeEach(async () => {
        await setup();
    });

    it('should be defined', () => {
        expect(driver).toBeDefined();
    });

    it('should store a small file with a single request', async () => {
        const outcome = await driver.upload(
            { key: 'docs/a.txt', totalSize: 5, contentType: 'text/plain' },
            Buffer.from('hello'),
        );

        expect(outcome).toMatchObject({
            success: true,
            key: 'docs/a.txt',
            url: 'http://store.test/bucket/docs/a.txt',
            etag: 'etag-whole',
            strategy: UploadStrategy.SINGLE_SHOT,
            partCount: 1,
        });
        expect(gateway.calls).toEqual(['putWhole:docs/a.txt']);
        expect(gateway.objects.get('docs/a.txt')).toEqual({ body: Buffer.from('hello'), contentType: 'text/plain' });
    });

    it('should store an empty file with a single request', async () => {
        const outcome = await driver.upload({ key: 'empty.txt', totalSize: 0, contentType: 'text/plain' }, Buffer.alloc(0));

        expect(outcome.strategy).toBe(UploadStrategy.SINGLE_SHOT);
        expect(gateway.objects.get('empty.txt')?.body.length).toBe(0);
    });

    it('should upload a mid-sized file as concurrent multipart', async () => {
        const outcome = await driver.upload(
            { key: 'docs/b.pdf', totalSize: 12, contentType: 'application/pdf' },
            Readable.from([bytes(12)]),
        );

        expect(outcome.strategy).toBe(UploadStrategy.CONCURRENT_MULTIPART);
        expect(outcome.partCount).toBe(3);
        expect(outcome.etag).toBe('etag-final-3');
        expect(gateway.objects.get('docs/b.pdf')?.body).toEqual(bytes(12));
        expect(gateway.callsOf('putWhole')).toBe(0);
    });

    it('should stream a large file one part at a time', async () => {
        const outcome = await driver.upload(
            { key: 'videos/c.mp4', totalSize: 50, contentType: 'video/mp4' },
            Readable.from([bytes(20), bytes(30)]),
        );

        expect(outcome.strategy).toBe(UploadStrategy.STREAMING_MULTIPART);
        expect(outcome.partCount).toBe(7);
        expect(gateway.partStarts).toEqual([1, 2, 3, 4, 5, 6, 7]);
        expect(gateway.maxActiveParts).toBe(1);
        expect(gateway.objects.get('videos/c.mp4')?.body).toEqual(Buffer.concat([bytes(20), bytes(30)]));
    });

    it('should default the content type', async () => {
        await driver.upload({ key: 'blob', totalSize: 3, contentType: '' }, Buffer.from('abc'));

        expect(gateway.objects.get('blob')?.contentType).toBe('application/octet-stream');
    });

    it('should normalize the key and encode it in the url', async () => {
        const outcome = await driver.upload(
            { key: 'my docs//a b.txt', totalSize: 3, contentType: 'text/plain' },
            Buffer.from('abc'),
        );

        expect(outcome.key).toBe('my docs/a b.txt');
        expect(outcome.url).toBe('http://store.test/bucket/my%20docs/a%20b.txt');
    });

    describe('validation', () => {
        it('should reject a disallowed extension before touching the store', async () => {
            const result = driver.upload({ key: 'tools/setup.exe', totalSize: 3, contentType: '' }, Buffer.from('abc'));

            await expect(result).rejects.toBeInstanceOf(ValidationError);
            await expect(result).rejects.toThrow(/^File extension 'exe' is not allowed/);
            expect(gateway.calls).toEqual([]);
        });

        it('should reject a file over the size limit', async () => {
            await expect(driver.upload({ key: 'big.zip', totalSize: 101, contentType: '' }, bytes(101)))
                .rejects.toThrow('File size 101 exceeds maximum allowed size 100');
            expect(gateway.calls).toEqual([]);
        });

        it('should reject a negative size', async () => {
            await expect(driver.upload({ key: 'a.txt', totalSize: -1, contentType: '' }, Buffer.alloc(0)))
                .rejects.toThrow('File size must be a non-negative integer, got -1');
        });

        it('should reject unsafe keys', async () => {
            await expect(driver.upload({ key: '../etc/passwd.txt', totalSize: 1, contentType: '' }, Buffer.from('a')))
                .rejects.toBeInstanceOf(ValidationError);
            expect(gateway.calls).toEqual([]);
        });
    });

    describe('failures', () => {
        it('should wrap part failures', async () => {
            await setup({ failParts: [2] });

            const result = driver.upload({ key: 'docs/b.pdf', totalSize: 12, contentType: '' }, bytes(12));

            await expect(result).rejects.toBeInstanceOf(UploadFailedError);
            await expect(result).rejects.toMatchObject({
                code: 'UPLOAD_FAILED',
                cause: { code: 'PARTS_FAILED', failedParts: [2] },
            });
            expect(gateway.abortCalls).toBe(1);
        });

        it('should wrap commit failures without aborting', async () => {
            await setup({ failComplete: true });

            await expect(driver.upload({ key: 'docs/b.pdf', totalSize: 12, contentType: '' }, bytes(12)))
                .rejects.toMatchObject({ cause: { code: 'COMMIT_FAILED' } });
            expect(gateway.abortCalls).toBe(0);
        });

        it('should wrap single-request failures', async () => {
            await setup({ failPutWhole: true });

            await expect(driver.upload({ key: 'a.txt', totalSize: 3, contentType: '' }, Buffer.from('abc')))
                .rejects.toMatchObject({ cause: { code: 'PUT_OBJECT_FAILED' } });
        });

        it('should not store a single-request body of the wrong size', async () => {
            await expect(driver.upload({ key: 'a.txt', totalSize: 5, contentType: '' }, Buffer.from('abcd')))
                .rejects.toMatchObject({ cause: { code: 'SIZE_MISMATCH', expected: 5, actual: 4 } });
            expect(gateway.calls).toEqual([]);
        });

        it('should not open a session once cancelled', async () => {
            const controller = new AbortController();
            controller.abort();

            await expect(driver.upload(
                { key: 'docs/b.pdf', totalSize: 12, contentType: '' },
                bytes(12),
                { signal: controller.signal },
            )).rejects.toMatchObject({ cause: { code: 'UPLOAD_CANCELLED' } });
            expect(gateway.calls).toEqual([]);
        });
    });
});

describe('sanitizeObjectKey', () => {
    it('should collapse duplicate separators and dot segments', () => {
        expect(sanitizeObjectKey('a//b/./c.txt')).toBe('a/b/c.txt');
        expect(sanitizeObjectKey('a/b/../c.txt')).toBe('a/c.txt');
    });

    it('should reject empty, absolute and traversing keys', () => {
        expect(() => sanitizeObjectKey('')).toThrow('Object key is required');
        expect(() => sanitizeObjectKey('/abs.txt')).toThrow('Absolute paths not allowed');
        expect(() => sanitizeObjectKey('../up.txt')).toThrow('Directory traversal not allowed');
        expect(() => sanitizeObjectKey('a/../..')).toThrow('Directory traversal not allowed');
        expect(() => sanitizeObjectKey('.')).toThrow('Directory traversal not allowed');
    });

    it('should reject control characters and backslashes', () => {
        expect(() => sanitizeObjectKey('a\u0000b')).toThrow(ValidationError);
        expect(() => sanitizeObjectKey('a\\b')).toThrow(ValidationError);
    });
});
