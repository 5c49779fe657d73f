import { DEFAULT_UPLOAD_SETTINGS, resolveUploadSettings } from './upload.settings';

describe('resolveUploadSettings', () => {
    it('should return the defaults when nothing is overridden', () => {
        expect(resolveUploadSettings()).toEqual(DEFAULT_UPLOAD_SETTINGS);
    });

    it('should apply overrides field by field', () => {
        const settings = resolveUploadSettings({
            maxConcurrentUploads: 4,
            chunkBands: { large: { chunkSize: 512 } },
        });

        expect(settings.maxConcurrentUploads).toBe(4);
        expect(settings.chunkBands.large.chunkSize).toBe(512);
        expect(settings.chunkBands.small).toEqual(DEFAULT_UPLOAD_SETTINGS.chunkBands.small);
        expect(settings.workerPoolSize).toBe(DEFAULT_UPLOAD_SETTINGS.workerPoolSize);
    });

    it('should override a single field of a chunk band', () => {
        const settings = resolveUploadSettings({ chunkBands: { small: { chunkSize: 8 * 1024 * 1024 } } });

        expect(settings.chunkBands.small).toEqual({
            maxFileSize: DEFAULT_UPLOAD_SETTINGS.chunkBands.small.maxFileSize,
            chunkSize: 8 * 1024 * 1024,
        });
    });

    it('should reject a per-request file limit that is not a number', () => {
        expect(() => resolveUploadSettings({ maxFilesPerRequest: Number('abc') }))
            .toThrow('Upload setting maxFilesPerRequest must be a positive integer, got NaN');
    });

    it('should normalize allowed extensions', () => {
        const settings = resolveUploadSettings({ allowedExtensions: ['.PDF ', 'Txt', ' ', 'zip'] });

        expect(settings.allowedExtensions).toEqual(['pdf', 'txt', 'zip']);
    });

    it('should drop trailing slashes from the public url', () => {
        const settings = resolveUploadSettings({ publicUrl: 'http://store.test/bucket//' });

        expect(settings.publicUrl).toBe('http://store.test/bucket');
    });

    it('should reject a streaming threshold below the multipart threshold', () => {
        expect(() => resolveUploadSettings({ multipartThreshold: 100, streamingThreshold: 50 }))
            .toThrow('Upload setting streamingThreshold must not be below multipartThreshold');
    });

    it('should reject a non-positive worker pool size', () => {
        expect(() => resolveUploadSettings({ workerPoolSize: 0 }))
            .toThrow('Upload setting workerPoolSize must be a positive integer, got 0');
    });

    it('should reject bands that do not grow', () => {
        expect(() => resolveUploadSettings({
            chunkBands: {
                small: { maxFileSize: 100, chunkSize: 10 },
                medium: { maxFileSize: 100, chunkSize: 20 },
            },
        })).toThrow('Upload chunk bands must have ascending maxFileSize (small < medium)');
    });

    it('should reject concurrency ceilings out of order', () => {
        expect(() => resolveUploadSettings({ fullConcurrencyCeiling: 40, limitedConcurrencyCeiling: 32 }))
            .toThrow(/minChunksForConcurrency <= fullConcurrencyCeiling <= limitedConcurrencyCeiling/);
    });
});
