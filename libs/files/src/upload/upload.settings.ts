export const UPLOAD_SETTINGS = Symbol('UPLOAD_SETTINGS');

const MiB = 1024 * 1024;
const GiB = 1024 * MiB;

export interface ChunkBand {
    /** Files up to and including this size use the band's chunk size. */
    maxFileSize: number;
    chunkSize: number;
}

export interface UploadSettings {
    multipartThreshold: number;
    streamingThreshold: number;
    chunkBands: {
        small: ChunkBand;
        medium: ChunkBand;
        large: { chunkSize: number };
    };
    maxConcurrentUploads: number;
    minChunksForConcurrency: number;
    fullConcurrencyCeiling: number;
    limitedConcurrencyCeiling: number;
    limitedConcurrencyValue: number;
    /** Part uploads allowed in flight across every upload in the process. */
    workerPoolSize: number;
    maxFileSize: number;
    allowedExtensions: string[];
    uploadTimeoutMs: number;
    maxFilesPerRequest: number;
    /** Base for object links, without a trailing slash. */
    publicUrl: string;
}

export type UploadSettingsOverrides = Partial<Omit<UploadSettings, 'chunkBands'>> & {
    chunkBands?: {
        small?: Partial<ChunkBand>;
        medium?: Partial<ChunkBand>;
        large?: { chunkSize?: number };
    };
};

export const DEFAULT_UPLOAD_SETTINGS: UploadSettings = {
    multipartThreshold: 100 * MiB,
    streamingThreshold: 2 * GiB,
    chunkBands: {
        small: { maxFileSize: 256 * MiB, chunkSize: 16 * MiB },
        medium: { maxFileSize: 1 * GiB, chunkSize: 100 * MiB },
        large: { chunkSize: 256 * MiB },
    },
    maxConcurrentUploads: 10,
    minChunksForConcurrency: 2,
    fullConcurrencyCeiling: 8,
    limitedConcurrencyCeiling: 32,
    limitedConcurrencyValue: 8,
    workerPoolSize: 20,
    maxFileSize: 5 * GiB,
    allowedExtensions: 'jpg,jpeg,png,gif,pdf,txt,doc,docx,zip,mkv,mp4,mp3,xlsx,xls,csv,ppt,pptx'.split(','),
    uploadTimeoutMs: 60 * 60 * 1000,
    maxFilesPerRequest: 20,
    publicUrl: '',
};

/**
 * Merges overrides onto the defaults and checks the result.
 * @throws Error naming the first invalid setting
 */
export function resolveUploadSettings(overrides: UploadSettingsOverrides = {}): UploadSettings {
    const defaults = DEFAULT_UPLOAD_SETTINGS;
    const { small: smallBand = {}, medium: mediumBand = {}, large: largeBand = {} } = overrides.chunkBands ?? {};
    const settings: UploadSettings = {
        multipartThreshold: overrides.multipartThreshold ?? defaults.multipartThreshold,
        streamingThreshold: overrides.streamingThreshold ?? defaults.streamingThreshold,
        chunkBands: {
            small: {
                maxFileSize: smallBand.maxFileSize ?? defaults.chunkBands.small.maxFileSize,
                chunkSize: smallBand.chunkSize ?? defaults.chunkBands.small.chunkSize,
            },
            medium: {
                maxFileSize: mediumBand.maxFileSize ?? defaults.chunkBands.medium.maxFileSize,
                chunkSize: mediumBand.chunkSize ?? defaults.chunkBands.medium.chunkSize,
            },
            large: {
                chunkSize: largeBand.chunkSize ?? defaults.chunkBands.large.chunkSize,
            },
        },
        maxConcurrentUploads: overrides.maxConcurrentUploads ?? defaults.maxConcurrentUploads,
        minChunksForConcurrency: overrides.minChunksForConcurrency ?? defaults.minChunksForConcurrency,
        fullConcurrencyCeiling: overrides.fullConcurrencyCeiling ?? defaults.fullConcurrencyCeiling,
        limitedConcurrencyCeiling: overrides.limitedConcurrencyCeiling ?? defaults.limitedConcurrencyCeiling,
        limitedConcurrencyValue: overrides.limitedConcurrencyValue ?? defaults.limitedConcurrencyValue,
        workerPoolSize: overrides.workerPoolSize ?? defaults.workerPoolSize,
        maxFileSize: overrides.maxFileSize ?? defaults.maxFileSize,
        allowedExtensions: overrides.allowedExtensions ?? defaults.allowedExtensions,
        uploadTimeoutMs: overrides.uploadTimeoutMs ?? defaults.uploadTimeoutMs,
        maxFilesPerRequest: overrides.maxFilesPerRequest ?? defaults.maxFilesPerRequest,
        publicUrl: overrides.publicUrl ?? defaults.publicUrl,
    };
    settings.allowedExtensions = settings.allowedExtensions
        .map((ext) => ext.trim().toLowerCase().replace(/^\./, ''))
        .filter((ext) => ext.length > 0);
    settings.publicUrl = settings.publicUrl.replace(/\/+$/, '');

    const { small, medium, large } = settings.chunkBands;
    const positive: Array<[string, number]> = [
        ['multipartThreshold', settings.multipartThreshold],
        ['streamingThreshold', settings.streamingThreshold],
        ['chunkBands.small.maxFileSize', small.maxFileSize],
        ['chunkBands.small.chunkSize', small.chunkSize],
        ['chunkBands.medium.maxFileSize', medium.maxFileSize],
        ['chunkBands.medium.chunkSize', medium.chunkSize],
        ['chunkBands.large.chunkSize', large.chunkSize],
        ['maxConcurrentUploads', settings.maxConcurrentUploads],
        ['minChunksForConcurrency', settings.minChunksForConcurrency],
        ['fullConcurrencyCeiling', settings.fullConcurrencyCeiling],
        ['limitedConcurrencyCeiling', settings.limitedConcurrencyCeiling],
        ['limitedConcurrencyValue', settings.limitedConcurrencyValue],
        ['workerPoolSize', settings.workerPoolSize],
        ['maxFileSize', settings.maxFileSize],
        ['uploadTimeoutMs', settings.uploadTimeoutMs],
        ['maxFilesPerRequest', settings.maxFilesPerRequest],
    ];
    for (const [name, value] of positive) {
        if (!Number.isSafeInteger(value) || value < 1) {
            throw new Error(`Upload setting ${name} must be a positive integer, got ${value}`);
        }
    }
    if (settings.streamingThreshold < settings.multipartThreshold) {
        throw new Error('Upload setting streamingThreshold must not be below multipartThreshold');
    }
    if (medium.maxFileSize <= small.maxFileSize) {
        throw new Error('Upload chunk bands must have ascending maxFileSize (small < medium)');
    }
    if (settings.limitedConcurrencyCeiling < settings.fullConcurrencyCeiling
        || settings.fullConcurrencyCeiling < settings.minChunksForConcurrency) {
        throw new Error('Upload concurrency ceilings must satisfy minChunksForConcurrency <= fullConcurrencyCeiling <= limitedConcurrencyCeiling');
    }

    return settings;
}

