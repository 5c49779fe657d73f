const int = (value: string | undefined): number | undefined =>
  value === undefined || value === '' ? undefined : Number(value);

const list = (value: string | undefined): string[] | undefined =>
  value === undefined || value === '' ? undefined : value.split(',');

const endpoint = process.env.AWS_ENDPOINT_URL;
const bucketName = process.env.AWS_S3_BUCKET_NAME;

export default () => ({
  app: {
    env: process.env.NODE_ENV || 'dev',
    port: int(process.env.API_PORT) ?? 3000,
    host: process.env.API_HOST || '::',
    logger: process.env.API_LOGGER || 'verbose',
  },
  s3: {
    accessKeyId: process.env.AWS_ACCESS_KEY_ID,
    secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
    region: process.env.AWS_REGION,
    endpoint,
    bucketName,
    publicUrl: process.env.AWS_S3_PUBLIC_URL
      || (endpoint && bucketName ? `${endpoint.replace(/\/+$/, '')}/${bucketName}` : undefined),
    maxRetries: int(process.env.AWS_S3_MAX_RETRIES),
    retryBaseDelayMs: int(process.env.AWS_S3_RETRY_BASE_DELAY_MS),
    retryMaxDelayMs: int(process.env.AWS_S3_RETRY_MAX_DELAY_MS),
  },
  upload: {
    multipartThreshold: int(process.env.UPLOAD_MULTIPART_THRESHOLD),
    streamingThreshold: int(process.env.UPLOAD_STREAMING_THRESHOLD),
    chunkBands: {
      small: {
        maxFileSize: int(process.env.UPLOAD_SMALL_MAX_FILE_SIZE),
        chunkSize: int(process.env.UPLOAD_SMALL_CHUNK_SIZE),
      },
      medium: {
        maxFileSize: int(process.env.UPLOAD_MEDIUM_MAX_FILE_SIZE),
        chunkSize: int(process.env.UPLOAD_MEDIUM_CHUNK_SIZE),
      },
      large: {
        chunkSize: int(process.env.UPLOAD_LARGE_CHUNK_SIZE),
      },
    },
    maxConcurrentUploads: int(process.env.UPLOAD_MAX_CONCURRENT_UPLOADS),
    minChunksForConcurrency: int(process.env.UPLOAD_MIN_CHUNKS_FOR_CONCURRENCY),
    fullConcurrencyCeiling: int(process.env.UPLOAD_FULL_CONCURRENCY_CEILING),
    limitedConcurrencyCeiling: int(process.env.UPLOAD_LIMITED_CONCURRENCY_CEILING),
    limitedConcurrencyValue: int(process.env.UPLOAD_LIMITED_CONCURRENCY_VALUE),
    workerPoolSize: int(process.env.UPLOAD_WORKER_POOL_SIZE),
    maxFileSize: int(process.env.UPLOAD_MAX_FILE_SIZE),
    allowedExtensions: list(process.env.UPLOAD_ALLOWED_EXTENSIONS),
    uploadTimeoutMs: int(process.env.UPLOAD_TIMEOUT_MS),
    maxFilesPerRequest: int(process.env.UPLOAD_MAX_FILES_PER_REQUEST),
    spoolDir: process.env.UPLOAD_SPOOL_DIR || undefined,
  },
});
