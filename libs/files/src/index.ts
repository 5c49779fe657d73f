export * from './files.module';
export * from './object-store.gateway';
export * from './s3-object-store.gateway';
export * from './upload/upload.types';
export * from './upload/upload.errors';
export * from './upload/upload.settings';
export * from './upload/size-classifier';
export * from './upload/upload-worker-pool';
export * from './upload/part-uploader';
export * from './upload/part-reader';
export * from './upload/multipart-upload.orchestrator';
export * from './upload/upload-driver';
