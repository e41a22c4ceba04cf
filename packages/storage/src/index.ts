/**
 * @reelvault/storage
 * 
 * Blob stores for finished artifacts.
 * 
 * Supported targets:
 * - Local directory (always present)
 * - MinIO / S3 compatible bucket (optional)
 */

export { LocalBlobStore } from './targets/local.js';
export { MinioBlobStore, type MinioConfig } from './targets/minio.js';
export { StorageRouter, type StorageRouterOptions } from './router.js';
