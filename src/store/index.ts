/**
 * Object store module.
 * Baselines and run artifacts. Only module that talks to the bucket.
 */

export * from './client.js';
export { createMinioClient, createMinioStore } from './minio.js';
export type { MinioClientLike } from './minio.js';
export { createMemoryStore } from './memory.js';
export type { MemoryObjectStore } from './memory.js';
