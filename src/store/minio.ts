import type { Readable } from 'node:stream';

import { Client } from 'minio';

import type { ObjectStoreConfig } from '../schema/config.js';
import type { ObjectStore } from './client.js';

// ── Constants ────────────────────────────────────────────────

const NOT_FOUND_CODES = new Set(['NoSuchKey', 'NotFound', 'NoSuchObject']);

export type MinioClientLike = Pick<
  Client,
  'getObject' | 'putObject' | 'bucketExists' | 'makeBucket'
>;

// ── Provider factory ─────────────────────────────────────────

export function createMinioClient(config: ObjectStoreConfig): Client {
  return new Client({
    endPoint: config.endPoint,
    port: config.port,
    useSSL: config.useSSL,
    accessKey: config.accessKey,
    secretKey: config.secretKey,
  });
}

/**
 * Object store backed by a MinIO / S3-compatible bucket.
 * The client is injected so tests and other callers control its lifecycle.
 */
export function createMinioStore(
  client: MinioClientLike,
  bucket: string,
): ObjectStore & { ensureBucket(): Promise<void> } {
  return {
    async ensureBucket(): Promise<void> {
      if (!(await client.bucketExists(bucket))) {
        await client.makeBucket(bucket);
      }
    },

    async get(key: string): Promise<Buffer | undefined> {
      let stream: Readable;
      try {
        stream = await client.getObject(bucket, key);
      } catch (err) {
        if (isNotFound(err)) return undefined;
        throw err;
      }
      return readAll(stream);
    },

    async put(key: string, body: Buffer, contentType: string): Promise<void> {
      await client.putObject(bucket, key, body, body.length, {
        'Content-Type': contentType,
      });
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

function isNotFound(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    typeof err.code === 'string' &&
    NOT_FOUND_CODES.has(err.code)
  );
}

async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}
