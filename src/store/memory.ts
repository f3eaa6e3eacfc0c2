import type { ObjectStore } from './client.js';

export interface MemoryObjectStore extends ObjectStore {
  readonly objects: ReadonlyMap<string, { body: Buffer; contentType: string }>;
}

/**
 * In-process object store for tests and local `run` invocations.
 */
export function createMemoryStore(): MemoryObjectStore {
  const objects = new Map<string, { body: Buffer; contentType: string }>();

  return {
    objects,

    async get(key: string): Promise<Buffer | undefined> {
      return objects.get(key)?.body;
    },

    async put(key: string, body: Buffer, contentType: string): Promise<void> {
      objects.set(key, { body: Buffer.from(body), contentType });
    },
  };
}
