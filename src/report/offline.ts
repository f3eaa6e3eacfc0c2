import type { LiveProgressChannel, RunRecordStore } from './http.js';

/**
 * Collaborators for local runs without a run-record service.
 * Hands out sequential local ids and discards everything else.
 */
export function createOfflineRunRecords(): RunRecordStore {
  let next = 1;

  return {
    async createRun() {
      const id = `local-${String(next)}`;
      next++;
      return { id };
    },

    async finalizeRun(): Promise<void> {},
  };
}

export function createOfflineLiveProgress(): LiveProgressChannel {
  return {
    async update(): Promise<void> {},
    async broadcast(): Promise<void> {},
  };
}
