import axios from 'axios';
import type { AxiosInstance } from 'axios';

import type {
  BroadcastMessage,
  CreateRunRequest,
  CreatedRunRecord,
  FinalStatusPayload,
  ProgressEvent,
} from '../schema/reporting.js';
import { createdRunRecordSchema } from '../schema/reporting.js';

// ── Collaborator interfaces ──────────────────────────────────

export interface RunRecordStore {
  createRun(request: CreateRunRequest): Promise<CreatedRunRecord>;
  finalizeRun(runId: string, payload: FinalStatusPayload): Promise<void>;
}

export interface LiveProgressChannel {
  update(runId: string, event: ProgressEvent): Promise<void>;
  broadcast(message: BroadcastMessage): Promise<void>;
}

// ── HTTP clients ─────────────────────────────────────────────

export function createHttpClient(baseURL: string, timeoutMs: number): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function createHttpRunRecordStore(http: AxiosInstance): RunRecordStore {
  return {
    async createRun(request: CreateRunRequest): Promise<CreatedRunRecord> {
      const response = await http.post<unknown>('/results', request);
      return createdRunRecordSchema.parse(response.data);
    },

    async finalizeRun(runId: string, payload: FinalStatusPayload): Promise<void> {
      await http.put(
        `/results/${encodeURIComponent(runId)}/final-status`,
        payload,
      );
    },
  };
}

export function createHttpLiveProgress(http: AxiosInstance): LiveProgressChannel {
  return {
    async update(runId: string, event: ProgressEvent): Promise<void> {
      await http.post(`/update/${encodeURIComponent(runId)}`, event);
    },

    async broadcast(message: BroadcastMessage): Promise<void> {
      await http.post('/notify/broadcast', message);
    },
  };
}
