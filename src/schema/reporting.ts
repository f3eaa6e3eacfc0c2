import { z } from 'zod';

import { parameterSetSchema } from './job.js';
import { stepStatusSchema, visualStatusSchema } from './run.js';

// ── Run-record store ─────────────────────────────────────────

export const createRunRequestSchema = z.object({
  objective: z.string(),
  test_case_id: z.string().min(1),
  parameters: z.array(parameterSetSchema),
});

export type CreateRunRequest = z.infer<typeof createRunRequestSchema>;

export const createdRunRecordSchema = z
  .object({
    id: z.union([z.string().min(1), z.number().int()]),
  })
  .passthrough();

export type CreatedRunRecord = z.infer<typeof createdRunRecordSchema>;

export const finalStatusPayloadSchema = z.object({
  status: z.enum(['PASS', 'FAIL']),
  visual_status: visualStatusSchema,
  failure_reason: z.string().nullable(),
  artifacts_path: z.string(),
  visual_artifacts: z.array(z.string()),
});

export type FinalStatusPayload = z.infer<typeof finalStatusPayloadSchema>;

// ── Live-progress channel ────────────────────────────────────

export const progressEventTypeSchema = z.enum([
  'run_start',
  'step_result',
  'run_end',
]);

export type ProgressEventType = z.infer<typeof progressEventTypeSchema>;

export const stepManifestEntrySchema = z.object({
  step_number: z.number().int().nonnegative(),
  action: z.string(),
  target_element: z.string(),
});

export type StepManifestEntry = z.infer<typeof stepManifestEntrySchema>;

export const progressEventSchema = z.object({
  type: progressEventTypeSchema,
  status: stepStatusSchema,
  step: z.number().int().nonnegative().optional(),
  reason: z.string().optional(),
  steps: z.array(stepManifestEntrySchema).optional(),
  visual_status: visualStatusSchema.optional(),
});

export type ProgressEvent = z.infer<typeof progressEventSchema>;

export const broadcastMessageSchema = z.object({
  run_id: z.string().min(1),
  test_case_id: z.string().min(1),
  dataset_name: z.string().min(1),
  status: z.enum(['PASS', 'FAIL']),
  visual_status: visualStatusSchema,
  failure_reason: z.string().nullable(),
});

export type BroadcastMessage = z.infer<typeof broadcastMessageSchema>;
