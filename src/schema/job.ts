import { z } from 'zod';

// ── BlueprintElement ─────────────────────────────────────────
// Produced by the page crawler. Absent attributes arrive as null.

const optionalAttribute = z.string().nullish();

export const blueprintElementSchema = z.object({
  logical_name: z.string().min(1),
  tag: optionalAttribute,
  text: optionalAttribute,
  id: optionalAttribute,
  name: optionalAttribute,
  placeholder: optionalAttribute,
  aria_label: optionalAttribute,
  role: optionalAttribute,
  data_test: optionalAttribute,
});

export type BlueprintElement = z.infer<typeof blueprintElementSchema>;

export const blueprintSchema = z
  .array(blueprintElementSchema)
  .superRefine((elements, ctx) => {
    const seen = new Set<string>();
    for (const [index, element] of elements.entries()) {
      if (seen.has(element.logical_name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'logical_name'],
          message: `Duplicate logical_name "${element.logical_name}"`,
        });
      }
      seen.add(element.logical_name);
    }
  });

// ── ParameterSet ─────────────────────────────────────────────

export const parameterSetSchema = z.object({
  dataset_name: z.string().min(1).default('default'),
  data: z.record(z.string(), z.coerce.string()).default({}),
});

export type ParameterSet = z.infer<typeof parameterSetSchema>;

export const DEFAULT_PARAMETER_SET: ParameterSet = {
  dataset_name: 'default',
  data: {},
};

// ── Step ─────────────────────────────────────────────────────

export const stepActionSchema = z.enum([
  'ENTER_TEXT',
  'CLICK',
  'VERIFY_ELEMENT_VISIBLE',
  'VISUAL_VALIDATION',
]);

export type StepAction = z.infer<typeof stepActionSchema>;

export const stepVerificationSchema = z.object({
  element_visible: z.string().min(1),
});

export type StepVerification = z.infer<typeof stepVerificationSchema>;

export const stepSchema = z.object({
  step_number: z.number().int().nonnegative(),
  action: stepActionSchema,
  target_element: z.string().min(1),
  data_key: z.string().min(1).optional(),
  verifications: stepVerificationSchema.optional(),
});

export type Step = z.infer<typeof stepSchema>;

// ── TestCaseJob ──────────────────────────────────────────────

export const testCaseJobSchema = z.object({
  test_case_id: z.string().min(1),
  objective: z.string().default(''),
  target_url: z.string().url(),
  is_live_view: z.boolean().default(false),
  ui_blueprint: blueprintSchema.default([]),
  parameters: z.array(parameterSetSchema).default([]),
  steps: z.array(stepSchema).min(1),
  run_id: z.union([z.string().min(1), z.number().int().positive()]).optional(),
});

export type TestCaseJob = z.infer<typeof testCaseJobSchema>;
export type TestCaseJobInput = z.input<typeof testCaseJobSchema>;

// ── Parsers ──────────────────────────────────────────────────

export function parseTestCaseJob(data: unknown): TestCaseJob {
  return testCaseJobSchema.parse(data);
}

/** Steps in execution order. The wire order is not trusted. */
export function orderedSteps(job: TestCaseJob): Step[] {
  return [...job.steps].sort((a, b) => a.step_number - b.step_number);
}

/** Parameter sets to run; a job without any runs once with an empty dataset. */
export function parameterSetsOf(job: TestCaseJob): ParameterSet[] {
  return job.parameters.length > 0 ? job.parameters : [DEFAULT_PARAMETER_SET];
}
