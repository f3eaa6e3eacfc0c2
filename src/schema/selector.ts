import { z } from 'zod';

// ── SelectorHint ──────────────────────────────────────────────
// Concrete selector derived from a blueprint entry. Strategies are listed
// from most to least stable.

export const selectorStrategySchema = z.enum([
  'testid',
  'id',
  'text',
  'placeholder',
  'css',
]);

export type SelectorStrategy = z.infer<typeof selectorStrategySchema>;

export const selectorHintSchema = z.object({
  strategy: selectorStrategySchema,
  value: z.string().min(1),
});

export type SelectorHint = z.infer<typeof selectorHintSchema>;
