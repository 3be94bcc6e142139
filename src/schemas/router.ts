import { z } from 'zod';
import { IntentType } from './product.js';

/**
 * Strict JSON expected from the LLM scope classifier.
 */
export const ClassifierOutput = z.object({
  type: IntentType,
  safety_flags: z.array(z.string()).optional().default([]),
  confidence: z.number().min(0).max(1).optional(),
});
export type ClassifierOutputT = z.infer<typeof ClassifierOutput>;
