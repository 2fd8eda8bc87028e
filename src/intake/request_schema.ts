import { z } from 'zod';
import { FEATURE_IDS } from '../engine/feature_schema';

const fieldValues = z.record(z.string(), z.unknown());

export const evaluateRequestSchema = z.object({
    application: fieldValues,
    extracted: fieldValues.optional(),
    seed: z.number().int().nonnegative().optional(),
    explain: z.boolean().optional()
});

export const explainRequestSchema = z.object({
    application: fieldValues,
    extracted: fieldValues.optional(),
    seed: z.number().int().nonnegative().optional(),
    k: z.number().int().min(1).max(FEATURE_IDS.length).optional()
});

export type EvaluateRequest = z.infer<typeof evaluateRequestSchema>;
export type ExplainRequest = z.infer<typeof explainRequestSchema>;
