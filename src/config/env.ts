import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalNumber = z.coerce.number().optional();

const envSchema = z.object({
    PORT: z.string().default('3001'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    CORS_ORIGIN: z.string().default('*'),
    MODEL_PATH: z.string().optional(),
    KNOWLEDGE_BASE_PATH: z.string().optional(),
    ENGINE_APPROVE_THRESHOLD: optionalNumber,
    ENGINE_REJECT_THRESHOLD: optionalNumber,
    ENGINE_TOP_K: optionalNumber,
    ENGINE_SIGNIFICANCE_THRESHOLD: optionalNumber,
    ENGINE_MAX_QUESTIONS: optionalNumber,
    ENGINE_MAX_DOCUMENTS: optionalNumber,
    ENGINE_MAX_IMPROVEMENT_ACTIONS: optionalNumber,
    ENGINE_MAX_ACTIONS_PER_FEATURE: optionalNumber,
    ENGINE_PROJECTED_PD_FLOOR: optionalNumber,
    ENGINE_CATEGORICAL_FLIP_RATE: optionalNumber,
    ENGINE_KERNEL_WIDTH: optionalNumber,
    ENGINE_RIDGE_ALPHA: optionalNumber,
    ENGINE_MAX_COUNTERFACTUALS: optionalNumber,
    ENGINE_DECAY_FACTOR: optionalNumber,
    ENGINE_SAMPLE_COUNT: optionalNumber,
    ENGINE_DEFAULT_SEED: optionalNumber,
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
