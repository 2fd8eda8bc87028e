import { z } from 'zod';
import { ConfigurationError } from '../engine/errors';
import type { Env } from './env';

/**
 * Tuning values for one deployment of the decision engine.
 * Every value has a stable default; callers override per deployment.
 */
export interface EngineConfig {
    /** t_low: PD strictly below this is APPROVE. */
    approveThreshold: number;
    /** t_high: PD at or above this is REJECT. */
    rejectThreshold: number;
    /** Attributions requested from the explanation engine. */
    topK: number;
    /** Minimum |weight| an attribution must exceed to drive recommendations. */
    significanceThreshold: number;
    maxQuestions: number;
    maxDocuments: number;
    maxImprovementActions: number;
    maxActionsPerFeature: number;
    /** Discount applied per step when accumulating improvement deltas. */
    decayFactor: number;
    /** Projected PD is never pushed below this (or below the current PD, if lower). */
    projectedPdFloor: number;
    /** Perturbed neighbours per explanation, the instance itself included. */
    sampleCount: number;
    categoricalFlipRate: number;
    /** Proximity kernel width; null means 0.75 * sqrt(feature count). */
    kernelWidth: number | null;
    ridgeAlpha: number;
    /** Seed used when the caller does not supply one. */
    defaultSeed: number;
    maxCounterfactuals: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
    approveThreshold: 0.15,
    rejectThreshold: 0.40,
    topK: 5,
    significanceThreshold: 0.01,
    maxQuestions: 7,
    maxDocuments: 6,
    maxImprovementActions: 10,
    maxActionsPerFeature: 2,
    decayFactor: 0.7,
    projectedPdFloor: 0.03,
    sampleCount: 500,
    categoricalFlipRate: 0.3,
    kernelWidth: null,
    ridgeAlpha: 1,
    defaultSeed: 42,
    maxCounterfactuals: 5
});

const probability = z.number().min(0).max(1);
const positiveInt = z.number().int().positive();

const engineConfigSchema = z.object({
    approveThreshold: probability,
    rejectThreshold: probability,
    topK: positiveInt,
    significanceThreshold: z.number().min(0),
    maxQuestions: z.number().int().min(0),
    maxDocuments: z.number().int().min(0),
    maxImprovementActions: z.number().int().min(0),
    maxActionsPerFeature: positiveInt,
    decayFactor: z.number().gt(0).lt(1),
    projectedPdFloor: probability,
    sampleCount: z.number().int().min(2).max(20_000),
    categoricalFlipRate: probability,
    kernelWidth: z.number().positive().nullable(),
    ridgeAlpha: z.number().min(0),
    defaultSeed: z.number().int().nonnegative(),
    maxCounterfactuals: z.number().int().min(0)
}).refine(c => c.approveThreshold < c.rejectThreshold, {
    message: 'approveThreshold must be lower than rejectThreshold',
    path: ['approveThreshold']
});

export function createEngineConfig(overrides: Partial<EngineConfig> = {}): Readonly<EngineConfig> {
    const parsed = engineConfigSchema.safeParse({ ...DEFAULT_ENGINE_CONFIG, ...overrides });
    if (!parsed.success) {
        throw new ConfigurationError(
            'Invalid engine configuration',
            parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
        );
    }
    return Object.freeze(parsed.data);
}

/**
 * Maps the ENGINE_* environment overrides onto an engine configuration.
 */
export function engineConfigFromEnv(source: Env): Readonly<EngineConfig> {
    const overrides: Partial<EngineConfig> = {};
    if (source.ENGINE_APPROVE_THRESHOLD !== undefined) overrides.approveThreshold = source.ENGINE_APPROVE_THRESHOLD;
    if (source.ENGINE_REJECT_THRESHOLD !== undefined) overrides.rejectThreshold = source.ENGINE_REJECT_THRESHOLD;
    if (source.ENGINE_TOP_K !== undefined) overrides.topK = source.ENGINE_TOP_K;
    if (source.ENGINE_SIGNIFICANCE_THRESHOLD !== undefined) overrides.significanceThreshold = source.ENGINE_SIGNIFICANCE_THRESHOLD;
    if (source.ENGINE_MAX_QUESTIONS !== undefined) overrides.maxQuestions = source.ENGINE_MAX_QUESTIONS;
    if (source.ENGINE_MAX_DOCUMENTS !== undefined) overrides.maxDocuments = source.ENGINE_MAX_DOCUMENTS;
    if (source.ENGINE_MAX_IMPROVEMENT_ACTIONS !== undefined) overrides.maxImprovementActions = source.ENGINE_MAX_IMPROVEMENT_ACTIONS;
    if (source.ENGINE_MAX_ACTIONS_PER_FEATURE !== undefined) overrides.maxActionsPerFeature = source.ENGINE_MAX_ACTIONS_PER_FEATURE;
    if (source.ENGINE_PROJECTED_PD_FLOOR !== undefined) overrides.projectedPdFloor = source.ENGINE_PROJECTED_PD_FLOOR;
    if (source.ENGINE_CATEGORICAL_FLIP_RATE !== undefined) overrides.categoricalFlipRate = source.ENGINE_CATEGORICAL_FLIP_RATE;
    if (source.ENGINE_KERNEL_WIDTH !== undefined) overrides.kernelWidth = source.ENGINE_KERNEL_WIDTH;
    if (source.ENGINE_RIDGE_ALPHA !== undefined) overrides.ridgeAlpha = source.ENGINE_RIDGE_ALPHA;
    if (source.ENGINE_MAX_COUNTERFACTUALS !== undefined) overrides.maxCounterfactuals = source.ENGINE_MAX_COUNTERFACTUALS;
    if (source.ENGINE_DECAY_FACTOR !== undefined) overrides.decayFactor = source.ENGINE_DECAY_FACTOR;
    if (source.ENGINE_SAMPLE_COUNT !== undefined) overrides.sampleCount = source.ENGINE_SAMPLE_COUNT;
    if (source.ENGINE_DEFAULT_SEED !== undefined) overrides.defaultSeed = source.ENGINE_DEFAULT_SEED;
    return createEngineConfig(overrides);
}
