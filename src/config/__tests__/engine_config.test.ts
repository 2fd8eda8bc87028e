import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG, createEngineConfig, engineConfigFromEnv } from '../engine_config';
import { ConfigurationError } from '../../engine/errors';

describe('Engine configuration', () => {
    it('falls back to the defaults', () => {
        const config = createEngineConfig();
        expect(config).toEqual(DEFAULT_ENGINE_CONFIG);
        expect(config.approveThreshold).toBe(0.15);
        expect(config.rejectThreshold).toBe(0.4);
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('applies overrides on top of the defaults', () => {
        const config = createEngineConfig({ topK: 8, kernelWidth: 2.5 });
        expect(config.topK).toBe(8);
        expect(config.kernelWidth).toBe(2.5);
        expect(config.decayFactor).toBe(0.7);
    });

    it('requires t_low below t_high', () => {
        expect(() => createEngineConfig({ approveThreshold: 0.4, rejectThreshold: 0.4 }))
            .toThrowError('Invalid engine configuration: approveThreshold: approveThreshold must be lower than rejectThreshold');
    });

    it('rejects a decay factor outside (0, 1)', () => {
        expect(() => createEngineConfig({ decayFactor: 1 })).toThrowError(ConfigurationError);
        expect(() => createEngineConfig({ decayFactor: 0 })).toThrowError(ConfigurationError);
    });

    it('rejects a fractional top k', () => {
        expect(() => createEngineConfig({ topK: 2.5 })).toThrowError(ConfigurationError);
    });

    it('reads ENGINE_* overrides from the environment', () => {
        const config = engineConfigFromEnv({
            PORT: '3001',
            NODE_ENV: 'test',
            CORS_ORIGIN: '*',
            ENGINE_TOP_K: 3,
            ENGINE_APPROVE_THRESHOLD: 0.1
        });
        expect(config.topK).toBe(3);
        expect(config.approveThreshold).toBe(0.1);
        expect(config.rejectThreshold).toBe(0.4);
    });

    it('maps the bundle and sampler tunables from the environment', () => {
        const config = engineConfigFromEnv({
            PORT: '3001',
            NODE_ENV: 'test',
            CORS_ORIGIN: '*',
            ENGINE_MAX_IMPROVEMENT_ACTIONS: 4,
            ENGINE_MAX_ACTIONS_PER_FEATURE: 1,
            ENGINE_PROJECTED_PD_FLOOR: 0.05,
            ENGINE_CATEGORICAL_FLIP_RATE: 0.2,
            ENGINE_KERNEL_WIDTH: 2,
            ENGINE_RIDGE_ALPHA: 0.5,
            ENGINE_MAX_COUNTERFACTUALS: 3
        });
        expect(config).toEqual({
            ...DEFAULT_ENGINE_CONFIG,
            maxImprovementActions: 4,
            maxActionsPerFeature: 1,
            projectedPdFloor: 0.05,
            categoricalFlipRate: 0.2,
            kernelWidth: 2,
            ridgeAlpha: 0.5,
            maxCounterfactuals: 3
        });
    });
});
