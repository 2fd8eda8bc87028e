import { describe, it, expect } from 'vitest';
import { evaluateRequestSchema, explainRequestSchema } from '../request_schema';

describe('Request schemas', () => {
    const application = { credit_score: 680 };

    it('accepts an evaluate request with optional seed and explain flag', () => {
        const parsed = evaluateRequestSchema.safeParse({ application, seed: 3, explain: true });
        expect(parsed.success).toBe(true);
        if (parsed.success) expect(parsed.data).toEqual({ application, seed: 3, explain: true });
    });

    it('requires the application object', () => {
        expect(evaluateRequestSchema.safeParse({ seed: 3 }).success).toBe(false);
        expect(evaluateRequestSchema.safeParse({ application: [680] }).success).toBe(false);
    });

    it('rejects negative or fractional seeds', () => {
        expect(evaluateRequestSchema.safeParse({ application, seed: -1 }).success).toBe(false);
        expect(evaluateRequestSchema.safeParse({ application, seed: 1.5 }).success).toBe(false);
    });

    it('rejects a non-boolean explain flag', () => {
        expect(evaluateRequestSchema.safeParse({ application, explain: 'yes' }).success).toBe(false);
    });

    it('bounds k by the feature count', () => {
        expect(explainRequestSchema.safeParse({ application, k: 0 }).success).toBe(false);
        expect(explainRequestSchema.safeParse({ application, k: 20 }).success).toBe(true);
        expect(explainRequestSchema.safeParse({ application, k: 21 }).success).toBe(false);
    });
});
