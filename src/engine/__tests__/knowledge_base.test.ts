import { describe, it, expect } from 'vitest';
import { conditionHolds, createKnowledgeBase, loadKnowledgeBase } from '../knowledge_base';
import { ConfigurationError } from '../errors';
import { FEATURE_IDS } from '../feature_schema';

const minimalRule = {
    explanation_template: 'credit score of {value}',
    question_templates: [{ id: 'q1', template: 'Why {value}?' }],
    document_triggers: [{ type: 'Credit report' }],
    improvement_actions: [
        { id: 'a1', description: 'Pay on time', direction: 'increase', horizon: 'long_term', estimated_pd_delta: 0.02 }
    ]
};

const fraudVerification = { id: 'fraud_verification', template: 'Verify {flags}' };

describe('Knowledge Base', () => {
    const knowledgeBase = loadKnowledgeBase();

    it('loads one rule per feature', () => {
        expect(knowledgeBase.version).toBe('kb-2025.06');
        expect(knowledgeBase.size).toBe(20);
        expect(knowledgeBase.entries().map(r => r.feature_id)).toEqual([...FEATURE_IDS]);
    });

    it('returns undefined for unknown features', () => {
        expect(knowledgeBase.lookup('shoe_size')).toBeUndefined();
        expect(knowledgeBase.lookup('credit_score')?.feature_id).toBe('credit_score');
    });

    it('is deeply frozen', () => {
        const rule = knowledgeBase.lookup('credit_score');
        expect(rule).toBeDefined();
        if (!rule) return;
        expect(Object.isFrozen(rule)).toBe(true);
        expect(Object.isFrozen(rule.question_templates)).toBe(true);
        expect(Object.isFrozen(rule.improvement_actions[0])).toBe(true);
        expect(Object.isFrozen(knowledgeBase)).toBe(true);
    });

    it('defaults missing activation conditions to always', () => {
        const rule = knowledgeBase.lookup('credit_score');
        expect(rule?.question_templates[0].when).toEqual({ op: 'always' });
        expect(rule?.document_triggers[0]).toEqual({ type: 'Credit report', when: { op: 'always' } });
    });

    it('carries only actions with a positive PD effect', () => {
        for (const rule of knowledgeBase.entries()) {
            expect(rule.improvement_actions.length).toBeGreaterThan(0);
            for (const action of rule.improvement_actions) expect(action.estimated_pd_delta).toBeGreaterThan(0);
        }
    });

    it('shares the income documentation question between income and inflation rules', () => {
        const ids = (id: string) => knowledgeBase.lookup(id)?.question_templates.map(q => q.id) ?? [];
        expect(ids('monthly_income')).toContain('income_documentation');
        expect(ids('income_inflation_ratio')).toContain('income_documentation');
    });

    describe('createKnowledgeBase', () => {
        it('builds a partial table', () => {
            const kb = createKnowledgeBase({
                version: 'test',
                fraud_verification: fraudVerification,
                rules: { credit_score: minimalRule }
            });
            expect(kb.size).toBe(1);
            expect(kb.lookup('monthly_income')).toBeUndefined();
            expect(kb.fraudVerification.template).toBe('Verify {flags}');
        });

        it('rejects rules for unknown features', () => {
            expect(() => createKnowledgeBase({
                version: 'test',
                fraud_verification: fraudVerification,
                rules: { salary: minimalRule }
            })).toThrowError('Knowledge base has rules for unknown features: salary');
        });

        it('rejects negative PD deltas', () => {
            const badRule = {
                ...minimalRule,
                improvement_actions: [{ ...minimalRule.improvement_actions[0], estimated_pd_delta: -0.01 }]
            };
            expect(() => createKnowledgeBase({
                version: 'test',
                fraud_verification: fraudVerification,
                rules: { credit_score: badRule }
            })).toThrowError(ConfigurationError);
        });

        it('rejects duplicate action ids within a rule', () => {
            const dupRule = {
                ...minimalRule,
                improvement_actions: [minimalRule.improvement_actions[0], minimalRule.improvement_actions[0]]
            };
            expect(() => createKnowledgeBase({
                version: 'test',
                fraud_verification: fraudVerification,
                rules: { credit_score: dupRule }
            })).toThrowError('action ids must be unique within a rule');
        });

        it('fails on an unreadable file', () => {
            expect(() => loadKnowledgeBase('/nonexistent/kb.json')).toThrowError(ConfigurationError);
        });
    });

    describe('conditionHolds', () => {
        it.each([
            [{ op: 'always' } as const, 0, true],
            [{ op: 'below', value: 650 } as const, 600, true],
            [{ op: 'below', value: 650 } as const, 650, false],
            [{ op: 'above', value: 0 } as const, 1, true],
            [{ op: 'above', value: 0 } as const, 0, false],
            [{ op: 'equals', value: 1 } as const, 1, true],
            [{ op: 'not_equals', value: 2 } as const, 2, false]
        ])('%o with %d -> %s', (condition, value, expected) => {
            expect(conditionHolds(condition, value)).toBe(expected);
        });
    });
});
