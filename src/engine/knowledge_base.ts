import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { FEATURE_IDS, FeatureId, isFeatureId } from './feature_schema';
import { ConfigurationError } from './errors';
import { deepFreeze } from '../utils/freeze';
import type { KnowledgeRule, QuestionTemplate, TriggerCondition } from '../types/decision_types';

export const DEFAULT_KNOWLEDGE_BASE_PATH = path.resolve(__dirname, '../../data/knowledge_base.json');

const ALWAYS: TriggerCondition = { op: 'always' };

const conditionSchema = z.union([
    z.object({ op: z.literal('always') }),
    z.object({
        op: z.enum(['below', 'above', 'equals', 'not_equals']),
        value: z.number().finite()
    })
]);

const questionSchema = z.object({
    id: z.string().min(1),
    template: z.string().min(1),
    follow_up: z.string().min(1).optional(),
    when: conditionSchema.default(ALWAYS)
});

const ruleSchema = z.object({
    explanation_template: z.string().min(1),
    question_templates: z.array(questionSchema),
    document_triggers: z.array(z.object({
        type: z.string().min(1),
        when: conditionSchema.default(ALWAYS)
    })),
    improvement_actions: z.array(z.object({
        id: z.string().min(1),
        description: z.string().min(1),
        direction: z.enum(['increase', 'decrease', 'compensate']),
        horizon: z.enum(['immediate', 'short_term', 'long_term']),
        estimated_pd_delta: z.number().min(0).max(1),
        when: conditionSchema.default(ALWAYS)
    }))
}).refine(r => new Set(r.improvement_actions.map(a => a.id)).size === r.improvement_actions.length, {
    message: 'action ids must be unique within a rule',
    path: ['improvement_actions']
});

const knowledgeBaseSchema = z.object({
    version: z.string().min(1),
    fraud_verification: questionSchema,
    rules: z.record(z.string(), ruleSchema)
});

export function conditionHolds(condition: TriggerCondition, value: number): boolean {
    switch (condition.op) {
        case 'always':
            return true;
        case 'below':
            return value < condition.value;
        case 'above':
            return value > condition.value;
        case 'equals':
            return value === condition.value;
        case 'not_equals':
            return value !== condition.value;
    }
}

/**
 * Read-only rule tables keyed by feature id. Built once per process and
 * shared by every evaluation; nothing handed out can be mutated.
 */
export class KnowledgeBase {
    private readonly rules: ReadonlyMap<FeatureId, KnowledgeRule>;

    constructor(
        public readonly version: string,
        rules: readonly KnowledgeRule[],
        public readonly fraudVerification: Readonly<QuestionTemplate>
    ) {
        this.rules = new Map(rules.map((rule): [FeatureId, KnowledgeRule] => [rule.feature_id, deepFreeze(rule)]));
        deepFreeze(this.fraudVerification);
        Object.freeze(this);
    }

    /** A miss is not an error: callers decide how to report it. */
    public lookup(featureId: string): KnowledgeRule | undefined {
        return isFeatureId(featureId) ? this.rules.get(featureId) : undefined;
    }

    public entries(): KnowledgeRule[] {
        return FEATURE_IDS.flatMap(id => {
            const rule = this.rules.get(id);
            return rule ? [rule] : [];
        });
    }

    public get size(): number {
        return this.rules.size;
    }
}

export function createKnowledgeBase(raw: unknown): KnowledgeBase {
    const parsed = knowledgeBaseSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(
            'Invalid knowledge base',
            parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
        );
    }

    const unknownKeys = Object.keys(parsed.data.rules).filter(key => !isFeatureId(key));
    if (unknownKeys.length > 0) {
        throw new ConfigurationError('Knowledge base has rules for unknown features', unknownKeys);
    }

    const rules: KnowledgeRule[] = [];
    for (const id of FEATURE_IDS) {
        const rule = parsed.data.rules[id];
        if (rule) rules.push({ feature_id: id, ...rule });
    }
    return new KnowledgeBase(parsed.data.version, rules, parsed.data.fraud_verification);
}

export function loadKnowledgeBase(filePath: string = DEFAULT_KNOWLEDGE_BASE_PATH): KnowledgeBase {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (e) {
        throw new ConfigurationError(`Could not read knowledge base at ${filePath}`, [String(e)]);
    }
    const knowledgeBase = createKnowledgeBase(raw);
    console.log(`[Knowledge-Base] Loaded ${knowledgeBase.size} rules (${knowledgeBase.version}) from ${filePath}`);
    return knowledgeBase;
}
