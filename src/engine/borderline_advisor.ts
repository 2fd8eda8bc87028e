import { ApplicationFeatures, FEATURE_IDS, FIELD_SPECS, FeatureId, formatFieldValue } from './feature_schema';
import { explain } from './explanation_engine';
import { conditionHolds, KnowledgeBase } from './knowledge_base';
import { screenForFraud } from './fraud_screen';
import { suggestImprovements } from './counterfactual_engine';
import type { DecisionContext } from './decision_context';
import type { EngineConfig } from '../config/engine_config';
import type {
    Attribution,
    DecisionBand,
    DecisionExplanation,
    EvaluationResult,
    EvaluationStage,
    FraudAssessment,
    Horizon,
    ImprovementAction,
    KnowledgeRule,
    PdImprovementEstimate,
    RankedImprovementAction,
    RecommendationBundle
} from '../types/decision_types';
import { deepFreeze } from '../utils/freeze';

const BAND_LABELS: Record<DecisionBand, string> = {
    APPROVE: 'approve',
    MANUAL_REVIEW: 'manual review',
    REJECT: 'reject'
};

const BAND_PHRASES: Record<DecisionBand, string> = {
    APPROVE: 'is approvable',
    MANUAL_REVIEW: 'needs manual review',
    REJECT: 'falls in the reject band'
};

const HORIZON_ORDER: Record<Horizon, number> = {
    immediate: 0,
    short_term: 1,
    long_term: 2
};

export interface EvaluateOptions {
    seed?: number;
    /** Attach attributions to clear-cut APPROVE / REJECT results too. */
    explain?: boolean;
}

export interface ExplainDecisionOptions {
    seed?: number;
    k?: number;
}

export interface BundleInput {
    features: ApplicationFeatures;
    probability: number;
    band: DecisionBand;
    attributions: readonly Attribution[];
    fraud: FraudAssessment;
}

export interface AssembledBundle {
    bundle: RecommendationBundle;
    knowledgeMisses: FeatureId[];
    degraded: boolean;
}

type BundleConfig = Pick<EngineConfig,
    | 'significanceThreshold'
    | 'maxQuestions'
    | 'maxDocuments'
    | 'maxImprovementActions'
    | 'maxActionsPerFeature'
    | 'decayFactor'
    | 'projectedPdFloor'>;

interface ExplainedAttribution {
    attribution: Attribution;
    rule: KnowledgeRule;
}

interface ActionCandidate extends RankedImprovementAction {
    featureRank: number;
}

const percent = (p: number) => `${(p * 100).toFixed(1)}%`;

export function classifyBand(
    probability: number,
    thresholds: Pick<EngineConfig, 'approveThreshold' | 'rejectThreshold'>
): DecisionBand {
    if (probability < thresholds.approveThreshold) return 'APPROVE';
    if (probability >= thresholds.rejectThreshold) return 'REJECT';
    return 'MANUAL_REVIEW';
}

export function selectSignificant(attributions: readonly Attribution[], threshold: number): Attribution[] {
    return attributions.filter(a => Math.abs(a.weight) > threshold);
}

/**
 * A categorical value only drives the recommendation when holding it raises the
 * risk; a favourable category (no mismatch, full-time employment) is never cited.
 */
export function isRiskDriver(attribution: Attribution): boolean {
    return FIELD_SPECS[attribution.feature_id].kind !== 'categorical' || attribution.weight > 0;
}

export function selectDrivers(attributions: readonly Attribution[], threshold: number): Attribution[] {
    return selectSignificant(attributions, threshold).filter(isRiskDriver);
}

/** The strongest `k` risk drivers, re-ranked from 1. */
export function topDrivers(ranked: readonly Attribution[], k: number): Attribution[] {
    return ranked
        .filter(isRiskDriver)
        .slice(0, Math.max(0, k))
        .map((attribution, index) => ({ ...attribution, rank: index + 1 }));
}

function fillPlaceholders(template: string, values: Readonly<Record<string, string>>): string {
    return template.replace(/\{(\w+)\}/g, (match, key: string) => (key in values ? values[key] : match));
}

function fieldPlaceholders(featureId: FeatureId, value: number, band: DecisionBand): Record<string, string> {
    return {
        value: formatFieldValue(featureId, value),
        label: FIELD_SPECS[featureId].label.toLowerCase(),
        band: BAND_LABELS[band]
    };
}

function actionReducesRisk(action: ImprovementAction, weight: number): boolean {
    switch (action.direction) {
        case 'compensate':
            return true;
        case 'increase':
            return weight < 0;
        case 'decrease':
            return weight > 0;
    }
}

/**
 * Cumulative projected PD: deltas are applied in the given order, the n-th
 * discounted by decay^n. The total improvement stops at the floor, and never
 * exceeds the current probability.
 */
export function estimatePdImprovement(
    current: number,
    deltas: readonly number[],
    decayFactor: number,
    floor: number
): PdImprovementEstimate {
    const applied = deltas
        .filter(d => d > 0)
        .reduce((sum, d, n) => sum + d * Math.pow(decayFactor, n), 0);
    const headroom = current - Math.min(current, floor);
    const improvement = Math.min(applied, headroom);
    return {
        current,
        projected: current - improvement,
        delta: improvement
    };
}

function rankActions(candidates: readonly ActionCandidate[], max: number): RankedImprovementAction[] {
    return [...candidates]
        .sort((a, b) =>
            HORIZON_ORDER[a.horizon] - HORIZON_ORDER[b.horizon]
            || b.estimated_pd_delta - a.estimated_pd_delta
            || a.featureRank - b.featureRank
            || (a.action_id < b.action_id ? -1 : a.action_id > b.action_id ? 1 : 0))
        .slice(0, max)
        .map(({ feature_id, action_id, description, horizon, estimated_pd_delta }) => ({
            feature_id,
            action_id,
            description,
            horizon,
            estimated_pd_delta
        }));
}

function explanationText(explained: readonly ExplainedAttribution[], features: ApplicationFeatures, band: DecisionBand): string {
    const reasons = explained.slice(0, 2).map(({ attribution, rule }) =>
        fillPlaceholders(rule.explanation_template, fieldPlaceholders(attribution.feature_id, features[attribution.feature_id], band))
    );
    const phrase = BAND_PHRASES[band];
    if (reasons.length === 2) return `This application ${phrase} mainly because of ${reasons[0]} and ${reasons[1]}.`;
    if (reasons.length === 1) return `This application ${phrase} primarily because of ${reasons[0]}.`;
    return `This application ${phrase}; no specific guidance is available for its main risk drivers.`;
}

function genericExplanation(band: DecisionBand): string {
    return `This application ${BAND_PHRASES[band]}; the local explanation found no dominant risk driver.`;
}

function lookupRules(
    attributions: readonly Attribution[],
    knowledgeBase: KnowledgeBase
): { explained: ExplainedAttribution[]; misses: FeatureId[] } {
    const explained: ExplainedAttribution[] = [];
    const misses: FeatureId[] = [];
    for (const attribution of attributions) {
        const rule = knowledgeBase.lookup(attribution.feature_id);
        if (rule) {
            explained.push({ attribution, rule });
        } else {
            console.debug(`[Borderline-Advisor] No knowledge rule for ${attribution.feature_id}, skipping`);
            misses.push(attribution.feature_id);
        }
    }
    return { explained, misses };
}

/**
 * Builds the recommendation bundle for a borderline application from its
 * ranked attributions. Rules are consulted in attribution rank order, so on
 * duplicate questions or documents the higher-ranked feature wins.
 */
export function assembleBundle(input: BundleInput, knowledgeBase: KnowledgeBase, config: BundleConfig): AssembledBundle {
    const { features, probability, band, fraud } = input;
    const significant = selectDrivers(input.attributions, config.significanceThreshold);

    if (significant.length === 0) {
        return {
            bundle: {
                explanation_text: genericExplanation(band),
                interview_questions: [],
                documents_needed: [],
                improvement_actions: [],
                pd_improvement_estimate: { current: probability, projected: probability, delta: 0 }
            },
            knowledgeMisses: [],
            degraded: true
        };
    }

    const { explained, misses } = lookupRules(significant, knowledgeBase);

    // Questions
    const questions = new Map<string, string>();
    if (fraud.flags.length > 0) {
        const template = knowledgeBase.fraudVerification;
        const flags = fraud.flags.map(f => f.description.charAt(0).toLowerCase() + f.description.slice(1)).join('; ');
        const text = fillPlaceholders(template.template, { flags, band: BAND_LABELS[band] });
        questions.set(template.id, template.follow_up ? `${text} ${template.follow_up}` : text);
    }
    for (const { attribution, rule } of explained) {
        const value = features[attribution.feature_id];
        for (const question of rule.question_templates) {
            if (questions.has(question.id) || !conditionHolds(question.when, value)) continue;
            const text = fillPlaceholders(question.template, fieldPlaceholders(attribution.feature_id, value, band));
            questions.set(question.id, question.follow_up ? `${text} ${question.follow_up}` : text);
        }
    }

    // Documents
    const documents = new Set<string>();
    for (const { attribution, rule } of explained) {
        const value = features[attribution.feature_id];
        for (const trigger of rule.document_triggers) {
            if (conditionHolds(trigger.when, value)) documents.add(trigger.type);
        }
    }

    // Actions: per feature, the strongest risk-reducing candidates
    const seenActions = new Set<string>();
    const candidates: ActionCandidate[] = [];
    for (const { attribution, rule } of explained) {
        const value = features[attribution.feature_id];
        const eligible = rule.improvement_actions
            .filter(a => !seenActions.has(a.id) && conditionHolds(a.when, value) && actionReducesRisk(a, attribution.weight))
            .sort((a, b) => b.estimated_pd_delta - a.estimated_pd_delta)
            .slice(0, config.maxActionsPerFeature);
        for (const action of eligible) {
            seenActions.add(action.id);
            candidates.push({
                feature_id: attribution.feature_id,
                action_id: action.id,
                description: action.description,
                horizon: action.horizon,
                estimated_pd_delta: action.estimated_pd_delta,
                featureRank: attribution.rank
            });
        }
    }
    const actions = rankActions(candidates, config.maxImprovementActions);

    return {
        bundle: {
            explanation_text: explanationText(explained, features, band),
            interview_questions: [...questions.values()].slice(0, config.maxQuestions),
            documents_needed: [...documents].slice(0, config.maxDocuments),
            improvement_actions: actions,
            pd_improvement_estimate: estimatePdImprovement(
                probability,
                actions.map(a => a.estimated_pd_delta),
                config.decayFactor,
                config.projectedPdFloor
            )
        },
        knowledgeMisses: misses,
        degraded: false
    };
}

function clearCutSummary(band: DecisionBand, probability: number): string {
    return band === 'APPROVE'
        ? `Approved with low estimated risk (PD ${percent(probability)}).`
        : `Rejected: estimated default risk of ${percent(probability)} is at or above the review limit.`;
}

function fraudPreamble(fraud: FraudAssessment): string {
    const hard = fraud.flags.filter(f => f.severity === 'hard').map(f => f.name);
    return `Hard fraud signals (${hard.join(', ')}) block this application; rejection is recommended.`;
}

/**
 * Turns one application into a decision: band, and for borderline cases the full
 * recommendation bundle. Holds only the shared read-only context, so a single
 * instance serves concurrent requests.
 */
export class BorderlineAdvisor {
    constructor(private readonly context: DecisionContext) { }

    private explainFeatures(features: ApplicationFeatures, k: number, seed: number): Attribution[] {
        const { classifier, config } = this.context;
        return explain(features, f => classifier.score(f), k, seed, {
            sampleCount: config.sampleCount,
            categoricalFlipRate: config.categoricalFlipRate,
            kernelWidth: config.kernelWidth,
            ridgeAlpha: config.ridgeAlpha
        });
    }

    public evaluate(raw: unknown, options: EvaluateOptions = {}): Readonly<EvaluationResult> {
        const { classifier, config, knowledgeBase } = this.context;
        const stages: EvaluationStage[] = ['INITIAL'];

        const features = classifier.validate(raw);
        const probability = classifier.score(features);
        const band = classifyBand(probability, config);
        stages.push('CLASSIFIED');

        const fraud = screenForFraud(features);
        const recommendation: DecisionBand = fraud.decision === 'BLOCK' ? 'REJECT' : band;
        if (fraud.flags.length > 0) {
            console.warn(`[Borderline-Advisor] Fraud screen ${fraud.decision} (score ${fraud.fraud_score}): ${fraud.flags.map(f => f.name).join(', ')}`);
        }

        const seed = options.seed ?? config.defaultSeed;
        const diagnostics = {
            model_version: classifier.modelVersion,
            knowledge_base_version: knowledgeBase.version
        };

        if (band !== 'MANUAL_REVIEW') {
            const attributions = options.explain
                ? selectSignificant(topDrivers(this.explainFeatures(features, FEATURE_IDS.length, seed), config.topK), config.significanceThreshold)
                : [];
            stages.push('DONE');
            const summary = clearCutSummary(band, probability);
            return deepFreeze({
                probability,
                band,
                recommendation,
                top_attributions: attributions,
                explanation_text: fraud.decision === 'BLOCK' && band !== 'REJECT' ? `${fraudPreamble(fraud)} ${summary}` : summary,
                interview_questions: [],
                documents_needed: [],
                improvement_actions: [],
                pd_improvement_estimate: { current: probability, projected: probability, delta: 0 },
                counterfactuals: [],
                fraud,
                diagnostics: {
                    ...diagnostics,
                    stages,
                    seed: options.explain ? seed : null,
                    explanation_degraded: false,
                    knowledge_misses: []
                }
            });
        }

        stages.push('EXPLAIN');
        const attributions = topDrivers(this.explainFeatures(features, FEATURE_IDS.length, seed), config.topK);

        stages.push('RECOMMEND');
        const { bundle, knowledgeMisses, degraded } = assembleBundle(
            { features, probability, band, attributions, fraud },
            knowledgeBase,
            config
        );
        const counterfactuals = suggestImprovements(features, f => classifier.score(f), config.maxCounterfactuals);
        stages.push('DONE');

        console.log(
            `[Borderline-Advisor] PD ${percent(probability)}: ${bundle.interview_questions.length} questions, ` +
            `${bundle.documents_needed.length} documents, ${bundle.improvement_actions.length} actions` +
            (degraded ? ' (degraded)' : '')
        );

        return deepFreeze({
            probability,
            band,
            recommendation,
            top_attributions: selectSignificant(attributions, config.significanceThreshold),
            ...bundle,
            explanation_text: fraud.decision === 'BLOCK' ? `${fraudPreamble(fraud)} ${bundle.explanation_text}` : bundle.explanation_text,
            counterfactuals,
            fraud,
            diagnostics: {
                ...diagnostics,
                stages,
                seed,
                explanation_degraded: degraded,
                knowledge_misses: knowledgeMisses
            }
        });
    }

    /**
     * On-demand explanation for any band, for audit. Returns the top-k attributions
     * unfiltered; the text uses the risk drivers among them that clear the
     * significance threshold.
     */
    public explainDecision(raw: unknown, options: ExplainDecisionOptions = {}): Readonly<DecisionExplanation> {
        const { classifier, config, knowledgeBase } = this.context;
        const features = classifier.validate(raw);
        const probability = classifier.score(features);
        const band = classifyBand(probability, config);
        const seed = options.seed ?? config.defaultSeed;

        const attributions = this.explainFeatures(features, options.k ?? config.topK, seed);
        const significant = selectDrivers(attributions, config.significanceThreshold);
        const { explained } = lookupRules(significant, knowledgeBase);

        return deepFreeze({
            probability,
            band,
            top_attributions: attributions,
            explanation_text: significant.length === 0 ? genericExplanation(band) : explanationText(explained, features, band),
            seed
        });
    }
}
