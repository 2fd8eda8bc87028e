import type { FeatureId } from '../engine/feature_schema';

export type DecisionBand = 'APPROVE' | 'MANUAL_REVIEW' | 'REJECT';
export type RiskDirection = 'increases_risk' | 'decreases_risk';
export type ActionDirection = 'increase' | 'decrease' | 'compensate';
export type Horizon = 'immediate' | 'short_term' | 'long_term';
export type EvaluationStage = 'INITIAL' | 'CLASSIFIED' | 'EXPLAIN' | 'RECOMMEND' | 'DONE';

export interface Prediction {
    probability: number; // 0-1
    band: DecisionBand;
}

export interface Attribution {
    feature_id: FeatureId;
    weight: number; // local PD slope per perturbation spread
    direction: RiskDirection;
    rank: number; // 1-based
}

export type TriggerCondition =
    | { op: 'always' }
    | { op: 'below' | 'above' | 'equals' | 'not_equals'; value: number };

export interface QuestionTemplate {
    id: string;
    template: string;
    follow_up?: string;
    when: TriggerCondition;
}

export interface DocumentTrigger {
    type: string;
    when: TriggerCondition;
}

export interface ImprovementAction {
    id: string;
    description: string;
    direction: ActionDirection;
    horizon: Horizon;
    estimated_pd_delta: number; // reduction in PD when the action is taken
    when: TriggerCondition;
}

export interface KnowledgeRule {
    feature_id: FeatureId;
    explanation_template: string;
    question_templates: readonly QuestionTemplate[];
    document_triggers: readonly DocumentTrigger[];
    improvement_actions: readonly ImprovementAction[];
}

export interface RankedImprovementAction {
    feature_id: FeatureId;
    action_id: string;
    description: string;
    horizon: Horizon;
    estimated_pd_delta: number;
}

export interface PdImprovementEstimate {
    current: number;
    projected: number;
    delta: number;
}

export interface RecommendationBundle {
    explanation_text: string;
    interview_questions: string[];
    documents_needed: string[];
    improvement_actions: RankedImprovementAction[];
    pd_improvement_estimate: PdImprovementEstimate;
}

export type FraudSeverity = 'hard' | 'soft';

export interface FraudFlag {
    name: string;
    severity: FraudSeverity;
    description: string;
}

export interface FraudAssessment {
    decision: 'PASS' | 'BLOCK';
    fraud_score: number; // 0-1
    flags: FraudFlag[];
}

export interface CounterfactualSuggestion {
    feature_id: FeatureId;
    current_value: number;
    proposed_value: number;
    description: string;
    horizon: Horizon;
    projected_probability: number;
    pd_reduction: number; // absolute
    relative_reduction: number; // share of current PD
}

export interface EvaluationDiagnostics {
    stages: EvaluationStage[];
    seed: number | null;
    explanation_degraded: boolean;
    knowledge_misses: FeatureId[];
    model_version: string;
    knowledge_base_version: string;
}

export interface EvaluationResult extends Prediction, RecommendationBundle {
    recommendation: DecisionBand;
    top_attributions: Attribution[];
    counterfactuals: CounterfactualSuggestion[];
    fraud: FraudAssessment;
    diagnostics: EvaluationDiagnostics;
}

export interface DecisionExplanation extends Prediction {
    top_attributions: Attribution[];
    explanation_text: string;
    seed: number;
}
