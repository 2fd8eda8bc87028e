import {
    ApplicationFeatures,
    FIELD_SPECS,
    FeatureId,
    fitToRange,
    formatFieldValue,
    withFeature
} from './feature_schema';
import type { PredictFn } from './explanation_engine';
import type { CounterfactualSuggestion, Horizon } from '../types/decision_types';

interface FeatureTweak {
    featureId: FeatureId;
    horizon: Horizon;
    apply: (current: number) => number;
    describe: (current: number, proposed: number) => string;
}

const MIN_RELATIVE_REDUCTION = 0.001;

const amount = (id: FeatureId, value: number) => formatFieldValue(id, Math.abs(value));

const TWEAKS: readonly FeatureTweak[] = [
    {
        featureId: 'monthly_income',
        horizon: 'long_term',
        apply: v => v * 1.15,
        describe: (v, p) => `Increase verified monthly income by ${amount('monthly_income', p - v)}`
    },
    {
        featureId: 'fixed_monthly_expenses',
        horizon: 'short_term',
        apply: v => v * 0.8,
        describe: (v, p) => `Reduce fixed monthly expenses by ${amount('fixed_monthly_expenses', v - p)}`
    },
    {
        featureId: 'savings_balance',
        horizon: 'long_term',
        apply: v => v * 1.25,
        describe: (v, p) => `Increase savings balance by ${amount('savings_balance', p - v)}`
    },
    {
        featureId: 'employment_years',
        horizon: 'long_term',
        apply: v => v + 2,
        describe: (v, p) => `Maintain stable employment for ${amount('employment_years', p - v)} more years`
    },
    {
        featureId: 'credit_score',
        horizon: 'short_term',
        apply: v => v + 50,
        describe: (v, p) => `Improve credit score by ${amount('credit_score', p - v)} points`
    },
    {
        featureId: 'utility_bill_on_time_ratio',
        horizon: 'short_term',
        apply: () => 0.98,
        describe: (v, p) => `Pay ${formatFieldValue('utility_bill_on_time_ratio', p)} of utility bills on time (currently ${formatFieldValue('utility_bill_on_time_ratio', v)})`
    },
    {
        featureId: 'loan_amount',
        horizon: 'immediate',
        apply: v => v * 0.85,
        describe: (v, p) => `Reduce the requested loan by ${amount('loan_amount', v - p)}`
    },
    {
        featureId: 'loan_duration_months',
        horizon: 'immediate',
        apply: v => v * 0.8,
        describe: (v, p) => `Choose a shorter loan term (${amount('loan_duration_months', v - p)} months less)`
    },
    {
        featureId: 'debt_to_income_ratio',
        horizon: 'short_term',
        apply: v => v * 0.85,
        describe: (v, p) => `Lower the debt-to-income ratio from ${formatFieldValue('debt_to_income_ratio', v)} to ${formatFieldValue('debt_to_income_ratio', p)}`
    }
];

/**
 * Single-feature what-if analysis: re-scores the application with one realistic
 * change at a time and keeps the changes that lower the default probability.
 */
export function suggestImprovements(
    features: ApplicationFeatures,
    predictFn: PredictFn,
    maxSuggestions: number
): CounterfactualSuggestion[] {
    const baseline = predictFn(features);
    if (baseline <= 0 || maxSuggestions <= 0) return [];

    const suggestions: CounterfactualSuggestion[] = [];
    for (const tweak of TWEAKS) {
        const current = features[tweak.featureId];
        const proposed = fitToRange(FIELD_SPECS[tweak.featureId], tweak.apply(current));
        if (proposed === current) continue;

        const projected = predictFn(withFeature(features, tweak.featureId, proposed));
        const reduction = baseline - projected;
        const relative = reduction / baseline;
        if (relative <= MIN_RELATIVE_REDUCTION) continue;

        suggestions.push({
            feature_id: tweak.featureId,
            current_value: current,
            proposed_value: proposed,
            description: tweak.describe(current, proposed),
            horizon: tweak.horizon,
            projected_probability: projected,
            pd_reduction: reduction,
            relative_reduction: relative
        });
    }

    return suggestions
        .sort((a, b) => b.relative_reduction - a.relative_reduction)
        .slice(0, maxSuggestions);
}
