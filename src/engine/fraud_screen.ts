import type { ApplicationFeatures } from './feature_schema';
import type { FraudAssessment, FraudFlag, FraudSeverity } from '../types/decision_types';

interface FraudRule {
    name: string;
    severity: FraudSeverity;
    weight: number;
    description: string;
    test: (f: ApplicationFeatures) => boolean;
}

// Hard rules block the application outright; soft rules only add to the score.
const FRAUD_RULES: readonly FraudRule[] = [
    {
        name: 'document_mismatch',
        severity: 'hard',
        weight: 0.35,
        description: 'Submitted documents disagree with each other',
        test: f => f.document_mismatch_flag === 1
    },
    {
        name: 'metadata_anomaly_high',
        severity: 'hard',
        weight: 0.35,
        description: 'Submission metadata is highly anomalous',
        test: f => f.metadata_anomaly_score >= 0.8
    },
    {
        name: 'income_inflation_extreme',
        severity: 'hard',
        weight: 0.35,
        description: 'Declared income is at least 2.5x the expected income',
        test: f => f.income_inflation_ratio >= 2.5
    },
    {
        name: 'geo_location_mismatch',
        severity: 'soft',
        weight: 0.15,
        description: 'Location information is inconsistent',
        test: f => f.geo_location_mismatch === 1
    },
    {
        name: 'expenses_gt_income',
        severity: 'soft',
        weight: 0.15,
        description: 'Fixed expenses exceed monthly income',
        test: f => f.monthly_income > 0 && f.fixed_monthly_expenses > f.monthly_income
    },
    {
        name: 'rapid_multiple_applications',
        severity: 'soft',
        weight: 0.15,
        description: 'Several credit applications in a short period',
        test: f => f.application_velocity >= 3
    },
    {
        name: 'many_missed_payments_12m',
        severity: 'soft',
        weight: 0.12,
        description: 'Three or more missed payments in the last 12 months',
        test: f => f.missed_payments_12m >= 3
    },
    {
        name: 'low_utility_on_time_ratio',
        severity: 'soft',
        weight: 0.12,
        description: 'Fewer than 30% of utility bills paid on time',
        test: f => f.utility_bill_on_time_ratio < 0.3
    },
    {
        name: 'income_inflation_moderate',
        severity: 'soft',
        weight: 0.12,
        description: 'Declared income is 1.5-2.5x the expected income',
        test: f => f.income_inflation_ratio >= 1.5 && f.income_inflation_ratio < 2.5
    }
];

/**
 * Rule-based screen over the fraud and behaviour signals of a validated application.
 */
export function screenForFraud(features: ApplicationFeatures): FraudAssessment {
    const hits = FRAUD_RULES.filter(rule => rule.test(features));
    const flags: FraudFlag[] = hits.map(rule => ({
        name: rule.name,
        severity: rule.severity,
        description: rule.description
    }));
    const rawScore = hits.reduce((sum, rule) => sum + rule.weight, 0);

    return {
        decision: flags.some(flag => flag.severity === 'hard') ? 'BLOCK' : 'PASS',
        fraud_score: Math.round(Math.min(rawScore, 1) * 1000) / 1000,
        flags
    };
}
