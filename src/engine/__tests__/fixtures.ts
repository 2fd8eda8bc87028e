import type { FeatureId } from '../feature_schema';
import { DecisionContext, DecisionContextOptions, createDecisionContext } from '../decision_context';

/** Credit 680, income 3 500, everything else at the population centre. */
export const NOMINAL_APPLICATION: Readonly<Record<FeatureId, number>> = Object.freeze({
    age: 35,
    education_level: 2,
    employment_type: 2,
    employment_years: 5,
    monthly_income: 3500,
    fixed_monthly_expenses: 1200,
    debt_to_income_ratio: 0.3,
    savings_balance: 8000,
    loan_amount: 15000,
    loan_duration_months: 36,
    loan_purpose: 0,
    credit_score: 680,
    late_payments_12m: 0,
    missed_payments_12m: 0,
    utility_bill_on_time_ratio: 0.95,
    income_inflation_ratio: 1.0,
    document_mismatch_flag: 0,
    application_velocity: 1,
    geo_location_mismatch: 0,
    metadata_anomaly_score: 0.1
});

export function application(overrides: Partial<Record<FeatureId, number>> = {}): Record<FeatureId, number> {
    return { ...NOMINAL_APPLICATION, ...overrides };
}

export function testContext(options: DecisionContextOptions = {}): DecisionContext {
    return createDecisionContext(options);
}
