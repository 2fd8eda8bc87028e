export const FEATURE_IDS = [
    'age',
    'education_level',
    'employment_type',
    'employment_years',
    'monthly_income',
    'fixed_monthly_expenses',
    'debt_to_income_ratio',
    'savings_balance',
    'loan_amount',
    'loan_duration_months',
    'loan_purpose',
    'credit_score',
    'late_payments_12m',
    'missed_payments_12m',
    'utility_bill_on_time_ratio',
    'income_inflation_ratio',
    'document_mismatch_flag',
    'application_velocity',
    'geo_location_mismatch',
    'metadata_anomaly_score'
] as const;

export type FeatureId = typeof FEATURE_IDS[number];

/**
 * One application, one value per model feature. Categorical fields carry their integer code.
 */
export type ApplicationFeatures = Readonly<Record<FeatureId, number>>;

export type OutOfRangePolicy = 'clip' | 'reject';
export type DisplayFormat = 'currency' | 'percent' | 'integer' | 'decimal' | 'category';

interface BaseFieldSpec {
    label: string;
    display: DisplayFormat;
}

export interface NumericFieldSpec extends BaseFieldSpec {
    kind: 'continuous' | 'count';
    min: number;
    max: number;
    spread: number; // perturbation std-dev used by the explanation sampler
    outOfRange: OutOfRangePolicy;
}

export interface CategoricalFieldSpec extends BaseFieldSpec {
    kind: 'categorical';
    categories: readonly { code: number; label: string }[];
}

export type FieldSpec = NumericFieldSpec | CategoricalFieldSpec;

const BINARY_FLAG = [
    { code: 0, label: 'no' },
    { code: 1, label: 'yes' }
] as const;

export const FIELD_SPECS: Readonly<Record<FeatureId, FieldSpec>> = Object.freeze({
    age: { label: 'Age', kind: 'count', min: 18, max: 100, spread: 10, outOfRange: 'reject', display: 'integer' },
    education_level: {
        label: 'Education level',
        kind: 'categorical',
        display: 'category',
        categories: [
            { code: 0, label: 'no degree' },
            { code: 1, label: 'high school' },
            { code: 2, label: 'bachelor' },
            { code: 3, label: 'master or above' }
        ]
    },
    employment_type: {
        label: 'Employment type',
        kind: 'categorical',
        display: 'category',
        categories: [
            { code: 0, label: 'unemployed' },
            { code: 1, label: 'part-time' },
            { code: 2, label: 'full-time' },
            { code: 3, label: 'self-employed' }
        ]
    },
    employment_years: { label: 'Years in current employment', kind: 'continuous', min: 0, max: 60, spread: 4, outOfRange: 'clip', display: 'decimal' },
    monthly_income: { label: 'Monthly income', kind: 'continuous', min: 0, max: 1_000_000, spread: 2000, outOfRange: 'reject', display: 'currency' },
    fixed_monthly_expenses: { label: 'Fixed monthly expenses', kind: 'continuous', min: 0, max: 1_000_000, spread: 800, outOfRange: 'reject', display: 'currency' },
    debt_to_income_ratio: { label: 'Debt-to-income ratio', kind: 'continuous', min: 0, max: 5, spread: 0.15, outOfRange: 'clip', display: 'decimal' },
    savings_balance: { label: 'Savings balance', kind: 'continuous', min: 0, max: 100_000_000, spread: 10_000, outOfRange: 'clip', display: 'currency' },
    loan_amount: { label: 'Requested loan amount', kind: 'continuous', min: 0, max: 100_000_000, spread: 15_000, outOfRange: 'reject', display: 'currency' },
    loan_duration_months: { label: 'Loan duration (months)', kind: 'count', min: 1, max: 480, spread: 18, outOfRange: 'reject', display: 'integer' },
    loan_purpose: {
        label: 'Loan purpose',
        kind: 'categorical',
        display: 'category',
        categories: [
            { code: 0, label: 'personal' },
            { code: 1, label: 'business' },
            { code: 2, label: 'education' },
            { code: 3, label: 'home' },
            { code: 4, label: 'vehicle' }
        ]
    },
    credit_score: { label: 'Credit score', kind: 'count', min: 300, max: 850, spread: 80, outOfRange: 'reject', display: 'integer' },
    late_payments_12m: { label: 'Late payments (12 months)', kind: 'count', min: 0, max: 52, spread: 2, outOfRange: 'clip', display: 'integer' },
    missed_payments_12m: { label: 'Missed payments (12 months)', kind: 'count', min: 0, max: 12, spread: 1, outOfRange: 'clip', display: 'integer' },
    utility_bill_on_time_ratio: { label: 'Utility bills paid on time', kind: 'continuous', min: 0, max: 1, spread: 0.1, outOfRange: 'clip', display: 'percent' },
    income_inflation_ratio: { label: 'Declared vs expected income', kind: 'continuous', min: 0, max: 10, spread: 0.25, outOfRange: 'clip', display: 'decimal' },
    document_mismatch_flag: { label: 'Document mismatch', kind: 'categorical', display: 'category', categories: BINARY_FLAG },
    application_velocity: { label: 'Recent applications', kind: 'count', min: 0, max: 50, spread: 2, outOfRange: 'clip', display: 'integer' },
    geo_location_mismatch: { label: 'Location mismatch', kind: 'categorical', display: 'category', categories: BINARY_FLAG },
    metadata_anomaly_score: { label: 'Metadata anomaly score', kind: 'continuous', min: 0, max: 1, spread: 0.2, outOfRange: 'clip', display: 'decimal' }
});

/**
 * Builds a complete per-feature record from an accessor, so every producer
 * of feature vectors (validation, perturbation, what-if tweaks) stays exhaustive.
 */
export function mapFeatures<T>(valueOf: (id: FeatureId) => T): Record<FeatureId, T> {
    return {
        age: valueOf('age'),
        education_level: valueOf('education_level'),
        employment_type: valueOf('employment_type'),
        employment_years: valueOf('employment_years'),
        monthly_income: valueOf('monthly_income'),
        fixed_monthly_expenses: valueOf('fixed_monthly_expenses'),
        debt_to_income_ratio: valueOf('debt_to_income_ratio'),
        savings_balance: valueOf('savings_balance'),
        loan_amount: valueOf('loan_amount'),
        loan_duration_months: valueOf('loan_duration_months'),
        loan_purpose: valueOf('loan_purpose'),
        credit_score: valueOf('credit_score'),
        late_payments_12m: valueOf('late_payments_12m'),
        missed_payments_12m: valueOf('missed_payments_12m'),
        utility_bill_on_time_ratio: valueOf('utility_bill_on_time_ratio'),
        income_inflation_ratio: valueOf('income_inflation_ratio'),
        document_mismatch_flag: valueOf('document_mismatch_flag'),
        application_velocity: valueOf('application_velocity'),
        geo_location_mismatch: valueOf('geo_location_mismatch'),
        metadata_anomaly_score: valueOf('metadata_anomaly_score')
    };
}

export function buildFeatures(valueOf: (id: FeatureId) => number): ApplicationFeatures {
    return mapFeatures(valueOf);
}

export function withFeature(features: ApplicationFeatures, id: FeatureId, value: number): ApplicationFeatures {
    return buildFeatures(f => (f === id ? value : features[f]));
}

export function isFeatureId(value: string): value is FeatureId {
    return FEATURE_IDS.some(id => id === value);
}

/**
 * Clamps a numeric value into the field's range, rounding counts. Categorical values pass through.
 */
export function fitToRange(spec: FieldSpec, value: number): number {
    if (spec.kind === 'categorical') return value;
    const clamped = Math.max(spec.min, Math.min(spec.max, value));
    return spec.kind === 'count' ? Math.round(clamped) : clamped;
}

export function formatFieldValue(id: FeatureId, value: number): string {
    const spec = FIELD_SPECS[id];
    switch (spec.display) {
        case 'currency':
            return Math.round(value).toLocaleString('en-US');
        case 'percent':
            return `${Math.round(value * 100)}%`;
        case 'integer':
            return String(Math.round(value));
        case 'decimal':
            return String(Math.round(value * 100) / 100);
        case 'category': {
            if (spec.kind !== 'categorical') return String(value);
            const category = spec.categories.find(c => c.code === value);
            return category ? category.label : String(value);
        }
    }
}
