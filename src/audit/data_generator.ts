import { ApplicationFeatures, FIELD_SPECS, buildFeatures, fitToRange } from '../engine/feature_schema';
import { RandomSource, mulberry32, pick } from '../utils/random';

export type ApplicantProfile = 'prime' | 'borderline' | 'subprime' | 'flagged';

export const APPLICANT_PROFILES: readonly ApplicantProfile[] = ['prime', 'borderline', 'subprime', 'flagged'];

export interface ExpectedOutcome {
    applicationId: string;
    profile: ApplicantProfile;
    expectBlocked: boolean; // a hard fraud signal was planted
}

export interface SyntheticApplication {
    features: ApplicationFeatures;
    expected: ExpectedOutcome;
}

type Range = readonly [number, number];

interface ProfileRanges {
    age: Range;
    employment_years: Range;
    monthly_income: Range;
    expense_share: Range; // fixed expenses as a share of income
    debt_to_income_ratio: Range;
    savings_balance: Range;
    loan_amount: Range;
    credit_score: Range;
    late_payments_12m: Range;
    missed_payments_12m: Range;
    utility_bill_on_time_ratio: Range;
}

const PROFILE_RANGES: Record<Exclude<ApplicantProfile, 'flagged'>, ProfileRanges> = {
    prime: {
        age: [30, 60],
        employment_years: [5, 20],
        monthly_income: [5000, 9000],
        expense_share: [0.15, 0.3],
        debt_to_income_ratio: [0.05, 0.2],
        savings_balance: [15_000, 60_000],
        loan_amount: [5000, 20_000],
        credit_score: [740, 820],
        late_payments_12m: [0, 0],
        missed_payments_12m: [0, 0],
        utility_bill_on_time_ratio: [0.96, 1]
    },
    borderline: {
        age: [25, 45],
        employment_years: [2, 7],
        monthly_income: [2800, 4200],
        expense_share: [0.3, 0.4],
        debt_to_income_ratio: [0.25, 0.35],
        savings_balance: [4000, 10_000],
        loan_amount: [12_000, 18_000],
        credit_score: [650, 700],
        late_payments_12m: [0, 1],
        missed_payments_12m: [0, 0],
        utility_bill_on_time_ratio: [0.88, 0.97]
    },
    subprime: {
        age: [20, 35],
        employment_years: [0, 2],
        monthly_income: [1500, 2600],
        expense_share: [0.45, 0.7],
        debt_to_income_ratio: [0.45, 0.7],
        savings_balance: [0, 2000],
        loan_amount: [20_000, 40_000],
        credit_score: [520, 600],
        late_payments_12m: [2, 6],
        missed_payments_12m: [1, 3],
        utility_bill_on_time_ratio: [0.6, 0.85]
    }
};

function uniform(rng: RandomSource, [lo, hi]: Range): number {
    return lo + (hi - lo) * rng();
}

export class DataGenerator {
    /**
     * One synthetic application. Deterministic for a given (profile, seed).
     */
    static generateApplication(profile: ApplicantProfile, seed: number, applicationId: string = `synthetic-${profile}-${seed}`): SyntheticApplication {
        const rng = mulberry32(seed);
        const ranges = PROFILE_RANGES[profile === 'flagged' ? 'borderline' : profile];

        const income = uniform(rng, ranges.monthly_income);
        const draws = {
            age: uniform(rng, ranges.age),
            education_level: pick(rng, profile === 'subprime' ? [0, 1] : [1, 2, 3]),
            employment_type: pick(rng, profile === 'subprime' ? [0, 1, 3] : [2, 3]),
            employment_years: uniform(rng, ranges.employment_years),
            monthly_income: Math.round(income),
            fixed_monthly_expenses: Math.round(income * uniform(rng, ranges.expense_share)),
            debt_to_income_ratio: Math.round(uniform(rng, ranges.debt_to_income_ratio) * 100) / 100,
            savings_balance: Math.round(uniform(rng, ranges.savings_balance)),
            loan_amount: Math.round(uniform(rng, ranges.loan_amount) / 500) * 500,
            loan_duration_months: pick(rng, [12, 24, 36, 48, 60]),
            loan_purpose: pick(rng, [0, 1, 2, 3, 4]),
            credit_score: uniform(rng, ranges.credit_score),
            late_payments_12m: uniform(rng, ranges.late_payments_12m),
            missed_payments_12m: uniform(rng, ranges.missed_payments_12m),
            utility_bill_on_time_ratio: Math.round(uniform(rng, ranges.utility_bill_on_time_ratio) * 100) / 100,
            income_inflation_ratio: 1,
            document_mismatch_flag: 0,
            application_velocity: 1,
            geo_location_mismatch: 0,
            metadata_anomaly_score: Math.round(uniform(rng, [0, 0.2]) * 100) / 100
        };

        // Flagged applicants get either a hard signal or a cluster of soft ones
        let expectBlocked = false;
        if (profile === 'flagged') {
            if (rng() < 0.5) {
                draws.document_mismatch_flag = 1;
                expectBlocked = true;
            } else {
                draws.geo_location_mismatch = 1;
                draws.application_velocity = 4;
                draws.income_inflation_ratio = 1.6;
            }
        }

        const features = buildFeatures(id => fitToRange(FIELD_SPECS[id], draws[id]));
        return {
            features,
            expected: { applicationId, profile, expectBlocked }
        };
    }

    static generateBatch(count: number, seed: number = 42): SyntheticApplication[] {
        const batch: SyntheticApplication[] = [];
        for (let i = 0; i < count; i++) {
            const profile = APPLICANT_PROFILES[i % APPLICANT_PROFILES.length];
            batch.push(this.generateApplication(profile, seed * 1000 + i, `synthetic-${String(i).padStart(4, '0')}`));
        }
        return batch;
    }
}
