import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
    ApplicationFeatures,
    FEATURE_IDS,
    FIELD_SPECS,
    FeatureId,
    FieldSpec,
    buildFeatures
} from './feature_schema';
import { ConfigurationError, FieldIssue, ValidationError } from './errors';
import { deepFreeze, isRecord } from '../utils/freeze';

export const DEFAULT_MODEL_PATH = path.resolve(__dirname, '../../data/credit_model.json');

/**
 * An already-trained model scoring a validated feature vector.
 */
export interface ProbabilityModel {
    readonly version: string;
    predictProbability(features: ApplicationFeatures): number;
}

const modelArtifactSchema = z.object({
    version: z.string().min(1),
    intercept: z.number().finite(),
    features: z.array(z.object({
        id: z.enum(FEATURE_IDS),
        mean: z.number().finite(),
        scale: z.number().positive(),
        coefficient: z.number().finite()
    })).min(1)
}).refine(a => new Set(a.features.map(f => f.id)).size === a.features.length, {
    message: 'each feature may appear only once',
    path: ['features']
});

export type ModelArtifact = z.infer<typeof modelArtifactSchema>;

/**
 * Logistic regression over standard-scaled features: the scaler statistics and
 * coefficients travel together in one artifact, so scaling is always consistent
 * with the fit.
 */
export class LogisticCreditModel implements ProbabilityModel {
    public readonly version: string;
    private readonly artifact: Readonly<ModelArtifact>;

    constructor(artifact: ModelArtifact) {
        this.artifact = deepFreeze(artifact);
        this.version = artifact.version;
    }

    public static fromArtifact(raw: unknown): LogisticCreditModel {
        const parsed = modelArtifactSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ConfigurationError(
                'Invalid model artifact',
                parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
            );
        }
        return new LogisticCreditModel(parsed.data);
    }

    public logit(features: ApplicationFeatures): number {
        return this.artifact.features.reduce(
            (sum, f) => sum + f.coefficient * ((features[f.id] - f.mean) / f.scale),
            this.artifact.intercept
        );
    }

    public predictProbability(features: ApplicationFeatures): number {
        return 1 / (1 + Math.exp(-this.logit(features)));
    }
}

export function loadCreditModel(filePath: string = DEFAULT_MODEL_PATH): LogisticCreditModel {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (e) {
        throw new ConfigurationError(`Could not read model artifact at ${filePath}`, [String(e)]);
    }
    const model = LogisticCreditModel.fromArtifact(raw);
    console.log(`[Classifier] Loaded model ${model.version} from ${filePath}`);
    return model;
}

function fieldSchema(spec: FieldSpec): z.ZodType<number> {
    const base = z.number({
        required_error: 'required field is missing',
        invalid_type_error: 'must be a number'
    }).finite();

    if (spec.kind === 'categorical') {
        const codes = spec.categories.map(c => c.code);
        return base.int().refine(v => codes.includes(v), {
            message: `must be one of ${codes.join(', ')}`
        });
    }

    const typed = spec.kind === 'count' ? base.int() : base;
    if (spec.outOfRange === 'reject') {
        return typed
            .min(spec.min, `must be at least ${spec.min}`)
            .max(spec.max, `must be at most ${spec.max}`);
    }
    return typed.transform(v => Math.max(spec.min, Math.min(spec.max, v)));
}

const FIELD_VALIDATORS: Readonly<Record<FeatureId, z.ZodType<number>>> = Object.freeze(
    buildValidators()
);

function buildValidators(): Record<FeatureId, z.ZodType<number>> {
    const validatorFor = (id: FeatureId) => fieldSchema(FIELD_SPECS[id]);
    return {
        age: validatorFor('age'),
        education_level: validatorFor('education_level'),
        employment_type: validatorFor('employment_type'),
        employment_years: validatorFor('employment_years'),
        monthly_income: validatorFor('monthly_income'),
        fixed_monthly_expenses: validatorFor('fixed_monthly_expenses'),
        debt_to_income_ratio: validatorFor('debt_to_income_ratio'),
        savings_balance: validatorFor('savings_balance'),
        loan_amount: validatorFor('loan_amount'),
        loan_duration_months: validatorFor('loan_duration_months'),
        loan_purpose: validatorFor('loan_purpose'),
        credit_score: validatorFor('credit_score'),
        late_payments_12m: validatorFor('late_payments_12m'),
        missed_payments_12m: validatorFor('missed_payments_12m'),
        utility_bill_on_time_ratio: validatorFor('utility_bill_on_time_ratio'),
        income_inflation_ratio: validatorFor('income_inflation_ratio'),
        document_mismatch_flag: validatorFor('document_mismatch_flag'),
        application_velocity: validatorFor('application_velocity'),
        geo_location_mismatch: validatorFor('geo_location_mismatch'),
        metadata_anomaly_score: validatorFor('metadata_anomaly_score')
    };
}

/**
 * Checks every required field and applies each field's out-of-range policy.
 * All problems of the record are collected before failing.
 */
export function validateApplicationFeatures(raw: unknown): ApplicationFeatures {
    if (!isRecord(raw)) {
        throw new ValidationError([{ field: '(record)', message: 'application must be an object' }]);
    }

    const issues: FieldIssue[] = [];
    const values = new Map<FeatureId, number>();
    for (const id of FEATURE_IDS) {
        const result = FIELD_VALIDATORS[id].safeParse(raw[id]);
        if (result.success) {
            values.set(id, result.data);
        } else {
            for (const issue of result.error.issues) issues.push({ field: id, message: issue.message });
        }
    }

    if (issues.length > 0) throw new ValidationError(issues);
    return Object.freeze(buildFeatures(id => values.get(id) ?? Number.NaN));
}

/**
 * Single entry point to the trained model: validate, normalize, score.
 * Holds no mutable state; safe to share across concurrent evaluations.
 */
export class ClassifierAdapter {
    constructor(private readonly model: ProbabilityModel) { }

    public get modelVersion(): string {
        return this.model.version;
    }

    public validate(raw: unknown): ApplicationFeatures {
        return validateApplicationFeatures(raw);
    }

    public predict(raw: unknown): number {
        return this.score(this.validate(raw));
    }

    /**
     * Scores a record that already went through validate(). Used on the explanation
     * hot path, where every neighbour is built in range.
     */
    public score(features: ApplicationFeatures): number {
        const probability = this.model.predictProbability(features);
        if (!Number.isFinite(probability)) {
            throw new Error(`Model ${this.model.version} produced a non-finite probability`);
        }
        return Math.max(0, Math.min(1, probability));
    }
}
