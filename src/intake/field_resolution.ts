import { FEATURE_IDS, FeatureId, isFeatureId, mapFeatures } from '../engine/feature_schema';

export type FieldSource = 'extracted' | 'user' | 'default' | 'missing';

export type FieldValues = Readonly<Record<string, unknown>>;

export interface FieldResolutionInput {
    /** Values read from uploaded documents. Highest priority. */
    extracted?: FieldValues;
    /** Values the applicant typed in. */
    userSupplied?: FieldValues;
    defaults?: Readonly<Partial<Record<FeatureId, number>>>;
}

export interface ResolvedFields {
    /** Merged raw record, still unvalidated. Missing fields are absent. */
    values: Record<string, unknown>;
    sources: Record<FeatureId, FieldSource>;
    /** Keys that are neither model features nor `_`-prefixed metadata. */
    unknownFields: string[];
}

/**
 * Only behavioural and fraud signals have a declared fallback; applicant
 * financials must come from a document or the applicant.
 */
export const DECLARED_DEFAULTS: Readonly<Partial<Record<FeatureId, number>>> = Object.freeze({
    document_mismatch_flag: 0,
    geo_location_mismatch: 0,
    metadata_anomaly_score: 0,
    application_velocity: 1,
    income_inflation_ratio: 1.0,
    late_payments_12m: 0,
    missed_payments_12m: 0
});

/**
 * Numeric strings ("3,500", " 680 ") become numbers; anything else is left for
 * the classifier's validation to report.
 */
export function coerceNumeric(value: unknown): unknown {
    if (typeof value !== 'string') return value;
    const cleaned = value.trim().replace(/,/g, '');
    if (cleaned === '') return undefined;
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : value;
}

function present(source: FieldValues | undefined, id: FeatureId): unknown {
    if (!source || !Object.prototype.hasOwnProperty.call(source, id)) return undefined;
    const value = coerceNumeric(source[id]);
    return value === null ? undefined : value;
}

/**
 * Three-tier override resolution, per field:
 * extracted document value > user-supplied value > declared default.
 * `null` and `undefined` count as absent at every tier.
 */
export function resolveApplicationFields(input: FieldResolutionInput): ResolvedFields {
    const defaults = input.defaults ?? DECLARED_DEFAULTS;
    const resolved = mapFeatures((id): { value: unknown; source: FieldSource } => {
        const extracted = present(input.extracted, id);
        if (extracted !== undefined) return { value: extracted, source: 'extracted' };
        const user = present(input.userSupplied, id);
        if (user !== undefined) return { value: user, source: 'user' };
        const fallback = defaults[id];
        if (fallback !== undefined) return { value: fallback, source: 'default' };
        return { value: undefined, source: 'missing' };
    });

    const values: Record<string, unknown> = {};
    for (const id of FEATURE_IDS) {
        if (resolved[id].source !== 'missing') values[id] = resolved[id].value;
    }
    const sources = mapFeatures(id => resolved[id].source);

    const unknownFields = [...new Set([
        ...Object.keys(input.extracted ?? {}),
        ...Object.keys(input.userSupplied ?? {})
    ])].filter(key => !key.startsWith('_') && !isFeatureId(key));

    return { values, sources, unknownFields };
}
