import {
    ApplicationFeatures,
    FEATURE_IDS,
    FIELD_SPECS,
    FeatureId,
    FieldSpec,
    buildFeatures,
    fitToRange
} from './feature_schema';
import type { Attribution } from '../types/decision_types';
import { RandomSource, mulberry32, pick, randn } from '../utils/random';
import { weightedRidgeRegression, weightedVariance } from '../utils/linear_algebra';

export type PredictFn = (features: ApplicationFeatures) => number;

export interface ExplanationOptions {
    sampleCount: number;
    categoricalFlipRate: number;
    kernelWidth: number | null;
    ridgeAlpha: number;
}

export const DEFAULT_EXPLANATION_OPTIONS: Readonly<ExplanationOptions> = Object.freeze({
    sampleCount: 500,
    categoricalFlipRate: 0.3,
    kernelWidth: null,
    ridgeAlpha: 1
});

const ZERO_VARIANCE_EPSILON = 1e-12;

function perturbValue(spec: FieldSpec, original: number, rng: RandomSource, flipRate: number): number {
    if (spec.kind === 'categorical') {
        const alternatives = spec.categories.map(c => c.code).filter(code => code !== original);
        if (alternatives.length === 0 || rng() >= flipRate) return original;
        return pick(rng, alternatives);
    }
    return fitToRange(spec, original + randn(rng) * spec.spread);
}

/**
 * Design-matrix coordinate of a neighbour value relative to the instance.
 * Numeric: displacement in spreads. Categorical: 1 when switched away, so the
 * fitted slope is the effect of leaving the current category (see explain).
 */
function designValue(spec: FieldSpec, original: number, value: number): number {
    if (spec.kind === 'categorical') return value === original ? 0 : 1;
    return (value - original) / spec.spread;
}

export function rankAttributions(weights: ReadonlyMap<FeatureId, number>): Attribution[] {
    return [...weights.entries()]
        .sort(([idA, wA], [idB, wB]) => {
            const byMagnitude = Math.abs(wB) - Math.abs(wA);
            if (byMagnitude !== 0) return byMagnitude;
            return idA < idB ? -1 : idA > idB ? 1 : 0;
        })
        .map(([featureId, weight], index): Attribution => ({
            feature_id: featureId,
            weight,
            direction: weight > 0 ? 'increases_risk' : 'decreases_risk',
            rank: index + 1
        }));
}

/**
 * Local surrogate explanation around one application.
 *
 * Samples `sampleCount` neighbours (the instance itself first), scores them with
 * `predictFn`, weights them by proximity and fits a ridge model whose slopes become
 * the attribution weights. The generator is created from `seed` inside the call,
 * so identical inputs give identical output regardless of what runs alongside.
 * Features that never vary in the neighbourhood are left out of the fit and
 * reported with weight 0.
 *
 * Numeric weights are the PD slope per field spread. Categorical weights are the
 * effect of holding the current category rather than switching away from it:
 * positive when the applicant's own value raises the risk.
 */
export function explain(
    features: ApplicationFeatures,
    predictFn: PredictFn,
    k: number,
    seed: number,
    options: Partial<ExplanationOptions> = {}
): Attribution[] {
    const { sampleCount, categoricalFlipRate, kernelWidth, ridgeAlpha } = { ...DEFAULT_EXPLANATION_OPTIONS, ...options };
    const rng = mulberry32(seed);

    const design: number[][] = [];
    const targets: number[] = [];

    design.push(FEATURE_IDS.map(() => 0));
    targets.push(predictFn(features));

    for (let s = 1; s < sampleCount; s++) {
        const neighbour = buildFeatures(id => perturbValue(FIELD_SPECS[id], features[id], rng, categoricalFlipRate));
        design.push(FEATURE_IDS.map(id => designValue(FIELD_SPECS[id], features[id], neighbour[id])));
        targets.push(predictFn(neighbour));
    }

    const width = kernelWidth ?? 0.75 * Math.sqrt(FEATURE_IDS.length);
    const weights = design.map(row => {
        const distanceSq = row.reduce((sum, v) => sum + v * v, 0);
        return Math.sqrt(Math.exp(-distanceSq / (width * width)));
    });

    const activeColumns: number[] = [];
    FEATURE_IDS.forEach((_, j) => {
        const column = design.map(row => row[j]);
        if (weightedVariance(column, weights) > ZERO_VARIANCE_EPSILON) activeColumns.push(j);
    });

    const fit = weightedRidgeRegression(
        design.map(row => activeColumns.map(j => row[j])),
        targets,
        weights,
        ridgeAlpha
    );

    const attributionWeights = new Map<FeatureId, number>(FEATURE_IDS.map((id): [FeatureId, number] => [id, 0]));
    activeColumns.forEach((j, idx) => {
        const id = FEATURE_IDS[j];
        const slope = fit.coefficients[idx];
        attributionWeights.set(id, FIELD_SPECS[id].kind === 'categorical' ? -slope : slope);
    });

    return rankAttributions(attributionWeights).slice(0, Math.max(0, k));
}
