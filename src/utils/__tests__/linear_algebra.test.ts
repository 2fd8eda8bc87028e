import { describe, it, expect } from 'vitest';
import { solveLinearSystem, weightedRidgeRegression, weightedVariance } from '../linear_algebra';

describe('linear algebra', () => {
    describe('solveLinearSystem', () => {
        it('solves a well-conditioned system', () => {
            const [x, y] = solveLinearSystem([[2, 1], [1, 3]], [3, 5]);
            expect(x).toBeCloseTo(0.8, 12);
            expect(y).toBeCloseTo(1.4, 12);
        });

        it('pivots on the largest entry', () => {
            const [x, y] = solveLinearSystem([[0, 1], [1, 0]], [4, 7]);
            expect(x).toBeCloseTo(7, 12);
            expect(y).toBeCloseTo(4, 12);
        });

        it('leaves an unknown at zero when its pivot vanishes', () => {
            expect(solveLinearSystem([[1, 1], [1, 1]], [2, 2])).toEqual([2, 0]);
        });

        it('does not modify its inputs', () => {
            const matrix = [[2, 1], [1, 3]];
            const rhs = [3, 5];
            solveLinearSystem(matrix, rhs);
            expect(matrix).toEqual([[2, 1], [1, 3]]);
            expect(rhs).toEqual([3, 5]);
        });
    });

    describe('weightedRidgeRegression', () => {
        const rows = [[0], [1], [2], [3]];
        const targets = [1, 3, 5, 7];
        const weights = [1, 1, 1, 1];

        it('recovers an exact linear fit without penalty', () => {
            const { coefficients, intercept } = weightedRidgeRegression(rows, targets, weights, 0);
            expect(coefficients[0]).toBeCloseTo(2, 12);
            expect(intercept).toBeCloseTo(1, 12);
        });

        it('shrinks the slope but not the intercept', () => {
            const { coefficients, intercept } = weightedRidgeRegression(rows, targets, weights, 10);
            expect(coefficients[0]).toBeCloseTo(2 / 3, 12);
            expect(intercept).toBeCloseTo(3, 12);
        });

        it('ignores rows with zero weight', () => {
            const { coefficients, intercept } = weightedRidgeRegression(
                [...rows, [10]],
                [...targets, -100],
                [...weights, 0],
                0
            );
            expect(coefficients[0]).toBeCloseTo(2, 12);
            expect(intercept).toBeCloseTo(1, 12);
        });

        it('returns zeros when there is no weight', () => {
            expect(weightedRidgeRegression(rows, targets, [0, 0, 0, 0], 1)).toEqual({ coefficients: [0], intercept: 0 });
        });
    });

    describe('weightedVariance', () => {
        it('computes the weighted population variance', () => {
            expect(weightedVariance([1, 3], [1, 1])).toBe(1);
            expect(weightedVariance([1, 3], [3, 1])).toBeCloseTo(0.75, 12);
        });

        it('is zero without weight', () => {
            expect(weightedVariance([1, 3], [0, 0])).toBe(0);
        });
    });
});
