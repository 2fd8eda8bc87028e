const PIVOT_EPSILON = 1e-12;

/**
 * Solves A·x = b by Gaussian elimination with partial pivoting.
 * Inputs are copied; a numerically singular pivot leaves its unknown at 0.
 */
export function solveLinearSystem(matrix: readonly (readonly number[])[], rhs: readonly number[]): number[] {
    const n = rhs.length;
    const a = matrix.map(row => [...row]);
    const b = [...rhs];

    for (let col = 0; col < n; col++) {
        let pivotRow = col;
        for (let r = col + 1; r < n; r++) {
            if (Math.abs(a[r][col]) > Math.abs(a[pivotRow][col])) pivotRow = r;
        }
        if (Math.abs(a[pivotRow][col]) < PIVOT_EPSILON) continue;

        if (pivotRow !== col) {
            [a[col], a[pivotRow]] = [a[pivotRow], a[col]];
            [b[col], b[pivotRow]] = [b[pivotRow], b[col]];
        }

        for (let r = col + 1; r < n; r++) {
            const factor = a[r][col] / a[col][col];
            if (factor === 0) continue;
            for (let c = col; c < n; c++) a[r][c] -= factor * a[col][c];
            b[r] -= factor * b[col];
        }
    }

    const x = new Array<number>(n).fill(0);
    for (let row = n - 1; row >= 0; row--) {
        if (Math.abs(a[row][row]) < PIVOT_EPSILON) continue;
        let sum = b[row];
        for (let c = row + 1; c < n; c++) sum -= a[row][c] * x[c];
        x[row] = sum / a[row][row];
    }
    return x;
}

export interface WeightedRidgeResult {
    coefficients: number[];
    intercept: number;
}

/**
 * Weighted ridge regression with an unpenalized intercept.
 * Columns and target are centred on their weighted means before solving
 * (XᵀWX + αI)β = XᵀWy.
 */
export function weightedRidgeRegression(
    rows: readonly (readonly number[])[],
    targets: readonly number[],
    weights: readonly number[],
    alpha: number
): WeightedRidgeResult {
    const p = rows.length > 0 ? rows[0].length : 0;
    const totalWeight = weights.reduce((sum, w) => sum + w, 0);
    if (p === 0 || totalWeight <= 0) {
        return { coefficients: new Array<number>(p).fill(0), intercept: 0 };
    }

    const xMean = new Array<number>(p).fill(0);
    let yMean = 0;
    rows.forEach((row, i) => {
        for (let j = 0; j < p; j++) xMean[j] += weights[i] * row[j];
        yMean += weights[i] * targets[i];
    });
    for (let j = 0; j < p; j++) xMean[j] /= totalWeight;
    yMean /= totalWeight;

    const gram = Array.from({ length: p }, () => new Array<number>(p).fill(0));
    const moment = new Array<number>(p).fill(0);
    rows.forEach((row, i) => {
        const w = weights[i];
        const yc = targets[i] - yMean;
        for (let j = 0; j < p; j++) {
            const xj = row[j] - xMean[j];
            moment[j] += w * xj * yc;
            for (let k = j; k < p; k++) gram[j][k] += w * xj * (row[k] - xMean[k]);
        }
    });
    for (let j = 0; j < p; j++) {
        for (let k = 0; k < j; k++) gram[j][k] = gram[k][j];
        gram[j][j] += alpha;
    }

    const coefficients = solveLinearSystem(gram, moment);
    const intercept = yMean - coefficients.reduce((sum, c, j) => sum + c * xMean[j], 0);
    return { coefficients, intercept };
}

export function weightedVariance(values: readonly number[], weights: readonly number[]): number {
    const totalWeight = weights.reduce((sum, w) => sum + w, 0);
    if (totalWeight <= 0) return 0;
    const mean = values.reduce((sum, v, i) => sum + weights[i] * v, 0) / totalWeight;
    return values.reduce((sum, v, i) => sum + weights[i] * (v - mean) ** 2, 0) / totalWeight;
}
