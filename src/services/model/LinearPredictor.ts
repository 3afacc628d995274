import type { Predictor } from '../forecasting/types';

/**
 * Multi-output linear regression: one intercept and one coefficient row
 * per target category.
 */
export class LinearPredictor implements Predictor {
    readonly targets: readonly string[];
    private readonly intercepts: readonly number[];
    private readonly coefficients: readonly (readonly number[])[];

    constructor(params: {
        targets: string[];
        intercepts: number[];
        coefficients: number[][];
    }) {
        const { targets, intercepts, coefficients } = params;
        if (intercepts.length !== targets.length || coefficients.length !== targets.length) {
            throw new Error(
                `Model shape mismatch: ${targets.length} targets, ${intercepts.length} intercepts, ${coefficients.length} coefficient rows`
            );
        }
        const width = coefficients[0]?.length ?? 0;
        if (coefficients.some((row) => row.length !== width)) {
            throw new Error('Model coefficient rows have different lengths');
        }

        this.targets = Object.freeze([...targets]);
        this.intercepts = Object.freeze([...intercepts]);
        this.coefficients = Object.freeze(coefficients.map((row) => Object.freeze([...row])));
    }

    get featureCount(): number {
        return this.coefficients[0]?.length ?? 0;
    }

    async predict(matrix: number[][]): Promise<number[][]> {
        return matrix.map((features) => {
            if (features.length !== this.featureCount) {
                throw new Error(`Expected ${this.featureCount} features, got ${features.length}`);
            }
            return this.coefficients.map((weights, t) =>
                weights.reduce((sum, weight, j) => sum + weight * features[j], this.intercepts[t])
            );
        });
    }
}
