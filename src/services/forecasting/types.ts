/**
 * Shared types for the category forecasting engine.
 */

/** Calendar day as `YYYY-MM-DD` */
export type DateKey = string;

/** One recorded sale aggregate; immutable once stored */
export interface SalesPoint {
    date: DateKey;
    category: string;
    amount: number;
}

/** Dense per-date form: every category recorded for the date */
export interface DailySalesRow {
    date: DateKey;
    values: Record<string, number>;
}

export type ProvenanceTag = 'historical' | 'predicted';

export interface TaggedSalesRow extends DailySalesRow {
    provenance: ProvenanceTag;
}

/** Inclusive date range; `start <= end` always holds */
export interface Period {
    start: DateKey;
    end: DateKey;
    days: number;
}

/** Ordered feature names the predictor was trained on */
export type FeatureManifest = readonly string[];

/** One inference row, positionally aligned with the FeatureManifest */
export interface FeatureVector {
    date: DateKey;
    values: number[];
}

export interface CategoryTotal {
    category: string;
    amount: number;
    percentage: number;
}

export interface RankedCategory extends CategoryTotal {
    amountFormatted: string;
    percentageFormatted: string;
}

export interface Ranking {
    totalAmount: number;
    totalAmountFormatted: string;
    topCategories: RankedCategory[];
}

export interface DataQuality {
    historicalPoints: number;
    predictedPoints: number;
    /** Dates in the period that are neither recorded nor predicted */
    missingPoints: number;
    completenessPct: number;
    failedChunks: number;
}

/** Growth is undefined when the baseline is zero and current is positive */
export type GrowthRate =
    | { kind: 'finite'; percentage: number }
    | { kind: 'infinite' };

export interface ModelInfo {
    modelType: string;
    trainingDate: string;
    featureCount: number;
    description: string;
    isLoaded: boolean;
}

export type AnswerSource = 'forecast' | 'reconciled' | 'historical';

export interface DegradedNotice {
    reason: 'model_unavailable' | 'prediction_failed';
    message: string;
}

export interface CategoryAnswer extends Ranking {
    period: Period;
    source: AnswerSource;
    dataQuality: DataQuality;
    degraded?: DegradedNotice;
    modelInfo?: ModelInfo;
    historical?: CategoryAnswer;
    growth?: GrowthRate;
}

/** Per-date per-category predictions, in chronological order */
export type DailyForecast = DailySalesRow[];

/**
 * Source of recorded sales. Rows come back ascending by date with
 * no duplicates; dates without sales are simply absent.
 */
export interface HistoricalStore {
    getRange(start: DateKey, end: DateKey): Promise<DailySalesRow[]>;
    listCategories(): Promise<string[]>;
}

/**
 * Trained regression model. Input columns must match the manifest order;
 * each output row maps positionally onto `targets`.
 */
export interface Predictor {
    readonly targets: readonly string[];
    predict(matrix: number[][]): Promise<number[][]>;
}

/** Produces daily predictions for a contiguous date range */
export interface DailyForecaster {
    forecastDaily(start: DateKey, end: DateKey): Promise<DailyForecast>;
}
