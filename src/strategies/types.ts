export interface PricePoint {
    date: string; // YYYY-MM-DD
    close: number;
}

/** Ascending by date, closes strictly positive. */
export type PriceSeries = PricePoint[];

export type Signal = 'BUY' | 'SELL' | 'HOLD';

export type RsiSmoothing = 'wilder' | 'ewm';

export interface AnalysisResult {
    date: string;
    close: number;
    rsi: number; // 0 - 100
    signal: Signal;
    ema20?: number;
}

export interface Strategy {
    name: string;
    /** `null` means the strategy found nothing to report this run. */
    analyze(series: PriceSeries): AnalysisResult | null;
}
