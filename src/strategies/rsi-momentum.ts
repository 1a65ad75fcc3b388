import { AnalysisResult, PriceSeries, RsiSmoothing, Signal, Strategy } from './types';
import { Indicators } from './indicators';
import { InsufficientDataError } from '../errors';

export const RSI_PERIOD = 14;
export const MIN_ROWS = RSI_PERIOD + 1;
export const OVERSOLD = 30;
export const OVERBOUGHT = 70;

export function classifyRsi(rsi: number): Signal {
    if (rsi < OVERSOLD) return 'BUY';
    if (rsi > OVERBOUGHT) return 'SELL';
    return 'HOLD';
}

export function assertEnoughRows(series: PriceSeries): void {
    if (series.length < MIN_ROWS) {
        throw new InsufficientDataError(series.length, MIN_ROWS);
    }
}

/** RSI(14) at the last row, classified oversold / overbought / neutral. */
export function analyzeRsi(series: PriceSeries, smoothing: RsiSmoothing = 'wilder'): AnalysisResult {
    assertEnoughRows(series);

    const rsiValues = Indicators.rsiSeries(series.map((p) => p.close), RSI_PERIOD, smoothing);
    const last = series[series.length - 1];
    const rsi = rsiValues[rsiValues.length - 1];
    if (rsi === undefined) {
        throw new InsufficientDataError(series.length, MIN_ROWS);
    }

    return { date: last.date, close: last.close, rsi, signal: classifyRsi(rsi) };
}

export class RsiMomentumStrategy implements Strategy {
    name = 'RSI(14) Momentum';

    constructor(private readonly smoothing: RsiSmoothing = 'wilder') {}

    analyze(series: PriceSeries): AnalysisResult {
        return analyzeRsi(series, this.smoothing);
    }
}
