import { AnalysisResult, PriceSeries, RsiSmoothing, Strategy } from './types';
import { Indicators } from './indicators';
import { RSI_PERIOD, assertEnoughRows } from './rsi-momentum';

export const EMA_PERIOD = 20;

/**
 * EMA20 crossover filtered by RSI(14).
 * BUY  when price crosses above EMA20 with RSI in 30-50.
 * SELL when price crosses below EMA20 with RSI > 70.
 * Reports the most recent crossover in the window, or null.
 */
export class EmaRsiCrossoverStrategy implements Strategy {
    name = 'EMA20 Crossover + RSI Filter';

    constructor(private readonly smoothing: RsiSmoothing = 'wilder') {}

    analyze(series: PriceSeries): AnalysisResult | null {
        assertEnoughRows(series);

        const closes = series.map((p) => p.close);
        const ema = Indicators.emaSeries(closes, EMA_PERIOD);
        const rsiValues = Indicators.rsiSeries(closes, RSI_PERIOD, this.smoothing);

        let found: AnalysisResult | null = null;
        for (let i = 1; i < series.length; i++) {
            const rsi = rsiValues[i];
            if (rsi === undefined) continue;

            const c = closes[i];
            const p = closes[i - 1];
            const e = ema[i];
            const ep = ema[i - 1];
            const up = p < ep && c > e;
            const down = p > ep && c < e;

            if (up && rsi >= 30 && rsi <= 50) {
                found = { date: series[i].date, close: c, rsi, signal: 'BUY', ema20: e };
            } else if (down && rsi > 70) {
                found = { date: series[i].date, close: c, rsi, signal: 'SELL', ema20: e };
            }
        }
        return found;
    }
}
