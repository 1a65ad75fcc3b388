import { RsiSmoothing } from './types';

export class Indicators {
    /**
     * Exponential Moving Average, one value per input.
     * Seeded with the first value, alpha = 2 / (period + 1).
     */
    static emaSeries(data: number[], period: number): number[] {
        if (data.length === 0) return [];
        const k = 2 / (period + 1);
        const result: number[] = [data[0]];

        for (let i = 1; i < data.length; i++) {
            const prev = result[result.length - 1];
            result.push(data[i] * k + prev * (1 - k));
        }
        return result;
    }

    /**
     * Relative Strength Index, aligned with `data`: the first `period` slots are
     * `undefined` since there are not yet `period` price changes behind them.
     */
    static rsiSeries(data: number[], period: number = 14, smoothing: RsiSmoothing = 'wilder'): Array<number | undefined> {
        const result: Array<number | undefined> = new Array(data.length).fill(undefined);
        if (data.length < period + 1) return result;

        // Prevent divide by zero
        const calcRSI = (g: number, l: number) => {
            if (l === 0) return 100;
            if (g === 0) return 0;
            const rs = g / l;
            return 100 - (100 / (1 + rs));
        };

        let avgGain = 0;
        let avgLoss = 0;
        let start: number;

        if (smoothing === 'wilder') {
            let gains = 0;
            let losses = 0;
            for (let i = 1; i <= period; i++) {
                const change = data[i] - data[i - 1];
                if (change > 0) gains += change;
                else losses += Math.abs(change);
            }
            avgGain = gains / period;
            avgLoss = losses / period;
            result[period] = calcRSI(avgGain, avgLoss);
            start = period + 1;
        } else {
            // ewm: alpha = 1/period, the first row contributes a zero change
            start = 1;
        }

        for (let i = start; i < data.length; i++) {
            const change = data[i] - data[i - 1];
            const gain = change > 0 ? change : 0;
            const loss = change < 0 ? Math.abs(change) : 0;

            avgGain = (avgGain * (period - 1) + gain) / period;
            avgLoss = (avgLoss * (period - 1) + loss) / period;

            if (i >= period) {
                result[i] = calcRSI(avgGain, avgLoss);
            }
        }

        return result;
    }
}
