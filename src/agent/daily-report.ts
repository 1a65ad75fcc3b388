import { AppConfig, StrategyName } from '../config';
import { BarFetcher } from '../data/yahoo';
import { normalizePriceSeries } from '../data/normalizer';
import { Notifier, DeliveryOutcome } from '../notify/telegram';
import { AnalysisResult, RsiSmoothing, Strategy } from '../strategies/types';
import { RsiMomentumStrategy } from '../strategies/rsi-momentum';
import { EmaRsiCrossoverStrategy } from '../strategies/ema-crossover';

export interface ReportDeps {
    fetcher: BarFetcher;
    notifier: Notifier;
}

export type ReportOutcome =
    | { kind: 'signal'; result: AnalysisResult; delivery: DeliveryOutcome }
    | { kind: 'suppressed'; result: AnalysisResult }
    | { kind: 'no-signal'; delivery: DeliveryOutcome };

const STACK_TAIL = 800;

export function createStrategy(name: StrategyName, smoothing: RsiSmoothing): Strategy {
    switch (name) {
        case 'rsi':
            return new RsiMomentumStrategy(smoothing);
        case 'ema-rsi-crossover':
            return new EmaRsiCrossoverStrategy(smoothing);
    }
}

export function formatSummary(label: string, result: AnalysisResult): string {
    const lines = [
        `📈 ${label} summary ${result.date}`,
        `Close: ${result.close.toFixed(2)}`,
        `RSI(14): ${result.rsi.toFixed(1)}`,
    ];
    if (result.ema20 !== undefined) {
        lines.push(`EMA20: ${result.ema20.toFixed(2)}`);
    }
    lines.push(`Signal: ${result.signal}`);
    return lines.join('\n');
}

export function formatNoSignal(label: string): string {
    return `📝 No new ${label} signal this run.`;
}

export function formatError(error: unknown): string {
    if (!(error instanceof Error)) {
        return `❗Bot error: ${String(error)}`;
    }
    const head = `❗Bot error: ${error.message}`;
    return error.stack ? `${head}\n${error.stack.slice(-STACK_TAIL)}` : head;
}

/**
 * One run: fetch, normalise, analyse, notify. A failure before delivery is
 * reported through the notifier (best effort) and then re-thrown.
 */
export async function runDailyReport(config: AppConfig, deps: ReportDeps): Promise<ReportOutcome> {
    const { market, policy } = config;
    try {
        const table = await deps.fetcher.fetchBars(market.ticker, market.period, market.interval);
        const series = normalizePriceSeries(table, { ticker: market.ticker });
        const strategy = createStrategy(policy.strategy, policy.rsiSmoothing);
        console.log(`🧠 ${strategy.name} over ${series.length} closes (${series[0].date} → ${series[series.length - 1].date})`);

        const result = strategy.analyze(series);
        if (!result) {
            const delivery = await deps.notifier.send(formatNoSignal(market.label));
            return { kind: 'no-signal', delivery };
        }

        if (policy.suppressHold && result.signal === 'HOLD') {
            console.log(`💤 HOLD on ${result.date} (RSI ${result.rsi.toFixed(1)}); notification suppressed.`);
            return { kind: 'suppressed', result };
        }

        const delivery = await deps.notifier.send(formatSummary(market.label, result));
        return { kind: 'signal', result, delivery };
    } catch (error) {
        await deps.notifier.send(formatError(error));
        throw error;
    }
}
