import { HttpClient, defaultHttpClient, describeHttpError } from '../http';
import { RawCell, RawColumn, RawTable, flat } from './table';
import { DataUnavailableError } from '../errors';

export interface YahooChartOptions {
    baseUrl?: string;
    timeoutMs?: number;
    /** Replace Close with the adjusted close and rescale Open/High/Low to match. */
    autoAdjust?: boolean;
}

export interface BarFetcher {
    fetchBars(ticker: string, period: string, interval: string): Promise<RawTable>;
}

export interface ChartQuote {
    open: RawCell[];
    high: RawCell[];
    low: RawCell[];
    close: RawCell[];
    volume: RawCell[];
}

export interface ChartResult {
    symbol: string;
    gmtoffset: number;
    /** Entries the provider left unreadable stay as `null` so every column keeps its row positions. */
    timestamp: Array<number | null>;
    quote: ChartQuote;
    adjclose?: RawCell[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cells(value: unknown): RawCell[] {
    if (!Array.isArray(value)) return [];
    return value.map((v): RawCell => (typeof v === 'number' || typeof v === 'string' ? v : null));
}

function first(value: unknown): Record<string, unknown> | undefined {
    if (!Array.isArray(value)) return undefined;
    const head: unknown = value[0];
    return isRecord(head) ? head : undefined;
}

/**
 * Pulls the first result out of a `/v8/finance/chart` payload.
 * Throws DataUnavailableError for the provider's error envelope or a shape we do not know.
 */
export function parseChartPayload(ticker: string, payload: unknown): ChartResult {
    const chart = isRecord(payload) ? payload.chart : undefined;
    if (!isRecord(chart)) {
        throw new DataUnavailableError(`Malformed chart payload for ${ticker}`);
    }
    if (isRecord(chart.error)) {
        const { code, description } = chart.error;
        throw new DataUnavailableError(`Provider error for ${ticker}: ${String(code)} ${String(description)}`);
    }

    const result = first(chart.result);
    if (!result) {
        throw new DataUnavailableError(`No data for ${ticker}`);
    }

    const meta: Record<string, unknown> = isRecord(result.meta) ? result.meta : {};
    const timestamp = Array.isArray(result.timestamp)
        ? result.timestamp.map((t): number | null => (typeof t === 'number' && Number.isFinite(t) ? t : null))
        : [];
    const indicators: Record<string, unknown> = isRecord(result.indicators) ? result.indicators : {};
    const quote: Record<string, unknown> = first(indicators.quote) ?? {};
    const adj = first(indicators.adjclose);

    return {
        symbol: typeof meta.symbol === 'string' ? meta.symbol : ticker,
        gmtoffset: typeof meta.gmtoffset === 'number' ? meta.gmtoffset : 0,
        timestamp,
        quote: {
            open: cells(quote.open),
            high: cells(quote.high),
            low: cells(quote.low),
            close: cells(quote.close),
            volume: cells(quote.volume),
        },
        adjclose: adj ? cells(adj.adjclose) : undefined,
    };
}

// Exchange-local calendar day for a bar's epoch-second timestamp.
export function barDate(epochSeconds: number | null, gmtoffset: number): string | null {
    if (epochSeconds === null) return null;
    const when = new Date((epochSeconds + gmtoffset) * 1000);
    return Number.isNaN(when.getTime()) ? null : when.toISOString().slice(0, 10);
}

export function chartToTable(chart: ChartResult, autoAdjust: boolean): RawTable {
    const dates = chart.timestamp.map((t) => barDate(t, chart.gmtoffset));
    const { open, high, low, close, volume } = chart.quote;
    const adjclose = chart.adjclose;

    if (autoAdjust && adjclose && adjclose.length > 0) {
        const ratio = close.map((c, i) => {
            const a = adjclose[i];
            return typeof c === 'number' && typeof a === 'number' && c !== 0 ? a / c : null;
        });
        const scale = (values: RawCell[]): RawCell[] =>
            values.map((v, i) => {
                const r = ratio[i];
                return typeof v === 'number' && r !== null ? v * r : null;
            });
        return {
            columns: [
                flat('Date', dates),
                flat('Open', scale(open)),
                flat('High', scale(high)),
                flat('Low', scale(low)),
                flat('Close', adjclose),
                flat('Volume', volume),
            ],
        };
    }

    const columns: RawColumn[] = [
        flat('Date', dates),
        flat('Open', open),
        flat('High', high),
        flat('Low', low),
        flat('Close', close),
    ];
    if (adjclose && adjclose.length > 0) {
        columns.push(flat('Adj Close', adjclose));
    }
    columns.push(flat('Volume', volume));
    return { columns };
}

export class YahooChartClient implements BarFetcher {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly autoAdjust: boolean;

    constructor(options: YahooChartOptions = {}, private readonly http: HttpClient = defaultHttpClient) {
        this.baseUrl = options.baseUrl ?? 'https://query1.finance.yahoo.com';
        this.timeoutMs = options.timeoutMs ?? 20_000;
        this.autoAdjust = options.autoAdjust ?? true;
    }

    async fetchBars(ticker: string, period: string = '6mo', interval: string = '1d'): Promise<RawTable> {
        console.log(`📥 Fetching ${period}/${interval} bars for ${ticker}...`);

        let payload: unknown;
        try {
            const response = await this.http.get(`${this.baseUrl}/v8/finance/chart/${encodeURIComponent(ticker)}`, {
                params: { range: period, interval, includeAdjustedClose: true, events: 'div,splits' },
                headers: { 'User-Agent': 'Mozilla/5.0' },
                timeout: this.timeoutMs,
            });
            if (response.status < 200 || response.status >= 300) {
                throw new DataUnavailableError(`Provider returned HTTP ${response.status} for ${ticker}`);
            }
            payload = response.data;
        } catch (error) {
            if (error instanceof DataUnavailableError) throw error;
            throw new DataUnavailableError(`Failed to fetch ${ticker}: ${describeHttpError(error)}`, { cause: error });
        }

        const chart = parseChartPayload(ticker, payload);
        const bars = chart.timestamp.filter((t) => t !== null).length;
        if (bars === 0) {
            throw new DataUnavailableError(`No data for ${ticker}.`);
        }

        console.log(`✅ Loaded ${bars} bars for ${chart.symbol}`);
        return chartToTable(chart, this.autoAdjust);
    }
}
