import { RsiSmoothing } from './strategies/types';

export type StrategyName = 'rsi' | 'ema-rsi-crossover';

export interface TelegramConfig {
    botToken?: string;
    chatId?: string;
    apiBaseUrl: string;
    timeoutMs: number;
}

export interface MarketConfig {
    ticker: string;
    label: string;
    period: string;
    interval: string;
    autoAdjust: boolean;
    timeoutMs: number;
}

export interface SignalPolicy {
    strategy: StrategyName;
    rsiSmoothing: RsiSmoothing;
    suppressHold: boolean;
}

export interface AppConfig {
    market: MarketConfig;
    telegram: TelegramConfig;
    policy: SignalPolicy;
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

// First non-empty value among the given names.
function pick(env: NodeJS.ProcessEnv, ...names: string[]): string | undefined {
    for (const name of names) {
        const value = env[name]?.trim();
        if (value) return value;
    }
    return undefined;
}

function flag(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
    const value = pick(env, name)?.toLowerCase();
    if (value === undefined) return fallback;
    if (TRUE_VALUES.has(value)) return true;
    if (FALSE_VALUES.has(value)) return false;
    console.warn(`⚠️ Unrecognised ${name}="${value}", using ${fallback}`);
    return fallback;
}

function oneOf<T extends string>(env: NodeJS.ProcessEnv, name: string, allowed: readonly T[], fallback: T): T {
    const value = pick(env, name)?.toLowerCase();
    if (value === undefined) return fallback;
    const match = allowed.find((a) => a === value);
    if (match) return match;
    console.warn(`⚠️ Unrecognised ${name}="${value}", using ${fallback}`);
    return fallback;
}

function millis(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const value = Number(pick(env, name));
    return Number.isFinite(value) && value > 0 ? value : fallback;
}

/** Reads everything the job needs once; callers pass the result down. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    return {
        market: {
            ticker: pick(env, 'TICKER') || '^NSEI',
            label: pick(env, 'TICKER_LABEL') || 'NIFTY',
            period: pick(env, 'PERIOD') || '6mo',
            interval: pick(env, 'INTERVAL') || '1d',
            autoAdjust: flag(env, 'AUTO_ADJUST', true),
            timeoutMs: millis(env, 'DATA_TIMEOUT_MS', 20_000),
        },
        telegram: {
            botToken: pick(env, 'TELEGRAM_BOT_TOKEN', 'TELEGRAM_TOKEN'),
            chatId: pick(env, 'TELEGRAM_CHAT_ID'),
            apiBaseUrl: (pick(env, 'TELEGRAM_API_URL') || 'https://api.telegram.org').replace(/\/+$/, ''),
            timeoutMs: millis(env, 'NOTIFY_TIMEOUT_MS', 20_000),
        },
        policy: {
            strategy: oneOf(env, 'SIGNAL_STRATEGY', ['rsi', 'ema-rsi-crossover'] as const, 'rsi'),
            rsiSmoothing: oneOf(env, 'RSI_SMOOTHING', ['wilder', 'ewm'] as const, 'wilder'),
            suppressHold: flag(env, 'SUPPRESS_HOLD', false),
        },
    };
}
