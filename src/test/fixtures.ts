import * as fc from 'fast-check';
import { PriceSeries } from '../strategies/types';
import { RawTable } from '../data/table';
import { toRawTable } from '../data/normalizer';

const DAY_MS = 24 * 60 * 60 * 1000;
const BASE = Date.UTC(2024, 0, 1);

/** 2024-01-01 plus `offset` days. */
export function dayAfter(offset: number): string {
    return new Date(BASE + offset * DAY_MS).toISOString().slice(0, 10);
}

export function seriesFrom(closes: number[]): PriceSeries {
    return closes.map((close, i) => ({ date: dayAfter(i), close }));
}

export function tableFrom(closes: number[]): RawTable {
    return toRawTable(seriesFrom(closes));
}

export function linear(from: number, to: number, rows: number): number[] {
    const step = (to - from) / (rows - 1);
    return Array.from({ length: rows }, (_, i) => from + i * step);
}

/** 15 closes alternating +2 / -1: RSI(14) is exactly 66.67 at the last row. */
export const ZIGZAG = [100, 102, 101, 103, 102, 104, 103, 105, 104, 106, 105, 107, 106, 108, 107];

export const closesArb = (minLength: number) =>
    fc.array(fc.double({ min: 1, max: 100_000, noNaN: true }), { minLength, maxLength: 120 });

export const seriesArb = (minLength: number) => closesArb(minLength).map(seriesFrom);

export function silenceConsole(): void {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
