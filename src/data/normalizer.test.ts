import * as fc from 'fast-check';
import { normalizePriceSeries, parseDate, parseNumeric, resolveCloseColumn, toRawTable } from './normalizer';
import { RawTable, flat } from './table';
import { ColumnResolutionError, EmptySeriesError } from '../errors';
import { seriesArb } from '../test/fixtures';

const DATES = ['2024-01-01', '2024-01-02', '2024-01-03'];

describe('resolveCloseColumn', () => {
    it('uses a flat Close column, case-insensitively', () => {
        const table: RawTable = {
            columns: [flat('Date', DATES), flat('Open', [1, 2, 3]), flat(' close ', [10, 11, 12])],
        };
        const resolved = resolveCloseColumn(table);
        expect(resolved.via).toBe('flat');
        expect(resolved.column.values).toEqual([10, 11, 12]);
    });

    it('prefers the exact Close column over a compound one', () => {
        const table: RawTable = {
            columns: [
                flat('Date', DATES),
                { key: { kind: 'compound', field: 'Close', ticker: '^NSEI' }, values: [1, 1, 1] },
                flat('Close', [10, 11, 12]),
            ],
        };
        const resolved = resolveCloseColumn(table);
        expect(resolved.via).toBe('flat');
        expect(resolved.column.values).toEqual([10, 11, 12]);
    });

    it('selects the Close field of a compound field|ticker layout', () => {
        const table: RawTable = {
            columns: [
                { key: { kind: 'compound', field: 'Date', ticker: '' }, values: DATES },
                { key: { kind: 'compound', field: 'Open', ticker: '^NSEI' }, values: [1, 2, 3] },
                { key: { kind: 'compound', field: 'Close', ticker: '^NSEI' }, values: [20, 21, 22] },
            ],
        };
        const resolved = resolveCloseColumn(table);
        expect(resolved.via).toBe('compound');
        expect(resolved.column.values).toEqual([20, 21, 22]);
    });

    it('picks the requested ticker among several compound Close columns', () => {
        const table: RawTable = {
            columns: [
                flat('Date', DATES),
                { key: { kind: 'compound', field: 'Close', ticker: '^BSESN' }, values: [5, 5, 5] },
                { key: { kind: 'compound', field: 'Close', ticker: '^NSEI' }, values: [20, 21, 22] },
            ],
        };
        expect(resolveCloseColumn(table, { ticker: '^nsei' }).column.values).toEqual([20, 21, 22]);
        expect(() => resolveCloseColumn(table)).toThrow(ColumnResolutionError);
    });

    it('falls back to the only non-date column', () => {
        const table: RawTable = {
            columns: [flat('Date', DATES), { key: { kind: 'unnamed', position: 0 }, values: [7, 8, 9] }],
        };
        const resolved = resolveCloseColumn(table);
        expect(resolved.via).toBe('single-column');
        expect(resolved.column.values).toEqual([7, 8, 9]);
    });

    it('reports every column label when nothing matches', () => {
        const table: RawTable = {
            columns: [
                flat('Date', DATES),
                flat('Open', [1, 2, 3]),
                { key: { kind: 'compound', field: 'High', ticker: '^NSEI' }, values: [1, 2, 3] },
                { key: { kind: 'unnamed', position: 3 }, values: [1, 2, 3] },
            ],
        };
        try {
            resolveCloseColumn(table);
            throw new Error('expected a ColumnResolutionError');
        } catch (error) {
            expect(error).toBeInstanceOf(ColumnResolutionError);
            if (error instanceof ColumnResolutionError) {
                expect(error.columns).toEqual(['Date', 'Open', 'High|^NSEI', '#3']);
                expect(error.message).toBe("Could not resolve a 'Close' column. Columns found: [Date, Open, High|^NSEI, #3]");
            }
        }
    });
});

describe('parseNumeric / parseDate', () => {
    it('accepts finite numbers and numeric strings only', () => {
        expect(parseNumeric(12.5)).toBe(12.5);
        expect(parseNumeric(' 21,500.25 ')).toBe(21500.25);
        expect(parseNumeric('n/a')).toBeNull();
        expect(parseNumeric('')).toBeNull();
        expect(parseNumeric(NaN)).toBeNull();
        expect(parseNumeric(null)).toBeNull();
        expect(parseNumeric(undefined)).toBeNull();
    });

    it('reads ISO strings and epoch timestamps as calendar days', () => {
        expect(parseDate('2024-03-05T00:00:00+05:30')).toBe('2024-03-05');
        expect(parseDate(1704067200)).toBe('2024-01-01');
        expect(parseDate(1704067200000)).toBe('2024-01-01');
        expect(parseDate('yesterday')).toBeNull();
    });

    it('rejects millisecond values too small to be told apart from seconds', () => {
        expect(parseDate(946684800000)).toBeNull();
        expect(parseDate(631152000000)).toBeNull();
        const table: RawTable = { columns: [flat('Date', [946684800000, '2024-01-02']), flat('Close', [1, 2])] };
        expect(normalizePriceSeries(table)).toEqual([{ date: '2024-01-02', close: 2 }]);
    });
});

describe('normalizePriceSeries', () => {
    it('drops rows whose close is not numeric instead of filling them', () => {
        const table: RawTable = {
            columns: [
                flat('Date', ['2024-01-01', '2024-01-02', '2024-01-03', '2024-01-04']),
                flat('Close', [100, null, 'oops', '103.5']),
            ],
        };
        expect(normalizePriceSeries(table)).toEqual([
            { date: '2024-01-01', close: 100 },
            { date: '2024-01-04', close: 103.5 },
        ]);
    });

    it('orders rows ascending by date', () => {
        const table: RawTable = {
            columns: [flat('Date', ['2024-01-03', '2024-01-01', '2024-01-02']), flat('Close', [3, 1, 2])],
        };
        expect(normalizePriceSeries(table).map((p) => p.close)).toEqual([1, 2, 3]);
    });

    it('fails with EmptySeriesError for a table with zero rows', () => {
        const table: RawTable = { columns: [flat('Date', []), flat('Close', [])] };
        expect(() => normalizePriceSeries(table)).toThrow(EmptySeriesError);
        expect(() => normalizePriceSeries({ columns: [] })).toThrow(EmptySeriesError);
    });

    it('fails with EmptySeriesError when cleaning removes every row', () => {
        const table: RawTable = { columns: [flat('Date', DATES), flat('Close', [null, 'x', -1])] };
        expect(() => normalizePriceSeries(table)).toThrow(EmptySeriesError);
    });

    it('requires a date column', () => {
        const table: RawTable = { columns: [flat('Close', [1, 2, 3])] };
        expect(() => normalizePriceSeries(table)).toThrow(ColumnResolutionError);
    });

    it('is idempotent on an already-canonical series', () => {
        fc.assert(
            fc.property(seriesArb(1), (series) => {
                const once = normalizePriceSeries(toRawTable(series));
                expect(once).toEqual(series);
                expect(normalizePriceSeries(toRawTable(once))).toEqual(once);
            }),
        );
    });
});
