import { ColumnKey, RawCell, RawColumn, RawTable, columnLabel, flat, rowCount } from './table';
import { PricePoint, PriceSeries } from '../strategies/types';
import { ColumnResolutionError, EmptySeriesError } from '../errors';

export interface NormalizeOptions {
    /** Used to pick between several `Close|<ticker>` columns. */
    ticker?: string;
}

export type CloseResolution =
    | { via: 'flat'; column: RawColumn }
    | { via: 'compound'; column: RawColumn }
    | { via: 'single-column'; column: RawColumn };

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_NAMES = new Set(['date', 'datetime', 'timestamp']);

function keyName(key: ColumnKey): string | null {
    if (key.kind === 'flat') return key.name.trim().toLowerCase();
    if (key.kind === 'compound') return key.field.trim().toLowerCase();
    return null;
}

function isDateColumn(col: RawColumn): boolean {
    const name = keyName(col.key);
    return name !== null && DATE_NAMES.has(name);
}

function labels(table: RawTable): string[] {
    return table.columns.map((c) => columnLabel(c.key));
}

export function resolveDateColumn(table: RawTable): RawColumn {
    const column = table.columns.find(isDateColumn);
    if (!column) {
        throw new ColumnResolutionError('No date column', labels(table));
    }
    return column;
}

/**
 * Picks the closing-price column. Order: exact flat `Close`, then a compound
 * `Close|<ticker>`, then the only non-date column. First match wins.
 */
export function resolveCloseColumn(table: RawTable, options: NormalizeOptions = {}): CloseResolution {
    const flatClose = table.columns.filter((c) => c.key.kind === 'flat' && keyName(c.key) === 'close');
    if (flatClose.length === 1) {
        return { via: 'flat', column: flatClose[0] };
    }

    const compoundClose = table.columns.filter((c) => c.key.kind === 'compound' && keyName(c.key) === 'close');
    if (compoundClose.length === 1) {
        return { via: 'compound', column: compoundClose[0] };
    }
    if (compoundClose.length > 1 && options.ticker) {
        const wanted = options.ticker.trim().toUpperCase();
        const match = compoundClose.filter((c) => c.key.kind === 'compound' && c.key.ticker.trim().toUpperCase() === wanted);
        if (match.length === 1) {
            return { via: 'compound', column: match[0] };
        }
    }

    const rest = table.columns.filter((c) => !isDateColumn(c));
    if (rest.length === 1) {
        return { via: 'single-column', column: rest[0] };
    }

    throw new ColumnResolutionError("Could not resolve a 'Close' column", labels(table));
}

export function parseNumeric(cell: RawCell): number | null {
    if (typeof cell === 'number') {
        return Number.isFinite(cell) ? cell : null;
    }
    if (typeof cell === 'string') {
        const trimmed = cell.trim().replace(/,/g, '');
        if (trimmed === '') return null;
        const value = Number(trimmed);
        return Number.isFinite(value) ? value : null;
    }
    return null;
}

// Numbers are epoch seconds (or millis when large enough to be).
export function parseDate(cell: RawCell): string | null {
    if (typeof cell === 'number') {
        if (!Number.isFinite(cell)) return null;
        const ms = Math.abs(cell) < 1e12 ? cell * 1000 : cell;
        const when = new Date(ms);
        if (Number.isNaN(when.getTime())) return null;
        const day = when.toISOString().slice(0, 10);
        return ISO_DAY.test(day) ? day : null;
    }
    if (typeof cell === 'string') {
        const day = cell.trim().slice(0, 10);
        return ISO_DAY.test(day) ? day : null;
    }
    return null;
}

export function normalizePriceSeries(table: RawTable, options: NormalizeOptions = {}): PriceSeries {
    const rows = rowCount(table);
    if (rows === 0) {
        throw new EmptySeriesError('Raw table has no rows');
    }

    const dateColumn = resolveDateColumn(table);
    const { column: closeColumn } = resolveCloseColumn(table, options);

    const series: PricePoint[] = [];
    for (let i = 0; i < rows; i++) {
        const close = parseNumeric(closeColumn.values[i]);
        const date = parseDate(dateColumn.values[i]);
        if (close === null || close <= 0 || date === null) continue;
        series.push({ date, close });
    }

    if (series.length === 0) {
        throw new EmptySeriesError();
    }

    // Stable, so same-day rows keep provider order.
    return series.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/** Canonical two-column table for an already-clean series. */
export function toRawTable(series: PriceSeries): RawTable {
    return {
        columns: [
            flat('Date', series.map((p) => p.date)),
            flat('Close', series.map((p) => p.close)),
        ],
    };
}
