/**
 * Provider-agnostic shape of a bar table as it arrives, before any cleaning.
 *
 * Upstream sources are not consistent about column naming: some give plain
 * names (`Close`), some pair a field with the ticker (`Close|^NSEI`), some give
 * a bare positional column. The key union keeps that distinction explicit.
 */
export type ColumnKey =
    | { kind: 'flat'; name: string }
    | { kind: 'compound'; field: string; ticker: string }
    | { kind: 'unnamed'; position: number };

export type RawCell = number | string | null | undefined;

export interface RawColumn {
    key: ColumnKey;
    values: RawCell[];
}

export interface RawTable {
    columns: RawColumn[];
}

export function columnLabel(key: ColumnKey): string {
    switch (key.kind) {
        case 'flat':
            return key.name;
        case 'compound':
            return `${key.field}|${key.ticker}`;
        case 'unnamed':
            return `#${key.position}`;
    }
}

export function rowCount(table: RawTable): number {
    return table.columns.reduce((max, col) => Math.max(max, col.values.length), 0);
}

export function flat(name: string, values: RawCell[]): RawColumn {
    return { key: { kind: 'flat', name }, values };
}
