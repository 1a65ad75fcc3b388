export type ReportErrorCode =
    | 'DATA_UNAVAILABLE'
    | 'COLUMN_RESOLUTION'
    | 'EMPTY_SERIES'
    | 'INSUFFICIENT_DATA'
    | 'NOTIFICATION_FAILURE';

export class ReportError extends Error {
    readonly code: ReportErrorCode;

    constructor(code: ReportErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Provider answered with nothing usable (transport error, error payload or zero bars). */
export class DataUnavailableError extends ReportError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('DATA_UNAVAILABLE', message, options);
    }
}

export class ColumnResolutionError extends ReportError {
    readonly columns: string[];

    constructor(message: string, columns: string[]) {
        super('COLUMN_RESOLUTION', `${message}. Columns found: [${columns.join(', ')}]`);
        this.columns = columns;
    }
}

export class EmptySeriesError extends ReportError {
    constructor(message = 'No valid price rows after cleaning') {
        super('EMPTY_SERIES', message);
    }
}

export class InsufficientDataError extends ReportError {
    readonly rows: number;
    readonly required: number;

    constructor(rows: number, required: number) {
        super('INSUFFICIENT_DATA', `Need at least ${required} price rows, got ${rows}`);
        this.rows = rows;
        this.required = required;
    }
}

/** Never leaves the notifier. */
export class NotificationFailure extends ReportError {
    readonly status?: number;

    constructor(message: string, options?: { cause?: unknown; status?: number }) {
        super('NOTIFICATION_FAILURE', message, { cause: options?.cause });
        this.status = options?.status;
    }
}
