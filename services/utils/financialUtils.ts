
export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/** Keeps the object entries of an array payload; anything else becomes []. */
export const asRecords = (value: unknown): JsonRecord[] =>
    Array.isArray(value) ? value.filter(isRecord) : [];

export const readString = (row: JsonRecord, key: string): string | null => {
    const raw = row[key];
    if (typeof raw === 'string') {
        const trimmed = raw.trim();
        return trimmed && trimmed !== 'None' ? trimmed : null;
    }
    if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
    return null;
};

/**
 * Parses provider numbers. Providers send numbers, numeric strings, or
 * placeholders like "None", "-", "N/A" and "" for missing values.
 */
export function toNumber(raw: unknown): number | null {
    if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
    if (typeof raw !== 'string') return null;

    const cleaned = raw.replace(/[,%$\s]/g, '');
    if (!cleaned || cleaned === '-' || cleaned === '—') return null;
    const lower = cleaned.toLowerCase();
    if (lower === 'none' || lower === 'n/a' || lower === 'nan' || lower === 'null') return null;

    const n = Number(cleaned);
    return Number.isFinite(n) ? n : null;
}

export const readNumber = (row: JsonRecord, key: string): number | null => toNumber(row[key]);

/** a / b, or null when either side is missing or b is zero. */
export function safeDivide(a: number | null, b: number | null): number | null {
    if (a == null || b == null || b === 0) return null;
    const result = a / b;
    return Number.isFinite(result) ? result : null;
}

/**
 * Percentage change from `base` to `current`. Divides by |base| so a move from
 * a loss to a smaller loss reads as an improvement.
 */
export function pctChange(current: number | null, base: number | null): number | null {
    if (current == null || base == null || base === 0) return null;
    return ((current - base) / Math.abs(base)) * 100;
}

export const round2 = (value: number | null): number | null =>
    value == null ? null : Math.round(value * 100) / 100;

export const toMillions = (value: number | null): number | null =>
    value == null ? null : value / 1_000_000;

/**
 * Parses abbreviated amounts ("2.5B", "840.3M", "1.2T", "950K") into millions.
 */
export function parseAbbreviatedMillions(raw: string | null): number | null {
    if (!raw) return null;
    const match = raw.trim().match(/^(-?[\d,.]+)\s*([KMBT])?$/i);
    if (!match) return null;
    const base = toNumber(match[1]);
    if (base == null) return null;

    switch ((match[2] ?? '').toUpperCase()) {
        case 'K':
            return base / 1000;
        case 'M':
            return base;
        case 'B':
            return base * 1000;
        case 'T':
            return base * 1_000_000;
        default:
            return base / 1_000_000;
    }
}
