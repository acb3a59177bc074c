export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(source: UnknownRecord, key: string): string | null {
    const value = source[key];
    return typeof value === "string" && value.length > 0 ? value : null;
}

export function readNumber(source: UnknownRecord, key: string): number | null {
    const value = source[key];
    return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function readRecords(source: UnknownRecord, key: string): UnknownRecord[] {
    const value = source[key];
    return Array.isArray(value) ? value.filter(isRecord) : [];
}
