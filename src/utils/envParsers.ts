/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value.trim()
            : String(fallback);
    const parsed = Number.parseInt(source, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Reads a boolean flag. Accepts true/1/yes/on and false/0/no/off in any case;
 * anything else (including an unset variable) yields `fallback`.
 */
export function isEnvFlagEnabled(
    value: string | undefined,
    fallback = false
): boolean {
    const normalized = value?.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") {
        return true;
    }
    if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") {
        return false;
    }
    return fallback;
}

export function parseEnvCsv(value: string | undefined): string[] | undefined {
    if (value === undefined) {
        return undefined;
    }
    return value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}
