/**
 * Helpers.ts
 * Utility functions for value parsing and type checking.
 */

/**
 * Checks if a string represents a valid number.
 */
export function isNumeric(str: string): boolean {
    if (typeof str !== "string") return false;
    return !isNaN(parseFloat(str)) && isFinite(Number(str));
}

/**
 * Parses an upsd numeric value ("100", "13.60", " 230.1").
 * Returns undefined for absent or non-numeric input.
 */
export function parseNumeric(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    return isNumeric(trimmed) ? Number(trimmed) : undefined;
}

/**
 * Standardizes boolean-like values (yes/no/true/false/on/off) to JS booleans.
 */
export function parseBoolean(value: string): boolean | null {
    if (value === 'true' || value === 'yes' || value === 'on') return true;
    if (value === 'false' || value === 'no' || value === 'off') return false;
    return null; // Not a boolean
}

/**
 * True when `fields` starts with every token of `prefix`, in order.
 */
export function hasPrefix(fields: readonly string[], prefix: readonly string[]): boolean {
    if (fields.length < prefix.length) return false;
    return prefix.every((token, i) => fields[i] === token);
}

/**
 * Compile-time exhaustiveness guard for tagged unions.
 */
export function assertNever(value: never): never {
    throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
