/**
 * Core type utilities for the reporting API.
 * These types replace 'any' at the driver boundary.
 */

/**
 * Primitive JSON values. Every normalized cell is one of these.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Values that may be bound to a positional placeholder.
 */
export type BindValue = string | number | boolean | Date | null;

/**
 * A row as handed back by a driver, before normalization.
 */
export type RawRow = Record<string, unknown>;

/**
 * Narrow an unknown value to a plain object keyed by strings.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown value to an array of driver rows.
 */
export function isRowArray(value: unknown): value is RawRow[] {
	return Array.isArray(value) && value.every(isRecord);
}
