/**
 * Row type and narrowing helpers for values coming back from drivers.
 */

/**
 * One result row: column name to value.
 * Drivers hand back Dates, Buffers and bigints, so values stay `unknown`
 * until a surface serializes them.
 */
export type Row = Record<string, unknown>;

/**
 * Narrow an unknown value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown array to rows, dropping anything that is not an object.
 */
export function toRows(value: unknown): Row[] {
	if (!Array.isArray(value)) {
		return [];
	}
	return value.filter(isRecord);
}

/**
 * Extract a readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
