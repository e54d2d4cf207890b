/**
 * Narrowing helpers for untyped upstream JSON.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a string-ish field. Numbers are stringified, blank strings become null.
 */
export function readString(source: JsonRecord, ...keys: string[]): string | null {
	for (const key of keys) {
		const value = source[key];
		if (typeof value === 'string' && value.trim()) return value.trim();
		if (typeof value === 'number' && Number.isFinite(value)) return String(value);
	}
	return null;
}

export function readNumber(source: JsonRecord, ...keys: string[]): number | null {
	for (const key of keys) {
		const value = source[key];
		if (typeof value === 'number' && Number.isFinite(value)) return value;
		if (typeof value === 'string' && value.trim() !== '') {
			const parsed = Number(value);
			if (Number.isFinite(parsed)) return parsed;
		}
	}
	return null;
}

export function readRecord(source: JsonRecord, key: string): JsonRecord | null {
	const value = source[key];
	return isRecord(value) ? value : null;
}

export function readArray(source: JsonRecord, key: string): unknown[] {
	const value = source[key];
	return Array.isArray(value) ? value : [];
}
