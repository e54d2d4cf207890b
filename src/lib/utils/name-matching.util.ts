/**
 * Name matching helpers shared by identity resolution and the roster key.
 *
 * Sources disagree on name order ("First Last" in the HR system, either order in
 * the tracker) and on diacritics, so every comparison goes through
 * {@link normalizeName} first.
 */

const COMBINING_MARKS = /[\u0300-\u036f]/g;
const APOSTROPHES = /[\u2019\u02bc`]/g;

/**
 * Lower-case, fold diacritics and collapse whitespace.
 */
export function normalizeName(value: string | null | undefined): string {
	if (!value) return '';

	return value
		.normalize('NFKD')
		.replace(COMBINING_MARKS, '')
		.replace(APOSTROPHES, "'")
		.toLowerCase()
		.split(/\s+/)
		.filter(Boolean)
		.join(' ');
}

/**
 * Swap the first two tokens of an already normalized name.
 * "ivan petrenko" -> "petrenko ivan"; single-token names come back unchanged.
 */
export function swapLeadingTokens(normalized: string): string {
	const tokens = normalized.split(' ').filter(Boolean);
	if (tokens.length < 2) return tokens.join(' ');

	const [first, second, ...rest] = tokens;
	return [second, first, ...rest].join(' ');
}

/**
 * True when two display names refer to the same person under the
 * "same order or first two tokens swapped" rule.
 */
export function namesMatch(left: string | null | undefined, right: string | null | undefined): boolean {
	const a = normalizeName(left);
	const b = normalizeName(right);
	if (!a || !b) return false;

	return a === b || a === swapLeadingTokens(b);
}

export function normalizeEmail(value: string | null | undefined): string {
	return (value ?? '').trim().toLowerCase();
}

/**
 * Split the tracker's "First Last, email@domain" display string.
 */
export function parseDisplayName(value: string | null | undefined): { name: string; email: string | null } {
	const text = (value ?? '').trim();
	const separator = text.indexOf(',');
	if (separator === -1) {
		return { name: text, email: null };
	}

	const name = text.slice(0, separator).trim();
	const tail = text.slice(separator + 1).trim();
	return { name, email: tail.includes('@') ? normalizeEmail(tail) : null };
}

/**
 * Stable internal key of a roster entry: email when known, the normalized name otherwise.
 */
export function buildRosterKey(email: string | null | undefined, name: string | null | undefined): string {
	return normalizeEmail(email) || normalizeName(name);
}
