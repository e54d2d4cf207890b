const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const COMPACT_TIME_PATTERN = /^(\d{2})(\d{2})$/;

/**
 * Normalize a time-of-day value to `HH:MM`.
 *
 * Accepts `H:MM`, `HH:MM`, `HH:MM:SS` and the compact `HHMM` the tracker sometimes
 * returns. Anything else (including out-of-range values) yields `null`.
 */
export function normalizeTimeOfDay(value: unknown): string | null {
	if (value === null || value === undefined) return null;

	const text = String(value).trim();
	if (!text) return null;

	const match = TIME_PATTERN.exec(text) ?? COMPACT_TIME_PATTERN.exec(text);
	if (!match) return null;

	const hours = Number(match[1]);
	const minutes = Number(match[2]);
	if (hours > 23 || minutes > 59) return null;

	return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

export function timeToMinutes(value: string | null | undefined): number | null {
	const normalized = normalizeTimeOfDay(value);
	if (!normalized) return null;

	const [hours, minutes] = normalized.split(':').map(Number);
	return hours * 60 + minutes;
}

export function minutesToTime(totalMinutes: number): string {
	const wrapped = ((totalMinutes % 1440) + 1440) % 1440;
	const hours = Math.floor(wrapped / 60);
	const minutes = wrapped % 60;
	return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Minutes between the scheduled and the actual start, never negative.
 * Returns 0 when either time is missing.
 */
export function calculateLateness(actualStart: string | null | undefined, scheduledStart: string | null | undefined): number {
	const actual = timeToMinutes(actualStart);
	const scheduled = timeToMinutes(scheduledStart);
	if (actual === null || scheduled === null) return 0;

	return Math.max(0, actual - scheduled);
}

export function secondsToMinutes(seconds: number | null | undefined): number {
	if (!seconds || !Number.isFinite(seconds) || seconds < 0) return 0;
	return Math.floor(seconds / 60);
}
