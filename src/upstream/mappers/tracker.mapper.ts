import { isRecord, JsonRecord, readNumber, readRecord, readString } from '../../lib/utils/payload.util';
import { normalizeEmail, parseDisplayName } from '../../lib/utils/name-matching.util';
import { minutesToTime, normalizeTimeOfDay, timeToMinutes } from '../../lib/utils/time-of-day.util';
import { TrackerDayRecord, TrackerUser } from '../interfaces/upstream-records.interface';

const SCHEDULE_OBJECT_KEYS = ['start_time', 'startTime', 'start', 'begin'];
const SCHEDULE_FIELD_KEYS = ['schedule_start', 'scheduleStart', 'plan_start', 'planStart', 'expected_start', 'expectedStart'];

/**
 * Map a tracker `getUsers` row. Rows without an id are dropped (returns null).
 */
export function mapTrackerUser(raw: unknown): TrackerUser | null {
	if (!isRecord(raw)) return null;

	const externalId = readString(raw, 'id', 'user_id');
	if (!externalId) return null;

	const firstName = readString(raw, 'firstname', 'first_name') ?? '';
	const lastName = readString(raw, 'lastname', 'last_name') ?? '';
	const email = readString(raw, 'email');

	return {
		externalId,
		email: email ? normalizeEmail(email) : null,
		displayName: `${firstName} ${lastName}`.trim(),
		group: readString(raw, 'group_name', 'group'),
		lastActivity: readString(raw, 'last_activity'),
	};
}

export function isActiveTrackerUser(raw: unknown): boolean {
	return isRecord(raw) && String(raw.is_active) === '1';
}

/**
 * Schedule start for the day: the schedule object first, then flat schedule fields,
 * then actual start minus reported lateness.
 */
export function extractScheduleStart(raw: JsonRecord): string | null {
	const schedule = readRecord(raw, 'schedule');
	if (schedule) {
		for (const key of SCHEDULE_OBJECT_KEYS) {
			const value = normalizeTimeOfDay(schedule[key]);
			if (value) return value;
		}
	}

	for (const key of SCHEDULE_FIELD_KEYS) {
		const value = normalizeTimeOfDay(raw[key]);
		if (value) return value;
	}

	const actual = timeToMinutes(readString(raw, 'time_start', 'timeStart', 'start_time', 'startTime'));
	const lateness = readNumber(raw, 'lateness', 'lateness_minutes', 'late');
	if (actual !== null && lateness !== null) {
		return minutesToTime(actual - Math.trunc(lateness));
	}

	return null;
}

/**
 * Map a `getSummaryByDay` row. The `user` field carries "First Last, email".
 */
export function mapTrackerDayRecord(raw: unknown): TrackerDayRecord | null {
	if (!isRecord(raw)) return null;

	const parsed = parseDisplayName(readString(raw, 'user', 'full_name', 'fullName'));
	const explicitEmail = readString(raw, 'email', 'user_email', 'userEmail');
	const email = explicitEmail ? normalizeEmail(explicitEmail) : parsed.email;

	const productiveSeconds = Math.max(0, readNumber(raw, 'productive') ?? 0);
	const nonProductiveSeconds = Math.max(0, readNumber(raw, 'distracting') ?? 0);
	const notCategorizedSeconds = Math.max(0, readNumber(raw, 'uncategorized') ?? 0);

	return {
		externalId: readString(raw, 'user_id', 'userId'),
		email,
		displayName: parsed.name,
		group: readString(raw, 'group'),
		timeStart: normalizeTimeOfDay(readString(raw, 'time_start', 'timeStart')),
		timeEnd: normalizeTimeOfDay(readString(raw, 'time_end', 'timeEnd')),
		scheduleStart: extractScheduleStart(raw),
		productiveSeconds,
		nonProductiveSeconds,
		notCategorizedSeconds,
		totalSeconds: readNumber(raw, 'total') ?? productiveSeconds + nonProductiveSeconds + notCategorizedSeconds,
	};
}
