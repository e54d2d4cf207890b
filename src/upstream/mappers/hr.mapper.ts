import { isRecord, JsonRecord, readArray, readNumber, readRecord, readString } from '../../lib/utils/payload.util';
import { normalizeEmail } from '../../lib/utils/name-matching.util';
import { FULL_DAY_AMOUNT } from '../../lib/enums/attendance.enums';
import { HrEmployee, LeaveDay } from '../interfaces/upstream-records.interface';

const APPROVED_STATE = 'approved';

/**
 * HR fields come either as `{ id, name }` objects or as plain strings
 */
function readLabel(source: JsonRecord, key: string): string | null {
	const nested = readRecord(source, key);
	if (nested) return readString(nested, 'name', 'title');
	return readString(source, key);
}

function fullNameOf(source: JsonRecord): string {
	const fullName = readString(source, 'full_name', 'fullName', 'name');
	if (fullName) return fullName;
	return [readString(source, 'first_name'), readString(source, 'last_name')].filter(Boolean).join(' ');
}

function handleOf(source: JsonRecord): string | null {
	const handle = readString(source, 'custom_contact_handle', 'telegram', 'telegram_username', 'contact_handle');
	if (!handle) return null;
	return handle.startsWith('@') ? handle : `@${handle}`;
}

export function mapHrEmployee(raw: unknown): HrEmployee | null {
	if (!isRecord(raw)) return null;

	const externalId = readString(raw, 'id');
	if (!externalId) return null;

	const email = readString(raw, 'email');
	const manager = readRecord(raw, 'reporting_to') ?? readRecord(raw, 'manager');
	const managerEmail = manager ? readString(manager, 'email') : null;
	const hireDate = readString(raw, 'hired_on', 'hire_date');

	return {
		externalId,
		email: email ? normalizeEmail(email) : null,
		displayName: fullNameOf(raw),
		firstName: readString(raw, 'first_name'),
		lastName: readString(raw, 'last_name'),
		division: readLabel(raw, 'division'),
		department: readLabel(raw, 'department'),
		location: readLabel(raw, 'location'),
		position: readLabel(raw, 'position'),
		managerExternalId: manager ? readString(manager, 'id') : null,
		managerName: manager ? fullNameOf(manager) || null : null,
		managerEmail: managerEmail ? normalizeEmail(managerEmail) : null,
		contactHandle: handleOf(raw),
		hireDate: hireDate ? hireDate.slice(0, 10) : null,
	};
}

/**
 * Reduce an HR leave request to the leave covering `day`, or null when it is not
 * approved, does not cover the day or names no employee email.
 *
 * The amount comes from the request's per-day entry for `day` and defaults to a full day.
 */
export function mapLeaveForDay(raw: unknown, day: string): LeaveDay | null {
	if (!isRecord(raw)) return null;
	if (readString(raw, 'state') !== APPROVED_STATE) return null;

	const startsOn = readString(raw, 'starts_on')?.slice(0, 10);
	const endsOn = readString(raw, 'ends_on')?.slice(0, 10);
	if (!startsOn || !endsOn || day < startsOn || day > endsOn) return null;

	const employee = readRecord(raw, 'employee');
	const email = employee ? readString(employee, 'email') : null;
	if (!email) return null;

	let amount = FULL_DAY_AMOUNT;
	for (const entry of readArray(raw, 'entries')) {
		if (isRecord(entry) && readString(entry, 'date')?.slice(0, 10) === day) {
			amount = readNumber(entry, 'amount') ?? FULL_DAY_AMOUNT;
			break;
		}
	}

	return {
		email: normalizeEmail(email),
		reason: readLabel(raw, 'leave_type') ?? 'Leave',
		amount,
	};
}
