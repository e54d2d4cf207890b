import { AttendanceStatus } from '../../lib/enums/attendance.enums';

/**
 * Record fields an admin can edit. An edited field survives every later recompute
 * until the record's manual edits are reset.
 */
export type ManualField =
	| 'scheduledStart'
	| 'actualStart'
	| 'minutesLate'
	| 'nonProductiveMinutes'
	| 'notCategorizedMinutes'
	| 'productiveMinutes'
	| 'totalMinutes'
	| 'correctedTotalMinutes'
	| 'status'
	| 'notes'
	| 'leaveReason';

const MANUAL_FIELD_SET = {
	scheduledStart: true,
	actualStart: true,
	minutesLate: true,
	nonProductiveMinutes: true,
	notCategorizedMinutes: true,
	productiveMinutes: true,
	totalMinutes: true,
	correctedTotalMinutes: true,
	status: true,
	notes: true,
	leaveReason: true,
} satisfies Record<ManualField, true>;

export function isManualField(value: string): value is ManualField {
	return Object.prototype.hasOwnProperty.call(MANUAL_FIELD_SET, value);
}

export const MANUAL_FIELDS: readonly ManualField[] = Object.keys(MANUAL_FIELD_SET).filter(isManualField);

export interface AttendanceSyncError {
	entryKey: string;
	error: string;
}

/**
 * Outcome of syncing one calendar day
 */
export interface AttendanceSyncSummary {
	runId: string;
	date: string;
	created: number;
	updated: number;
	/** Entries with nothing to write: no tracker row, no leave and absences not requested */
	skipped: number;
	/** Tracker rows that resolved to no roster entry */
	unmatched: number;
	/** Tracker rows that resolved to an ignored or archived entry */
	excluded: number;
	errored: number;
	errors: AttendanceSyncError[];
	byStatus: Record<AttendanceStatus, number>;
	sourceErrors: { tracker?: string; hr?: string };
}

export interface SyncDayOptions {
	includeAbsent?: boolean;
}
