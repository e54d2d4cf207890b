/**
 * Upstream Record Interfaces
 *
 * Typed shapes of the records the time-tracker and the HR system return,
 * after mapping from raw JSON. Field names are ours, not the vendors'.
 */

/**
 * Identity of an upstream record as the Identity Resolver sees it
 */
export interface RawIdentity {
	externalId?: string | number | null;
	email?: string | null;
	displayName: string;
}

/**
 * A user account in the time-tracker
 */
export interface TrackerUser extends RawIdentity {
	externalId: string;
	email: string | null;
	displayName: string;
	group: string | null;
	lastActivity: string | null;
}

/**
 * One row of the tracker's per-day summary. Durations are in seconds.
 */
export interface TrackerDayRecord extends RawIdentity {
	externalId: string | null;
	email: string | null;
	displayName: string;
	group: string | null;
	timeStart: string | null;
	timeEnd: string | null;
	/** Schedule start the tracker reports (or derives from lateness) for the day */
	scheduleStart: string | null;
	productiveSeconds: number;
	nonProductiveSeconds: number;
	notCategorizedSeconds: number;
	totalSeconds: number;
}

/**
 * An employee record from the HR system
 */
export interface HrEmployee extends RawIdentity {
	externalId: string;
	email: string | null;
	displayName: string;
	firstName: string | null;
	lastName: string | null;
	division: string | null;
	department: string | null;
	location: string | null;
	position: string | null;
	managerExternalId: string | null;
	managerName: string | null;
	managerEmail: string | null;
	contactHandle: string | null;
	hireDate: string | null;
}

/**
 * Approved leave covering a single day
 */
export interface LeaveDay {
	email: string;
	reason: string;
	/** 1 for a full day, 0.5 for half a day */
	amount: number;
}

/**
 * Result of one upstream fetch inside a run: either every record or the failure.
 */
export type UpstreamSnapshot<T> =
	| { ok: true; records: T[]; fetchedAt: Date }
	| { ok: false; error: string; failedAt: Date };
