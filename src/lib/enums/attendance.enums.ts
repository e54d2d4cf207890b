export enum AttendanceStatus {
	PRESENT = 'present',
	LATE = 'late',
	ABSENT = 'absent',
	LEAVE = 'leave',
}

/**
 * Half of a working day, as reported by the HR system's leave entries.
 */
export const HALF_DAY_AMOUNT = 0.5;
export const FULL_DAY_AMOUNT = 1;
