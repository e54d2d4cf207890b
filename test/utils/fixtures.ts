import { RosterEntry } from '../../src/roster/entities/roster-entry.entity';
import { AttendanceRecord } from '../../src/attendance/entities/attendance-record.entity';
import { AttendanceStatus } from '../../src/lib/enums/attendance.enums';
import { HrEmployee, TrackerDayRecord, TrackerUser } from '../../src/upstream/interfaces/upstream-records.interface';

const CREATED_AT = new Date('2024-01-01T00:00:00Z');

export function buildRosterEntry(fields: Partial<RosterEntry> = {}): RosterEntry {
	return Object.assign(
		new RosterEntry(),
		{
			key: 'ivan.petrenko@example.com',
			name: 'Ivan Petrenko',
			email: 'ivan.petrenko@example.com',
			trackerUserId: null,
			hrSystemId: null,
			division: null,
			direction: null,
			unit: null,
			team: null,
			location: null,
			planStart: null,
			continuousSchedule: false,
			controlManager: [],
			contactHandle: null,
			managerContactHandle: null,
			managerName: null,
			hireDate: null,
			archived: false,
			ignored: false,
			overrides: {},
			createdAt: CREATED_AT,
			updatedAt: CREATED_AT,
		},
		fields,
	);
}

export function buildTrackerUser(fields: Partial<TrackerUser> = {}): TrackerUser {
	return {
		externalId: '77',
		email: 'ivan.petrenko@example.com',
		displayName: 'Ivan Petrenko',
		group: null,
		lastActivity: null,
		...fields,
	};
}

export function buildTrackerDay(fields: Partial<TrackerDayRecord> = {}): TrackerDayRecord {
	return {
		externalId: '77',
		email: 'ivan.petrenko@example.com',
		displayName: 'Ivan Petrenko',
		group: null,
		timeStart: '09:00',
		timeEnd: '18:00',
		scheduleStart: null,
		productiveSeconds: 0,
		nonProductiveSeconds: 0,
		notCategorizedSeconds: 0,
		totalSeconds: 0,
		...fields,
	};
}

export function buildHrEmployee(fields: Partial<HrEmployee> = {}): HrEmployee {
	return {
		externalId: '101',
		email: 'ivan.petrenko@example.com',
		displayName: 'Ivan Petrenko',
		firstName: 'Ivan',
		lastName: 'Petrenko',
		division: null,
		department: null,
		location: null,
		position: null,
		managerExternalId: null,
		managerName: null,
		managerEmail: null,
		contactHandle: null,
		hireDate: null,
		...fields,
	};
}

export function buildAttendanceRecord(fields: Partial<AttendanceRecord> = {}): AttendanceRecord {
	return Object.assign(
		new AttendanceRecord(),
		{
			uid: 1,
			entryKey: 'ivan.petrenko@example.com',
			recordDate: '2024-03-14',
			entryName: 'Ivan Petrenko',
			status: AttendanceStatus.PRESENT,
			manualEdit: false,
			manualFields: [],
			notes: null,
		},
		fields,
	);
}
