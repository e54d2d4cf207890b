import { Injectable } from '@nestjs/common';
import { AttendanceStatus, FULL_DAY_AMOUNT, HALF_DAY_AMOUNT } from '../../lib/enums/attendance.enums';
import { calculateLateness, secondsToMinutes } from '../../lib/utils/time-of-day.util';
import { LeaveDay, TrackerDayRecord } from '../../upstream/interfaces/upstream-records.interface';
import { RosterEntry } from '../../roster/entities/roster-entry.entity';
import { AttendanceRecord } from '../entities/attendance-record.entity';
import { ManualField } from '../interfaces/attendance-record.interface';

export const DEFAULT_GRACE_MINUTES = 15;

export interface ComputeDayOptions {
	date: string;
	graceMinutes?: number;
}

type ComputedFields = Pick<
	AttendanceRecord,
	| 'scheduledStart'
	| 'actualStart'
	| 'minutesLate'
	| 'status'
	| 'nonProductiveMinutes'
	| 'notCategorizedMinutes'
	| 'productiveMinutes'
	| 'totalMinutes'
	| 'correctedTotalMinutes'
	| 'leaveReason'
	| 'halfDayAmount'
>;

function copyField<K extends ManualField>(target: AttendanceRecord, source: AttendanceRecord, field: K): void {
	target[field] = source[field];
}

/**
 * Turns one tracker day row (or its absence) into an attendance record.
 */
@Injectable()
export class AttendanceCalculatorService {
	/**
	 * Compute the record of `entry` for `options.date`.
	 *
	 * A record that carries manual edits keeps its corrected total and every field
	 * listed in `manualFields`; the rest is refreshed. `manualEdit` and `manualFields`
	 * are never changed here.
	 */
	computeDay(
		entry: RosterEntry,
		raw: TrackerDayRecord | null,
		existing: AttendanceRecord | null,
		leave: LeaveDay | null,
		options: ComputeDayOptions,
	): AttendanceRecord {
		const graceMinutes = options.graceMinutes ?? DEFAULT_GRACE_MINUTES;
		const computed = this.computeFields(entry, raw, leave, graceMinutes);

		const record = Object.assign(new AttendanceRecord(), existing ?? {}, computed, {
			entryKey: entry.key,
			recordDate: options.date,
			entryName: entry.name,
			division: entry.division,
			direction: entry.direction,
			unit: entry.unit,
			team: entry.team,
			location: entry.location,
			controlManager: [...(entry.controlManager ?? [])],
			notes: existing?.notes ?? null,
			manualFields: [...(existing?.manualFields ?? [])],
			manualEdit: existing?.manualEdit ?? false,
		});

		if (existing?.manualEdit) {
			record.correctedTotalMinutes = existing.correctedTotalMinutes;
			for (const field of existing.manualFields ?? []) {
				copyField(record, existing, field);
			}
		}

		record.correctedTotalMinutes = Math.max(0, record.correctedTotalMinutes);
		return record;
	}

	/**
	 * A row with no start time and no tracked seconds counts as no row
	 */
	hasActivity(raw: TrackerDayRecord | null): raw is TrackerDayRecord {
		return raw !== null && (raw.timeStart !== null || raw.totalSeconds > 0);
	}

	private computeFields(entry: RosterEntry, raw: TrackerDayRecord | null, leave: LeaveDay | null, graceMinutes: number): ComputedFields {
		const scheduledStart = raw?.scheduleStart ?? entry.planStart ?? null;
		const leaveFields = {
			leaveReason: leave?.reason ?? null,
			halfDayAmount: leave ? (leave.amount >= FULL_DAY_AMOUNT ? FULL_DAY_AMOUNT : HALF_DAY_AMOUNT) : null,
		};
		const idle = {
			scheduledStart,
			actualStart: null,
			minutesLate: 0,
			nonProductiveMinutes: 0,
			notCategorizedMinutes: 0,
			productiveMinutes: 0,
			totalMinutes: 0,
			correctedTotalMinutes: 0,
			...leaveFields,
		};

		if (!this.hasActivity(raw)) {
			return { ...idle, status: leave ? AttendanceStatus.LEAVE : AttendanceStatus.ABSENT };
		}

		if (leave && leave.amount >= FULL_DAY_AMOUNT) {
			return { ...idle, status: AttendanceStatus.LEAVE };
		}

		const nonProductiveMinutes = secondsToMinutes(raw.nonProductiveSeconds);
		const notCategorizedMinutes = secondsToMinutes(raw.notCategorizedSeconds);
		const productiveMinutes = secondsToMinutes(raw.productiveSeconds);
		const totalMinutes = nonProductiveMinutes + notCategorizedMinutes + productiveMinutes;
		const minutesLate = entry.continuousSchedule ? 0 : calculateLateness(raw.timeStart, scheduledStart);

		return {
			scheduledStart,
			actualStart: raw.timeStart,
			minutesLate,
			status: minutesLate > graceMinutes ? AttendanceStatus.LATE : AttendanceStatus.PRESENT,
			nonProductiveMinutes,
			notCategorizedMinutes,
			productiveMinutes,
			totalMinutes,
			correctedTotalMinutes: totalMinutes,
			...leaveFields,
		};
	}
}
