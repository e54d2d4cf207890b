import { Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Repository } from 'typeorm';
import { AttendanceStatus } from '../../lib/enums/attendance.enums';
import { UpstreamSource } from '../../lib/enums/upstream.enums';
import { CalendarDayUtil } from '../../lib/utils/calendar-day.util';
import { getErrorMessage } from '../../lib/utils/error.util';
import { normalizeEmail } from '../../lib/utils/name-matching.util';
import { ExclusiveRunResult, SyncLockService } from '../../lib/services/sync-lock.service';
import { SyncRunContext, SyncRunContextFactory } from '../../upstream/sync-run.context';
import { LeaveDay, TrackerDayRecord } from '../../upstream/interfaces/upstream-records.interface';
import { AuditEvents, SyncCompletedEvent } from '../../audit/audit.events';
import { RosterEntry } from '../../roster/entities/roster-entry.entity';
import { IdentityResolverService } from '../../roster/services/identity-resolver.service';
import { AttendanceRecord } from '../entities/attendance-record.entity';
import { AttendanceSyncSummary, SyncDayOptions } from '../interfaces/attendance-record.interface';
import { AttendanceCalculatorService, DEFAULT_GRACE_MINUTES } from './attendance-calculator.service';

export const ATTENDANCE_SYNC_LOCK = 'attendance-sync';

/**
 * Tracker rows of one day keyed by the roster entry they resolve to
 */
interface ResolvedDay {
	rowsByKey: Map<string, TrackerDayRecord>;
	unmatched: number;
	excluded: number;
}

/**
 * Builds the daily attendance records from the tracker summary and HR leave.
 */
@Injectable()
export class AttendanceSyncService {
	private readonly logger = new Logger(AttendanceSyncService.name);
	private readonly graceMinutes: number;

	constructor(
		@InjectRepository(AttendanceRecord)
		private readonly attendanceRepository: Repository<AttendanceRecord>,
		@InjectRepository(RosterEntry)
		private readonly rosterRepository: Repository<RosterEntry>,
		private readonly calculator: AttendanceCalculatorService,
		private readonly resolver: IdentityResolverService,
		private readonly lockService: SyncLockService,
		private readonly contextFactory: SyncRunContextFactory,
		private readonly eventEmitter: EventEmitter2,
		private readonly configService: ConfigService,
	) {
		const grace = Number(this.configService.get<string>('ATTENDANCE_GRACE_MINUTES'));
		this.graceMinutes = Number.isFinite(grace) && grace >= 0 ? grace : DEFAULT_GRACE_MINUTES;
	}

	syncDay(date: string, options: SyncDayOptions = {}): Promise<ExclusiveRunResult<AttendanceSyncSummary>> {
		CalendarDayUtil.assertValidDay(date);
		return this.lockService.runExclusive(ATTENDANCE_SYNC_LOCK, () =>
			this.runDay(this.contextFactory.create('attendance_sync'), date, options),
		);
	}

	/**
	 * Sync every day from `from` to `to` inclusive under one guard and one run context
	 */
	syncRange(from: string, to: string, options: SyncDayOptions = {}): Promise<ExclusiveRunResult<AttendanceSyncSummary[]>> {
		const days = CalendarDayUtil.range(from, to);
		return this.lockService.runExclusive(ATTENDANCE_SYNC_LOCK, async () => {
			const context = this.contextFactory.create('attendance_sync_range');
			const summaries: AttendanceSyncSummary[] = [];
			for (const day of days) {
				summaries.push(await this.runDay(context, day, options));
			}
			return summaries;
		});
	}

	/**
	 * Recompute one entry's day from a fresh fetch. `existing` is merged as usual,
	 * so pass it with its manual flags already cleared to drop the edits.
	 */
	async recomputeEntryDay(entry: RosterEntry, date: string, existing: AttendanceRecord | null): Promise<AttendanceRecord> {
		const context = this.contextFactory.create('attendance_recompute');
		const [trackerSnapshot, leaveSnapshot] = await Promise.all([context.getTrackerDay(date), context.getLeaves(date)]);
		if (!trackerSnapshot.ok) {
			throw new ServiceUnavailableException(`Tracker unavailable: ${trackerSnapshot.error}`);
		}
		if (!leaveSnapshot.ok) {
			throw new ServiceUnavailableException(`HR system unavailable: ${leaveSnapshot.error}`);
		}

		const roster = await this.rosterRepository.find();
		const { rowsByKey } = this.resolveRows(trackerSnapshot.records, roster, context);
		const leave = this.leaveFor(entry, this.indexLeaves(leaveSnapshot.records));

		const record = this.calculator.computeDay(entry, rowsByKey.get(entry.key) ?? null, existing, leave, {
			date,
			graceMinutes: this.graceMinutes,
		});
		return this.attendanceRepository.save(record);
	}

	private async runDay(context: SyncRunContext, date: string, options: SyncDayOptions): Promise<AttendanceSyncSummary> {
		const summary = this.emptySummary(context.runId, date);
		this.logger.log(`[${context.runId}] Starting attendance sync for ${date}`);

		const trackerSnapshot = await context.getTrackerDay(date);
		if (!trackerSnapshot.ok) {
			summary.sourceErrors.tracker = trackerSnapshot.error;
			this.logger.error(`[${context.runId}] Tracker summary for ${date} unavailable, nothing written: ${trackerSnapshot.error}`);
			this.emitCompleted(context.runId, summary);
			return summary;
		}

		const leaveSnapshot = await context.getLeaves(date);
		if (!leaveSnapshot.ok) {
			summary.sourceErrors.hr = leaveSnapshot.error;
			this.logger.warn(`[${context.runId}] Leave requests for ${date} unavailable, absences not written: ${leaveSnapshot.error}`);
		}
		const leaves = leaveSnapshot.ok ? this.indexLeaves(leaveSnapshot.records) : new Map<string, LeaveDay>();

		const roster = await this.rosterRepository.find();
		const resolved = this.resolveRows(trackerSnapshot.records, roster, context);
		summary.unmatched = resolved.unmatched;
		summary.excluded = resolved.excluded;

		const existingRecords = await this.attendanceRepository.find({ where: { recordDate: date } });
		const existingByKey = new Map(existingRecords.map((record) => [record.entryKey, record]));

		for (const entry of roster) {
			if (entry.ignored || entry.archived) continue;

			const raw = resolved.rowsByKey.get(entry.key) ?? null;
			const existing = existingByKey.get(entry.key) ?? null;
			const leave = this.leaveFor(entry, leaves);

			if (!this.calculator.hasActivity(raw)) {
				// Without leave data an idle day cannot be told apart from a leave day
				if (!leaveSnapshot.ok || (!leave && !options.includeAbsent && !existing)) {
					summary.skipped++;
					continue;
				}
			}

			try {
				const record = this.calculator.computeDay(entry, raw, existing, leave, {
					date,
					graceMinutes: this.graceMinutes,
				});
				await this.attendanceRepository.save(record);

				if (existing) summary.updated++;
				else summary.created++;
				summary.byStatus[record.status]++;
			} catch (error) {
				const message = getErrorMessage(error);
				summary.errored++;
				summary.errors.push({ entryKey: entry.key, error: message });
				this.logger.error(`[${context.runId}] Failed to write attendance for ${entry.key} on ${date}: ${message}`);
			}
		}

		this.logger.log(
			`[${context.runId}] Attendance sync for ${date} completed: created ${summary.created}, updated ${summary.updated}, skipped ${summary.skipped}, unmatched ${summary.unmatched}, errored ${summary.errored}`,
		);
		this.emitCompleted(context.runId, summary);
		return summary;
	}

	private resolveRows(rows: readonly TrackerDayRecord[], roster: readonly RosterEntry[], context: SyncRunContext): ResolvedDay {
		const result: ResolvedDay = { rowsByKey: new Map(), unmatched: 0, excluded: 0 };

		for (const row of rows) {
			const entry = this.resolver.resolve(row, roster, UpstreamSource.TRACKER);
			if (!entry) {
				result.unmatched++;
				continue;
			}
			if (entry.ignored || entry.archived) {
				result.excluded++;
				continue;
			}

			const previous = result.rowsByKey.get(entry.key);
			if (previous) {
				this.logger.warn(`[${context.runId}] Several tracker rows resolve to ${entry.key}; keeping the one with more tracked time`);
				if (previous.totalSeconds >= row.totalSeconds) continue;
			}
			result.rowsByKey.set(entry.key, row);
		}

		return result;
	}

	private indexLeaves(leaves: readonly LeaveDay[]): Map<string, LeaveDay> {
		return new Map(leaves.map((leave) => [normalizeEmail(leave.email), leave]));
	}

	private leaveFor(entry: RosterEntry, leaves: Map<string, LeaveDay>): LeaveDay | null {
		const email = normalizeEmail(entry.email);
		return email ? leaves.get(email) ?? null : null;
	}

	private emitCompleted(runId: string, summary: AttendanceSyncSummary): void {
		const event: SyncCompletedEvent = { runId, summary };
		this.eventEmitter.emit(AuditEvents.ATTENDANCE_SYNCED, event);
	}

	private emptySummary(runId: string, date: string): AttendanceSyncSummary {
		return {
			runId,
			date,
			created: 0,
			updated: 0,
			skipped: 0,
			unmatched: 0,
			excluded: 0,
			errored: 0,
			errors: [],
			byStatus: {
				[AttendanceStatus.PRESENT]: 0,
				[AttendanceStatus.LATE]: 0,
				[AttendanceStatus.ABSENT]: 0,
				[AttendanceStatus.LEAVE]: 0,
			},
			sourceErrors: {},
		};
	}
}
