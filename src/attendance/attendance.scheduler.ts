import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { ConfigService } from '@nestjs/config';
import { CLOCK, Clock } from '../lib/interfaces/clock.interface';
import { CalendarDayUtil } from '../lib/utils/calendar-day.util';
import { getErrorMessage, getErrorStack } from '../lib/utils/error.util';
import { AttendanceSyncService } from './services/attendance-sync.service';
import { AttendanceService } from './attendance.service';

const SCHEDULER_ACTOR = 'scheduler';

@Injectable()
export class AttendanceScheduler {
	private readonly logger = new Logger(AttendanceScheduler.name);

	constructor(
		private readonly attendanceSyncService: AttendanceSyncService,
		private readonly attendanceService: AttendanceService,
		private readonly configService: ConfigService,
		@Inject(CLOCK) private readonly clock: Clock,
	) {}

	@Cron('0 5 * * *') // Daily at 5 AM
	async handleYesterday(): Promise<void> {
		if (!this.isEnabled('Attendance sync')) return;

		const yesterday = CalendarDayUtil.shift(this.today(), -1);
		this.logger.log(`Starting scheduled attendance sync for ${yesterday}...`);

		try {
			const outcome = await this.attendanceSyncService.syncDay(yesterday, { includeAbsent: true });
			if (outcome.status === 'already_running') {
				this.logger.warn(`Scheduled attendance sync skipped: a run started at ${outcome.startedAt.toISOString()} is still active`);
			}
		} catch (error) {
			this.logger.error(`Scheduled attendance sync failed: ${getErrorMessage(error)}`, getErrorStack(error));
		}
	}

	@Cron('15 5 1 * *') // 1st of the month at 05:15
	async handlePreviousMonth(): Promise<void> {
		if (!this.isEnabled('Monthly attendance re-sync')) return;

		const { from, to } = CalendarDayUtil.previousMonth(this.today());
		this.logger.log(`Starting monthly attendance re-sync for ${from}..${to}...`);

		try {
			const outcome = await this.attendanceSyncService.syncRange(from, to, { includeAbsent: true });
			if (outcome.status === 'already_running') {
				this.logger.warn(`Monthly attendance re-sync skipped: a run started at ${outcome.startedAt.toISOString()} is still active`);
			}
		} catch (error) {
			this.logger.error(`Monthly attendance re-sync failed: ${getErrorMessage(error)}`, getErrorStack(error));
		}
	}

	@Cron('45 5 1 * *') // 1st of the month at 05:45
	async handleRetention(): Promise<void> {
		if (!this.isEnabled('Attendance retention cleanup')) return;

		const months = Number(this.configService.get<string>('ATTENDANCE_RETENTION_MONTHS') || 1);
		const cutoff = CalendarDayUtil.monthsBefore(this.today(), months);

		try {
			await this.attendanceService.pruneRecords(cutoff, SCHEDULER_ACTOR);
		} catch (error) {
			this.logger.error(`Attendance retention cleanup failed: ${getErrorMessage(error)}`, getErrorStack(error));
		}
	}

	private today(): string {
		return CalendarDayUtil.dayOf(this.clock.now(), this.configService.get<string>('TIMEZONE') || CalendarDayUtil.DEFAULT_TIMEZONE);
	}

	private isEnabled(job: string): boolean {
		const enabled = this.configService.get<string>('SYNC_SCHEDULER_ENABLED') === 'true';
		if (!enabled) {
			this.logger.log(`${job} is disabled (SYNC_SCHEDULER_ENABLED != true)`);
		}
		return enabled;
	}
}
