import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../lib/interfaces/clock.interface';
import { getErrorMessage } from '../lib/utils/error.util';
import { TrackerClientService } from './tracker/tracker-client.service';
import { HrClientService } from './hr/hr-client.service';
import { HrEmployee, LeaveDay, TrackerDayRecord, TrackerUser, UpstreamSnapshot } from './interfaces/upstream-records.interface';

/**
 * Run-scoped view of the upstream systems.
 *
 * Each fetch happens at most once per run and every caller in the run gets the same
 * snapshot, failures included. A context is never shared between runs.
 */
export class SyncRunContext {
	private readonly logger = new Logger(SyncRunContext.name);
	private trackerUsers?: Promise<UpstreamSnapshot<TrackerUser>>;
	private hrEmployees?: Promise<UpstreamSnapshot<HrEmployee>>;
	private readonly trackerDays = new Map<string, Promise<UpstreamSnapshot<TrackerDayRecord>>>();
	private readonly leaveDays = new Map<string, Promise<UpstreamSnapshot<LeaveDay>>>();

	readonly startedAt: Date;

	constructor(
		readonly runId: string,
		private readonly tracker: TrackerClientService,
		private readonly hr: HrClientService,
		private readonly clock: Clock,
	) {
		this.startedAt = clock.now();
	}

	getTrackerUsers(): Promise<UpstreamSnapshot<TrackerUser>> {
		if (!this.trackerUsers) {
			this.trackerUsers = this.capture('tracker:users', () => this.tracker.getUsers());
		}
		return this.trackerUsers;
	}

	getTrackerDay(day: string): Promise<UpstreamSnapshot<TrackerDayRecord>> {
		let snapshot = this.trackerDays.get(day);
		if (!snapshot) {
			snapshot = this.capture(`tracker:summary:${day}`, () => this.tracker.getSummaryByDay(day));
			this.trackerDays.set(day, snapshot);
		}
		return snapshot;
	}

	getHrEmployees(): Promise<UpstreamSnapshot<HrEmployee>> {
		if (!this.hrEmployees) {
			this.hrEmployees = this.capture('hr:employees', () => this.hr.getEmployees());
		}
		return this.hrEmployees;
	}

	getLeaves(day: string): Promise<UpstreamSnapshot<LeaveDay>> {
		let snapshot = this.leaveDays.get(day);
		if (!snapshot) {
			snapshot = this.capture(`hr:leaves:${day}`, () => this.hr.getLeavesForDay(day));
			this.leaveDays.set(day, snapshot);
		}
		return snapshot;
	}

	private async capture<T>(label: string, fetch: () => Promise<T[]>): Promise<UpstreamSnapshot<T>> {
		try {
			const records = await fetch();
			return { ok: true, records, fetchedAt: this.clock.now() };
		} catch (error) {
			const message = getErrorMessage(error);
			this.logger.warn(`[${this.runId}] ${label} fetch failed: ${message}`);
			return { ok: false, error: message, failedAt: this.clock.now() };
		}
	}
}

@Injectable()
export class SyncRunContextFactory {
	constructor(
		private readonly tracker: TrackerClientService,
		private readonly hr: HrClientService,
		@Inject(CLOCK) private readonly clock: Clock,
	) {}

	create(operation: string): SyncRunContext {
		const runId = `${operation}_${this.clock.now().getTime()}_${Math.random().toString(36).substring(2, 9)}`;
		return new SyncRunContext(runId, this.tracker, this.hr, this.clock);
	}
}
