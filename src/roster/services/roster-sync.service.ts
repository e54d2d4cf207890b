import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Repository } from 'typeorm';
import { CLOCK, Clock } from '../../lib/interfaces/clock.interface';
import { UpstreamSource } from '../../lib/enums/upstream.enums';
import { CalendarDayUtil } from '../../lib/utils/calendar-day.util';
import { getErrorMessage } from '../../lib/utils/error.util';
import { normalizeEmail } from '../../lib/utils/name-matching.util';
import { ExclusiveRunResult, SyncLockService } from '../../lib/services/sync-lock.service';
import { SyncRunContext, SyncRunContextFactory } from '../../upstream/sync-run.context';
import { HrEmployee, RawIdentity, TrackerUser } from '../../upstream/interfaces/upstream-records.interface';
import { AuditEvents, SyncCompletedEvent } from '../../audit/audit.events';
import { RosterEntry } from '../entities/roster-entry.entity';
import { RosterFieldUpdate } from '../interfaces/roster-fields.interface';
import { SyncSummary } from '../interfaces/roster-sync.interface';
import { RosterService } from '../roster.service';
import { IdentityResolverService } from './identity-resolver.service';
import { HierarchyNormalizerService } from './hierarchy-normalizer.service';

export const ROSTER_SYNC_LOCK = 'roster-sync';

/**
 * Schedule start per tracker user, from the most recent summary that has any rows
 */
interface ScheduleIndex {
	byId: Map<string, string>;
	byEmail: Map<string, string>;
}

/**
 * Records of one source assigned to roster entries, one record per entry at most
 */
interface EntryClaims<T> {
	byKey: Map<string, T>;
	/** Entries several records resolved to with none matched by the stored id */
	contested: Set<string>;
	/** Records that lost their entry to another record, per entry key */
	conflictsByKey: Map<string, number>;
	unmatched: number;
	conflicts: number;
}

/**
 * Keeps the roster in step with the HR system and the tracker.
 */
@Injectable()
export class RosterSyncService {
	private readonly logger = new Logger(RosterSyncService.name);
	private readonly timezone: string;

	constructor(
		@InjectRepository(RosterEntry)
		private readonly rosterRepository: Repository<RosterEntry>,
		private readonly rosterService: RosterService,
		private readonly resolver: IdentityResolverService,
		private readonly normalizer: HierarchyNormalizerService,
		private readonly lockService: SyncLockService,
		private readonly contextFactory: SyncRunContextFactory,
		private readonly eventEmitter: EventEmitter2,
		private readonly configService: ConfigService,
		@Inject(CLOCK) private readonly clock: Clock,
	) {
		this.timezone = this.configService.get<string>('TIMEZONE') || CalendarDayUtil.DEFAULT_TIMEZONE;
	}

	syncRoster(): Promise<ExclusiveRunResult<SyncSummary>> {
		return this.lockService.runExclusive(ROSTER_SYNC_LOCK, () => this.runRosterSync());
	}

	/**
	 * Sync a single roster entry from the HR snapshot and the tracker users.
	 * Shares the roster sync guard, so it never runs next to a full sync.
	 */
	syncEntry(key: string): Promise<ExclusiveRunResult<SyncSummary>> {
		return this.lockService.runExclusive(ROSTER_SYNC_LOCK, () => this.runEntrySync(key));
	}

	private async runEntrySync(key: string): Promise<SyncSummary> {
		const entry = await this.rosterService.findOne(key);
		const context = this.contextFactory.create('roster_sync_entry');
		const summary = this.emptySummary(context);

		const [hrSnapshot, trackerSnapshot] = await Promise.all([context.getHrEmployees(), context.getTrackerUsers()]);
		const roster = await this.rosterRepository.find();

		if (hrSnapshot.ok) {
			const hrById = new Map(hrSnapshot.records.map((employee) => [employee.externalId, employee]));
			const claims = this.claimEntries(hrSnapshot.records, roster, UpstreamSource.HR, context);
			const employee = claims.byKey.get(entry.key);
			if (employee) {
				await this.mergeHrEmployee(employee, entry.key, hrById, summary);
			}
			summary.conflicts.hr = claims.conflictsByKey.get(entry.key) ?? 0;
		} else {
			summary.sourceErrors.hr = hrSnapshot.error;
		}

		if (trackerSnapshot.ok) {
			const schedules = await this.loadSchedules(context);
			const claims = this.claimEntries(trackerSnapshot.records, roster, UpstreamSource.TRACKER, context);
			const user = claims.byKey.get(entry.key);
			if (user) {
				await this.mergeTrackerUser(user, entry.key, schedules, summary);
			}
			summary.conflicts.tracker = claims.conflictsByKey.get(entry.key) ?? 0;
		} else {
			summary.sourceErrors.tracker = trackerSnapshot.error;
		}

		summary.finishedAt = this.clock.now();
		this.logger.log(`[${context.runId}] Synced ${key}: ${JSON.stringify(this.countsOf(summary))}`);
		return summary;
	}

	private async runRosterSync(): Promise<SyncSummary> {
		const context = this.contextFactory.create('roster_sync');
		const summary = this.emptySummary(context);
		this.logger.log(`[${context.runId}] Starting roster sync`);

		const [hrSnapshot, trackerSnapshot] = await Promise.all([context.getHrEmployees(), context.getTrackerUsers()]);
		const roster = await this.rosterRepository.find();
		const seenInHr = new Set<string>();

		if (hrSnapshot.ok) {
			const hrById = new Map(hrSnapshot.records.map((employee) => [employee.externalId, employee]));
			const claims = this.claimEntries(hrSnapshot.records, roster, UpstreamSource.HR, context);
			summary.unmatched.hr = claims.unmatched;
			summary.conflicts.hr = claims.conflicts;
			// A contested entry is still listed by HR and must not be archived
			claims.contested.forEach((key) => seenInHr.add(key));

			for (const [key, employee] of claims.byKey) {
				seenInHr.add(key);
				await this.mergeHrEmployee(employee, key, hrById, summary);
			}
		} else {
			summary.sourceErrors.hr = hrSnapshot.error;
			this.logger.warn(`[${context.runId}] HR snapshot failed, HR merge and archiving skipped: ${hrSnapshot.error}`);
		}

		if (trackerSnapshot.ok) {
			const schedules = await this.loadSchedules(context);
			const claims = this.claimEntries(trackerSnapshot.records, roster, UpstreamSource.TRACKER, context);
			summary.unmatched.tracker = claims.unmatched;
			summary.conflicts.tracker = claims.conflicts;

			for (const [key, user] of claims.byKey) {
				await this.mergeTrackerUser(user, key, schedules, summary);
			}
		} else {
			summary.sourceErrors.tracker = trackerSnapshot.error;
			this.logger.warn(`[${context.runId}] Tracker snapshot failed, tracker merge skipped: ${trackerSnapshot.error}`);
		}

		// Only entries that were once linked to HR can drop out of it
		if (hrSnapshot.ok) {
			for (const entry of roster) {
				if (entry.archived || !entry.hrSystemId || seenInHr.has(entry.key)) continue;
				await this.archiveEntry(entry.key, summary);
			}
		}

		summary.finishedAt = this.clock.now();
		this.logger.log(`[${context.runId}] Roster sync completed: ${JSON.stringify(this.countsOf(summary))}`);

		const event: SyncCompletedEvent = { runId: context.runId, summary: this.countsOf(summary) };
		this.eventEmitter.emit(AuditEvents.ROSTER_SYNCED, event);
		return summary;
	}

	/**
	 * Resolve every record of one source and give each roster entry at most one of them.
	 *
	 * When several records land on the same entry, the one matched by the stored source
	 * id keeps it and the others are conflicts. Without such a record the entry is
	 * contested: none of them is merged and all count as conflicts.
	 */
	private claimEntries<T extends RawIdentity>(
		records: readonly T[],
		roster: readonly RosterEntry[],
		source: UpstreamSource,
		context: SyncRunContext,
	): EntryClaims<T> {
		const claims: EntryClaims<T> = {
			byKey: new Map(),
			contested: new Set(),
			conflictsByKey: new Map(),
			unmatched: 0,
			conflicts: 0,
		};
		const candidates = new Map<string, { record: T; byId: boolean }[]>();

		for (const record of records) {
			const { entry, matchedBy } = this.resolver.explain(record, roster, source);
			if (!entry) {
				claims.unmatched++;
				continue;
			}
			const list = candidates.get(entry.key) ?? [];
			list.push({ record, byId: matchedBy === 'id' });
			candidates.set(entry.key, list);
		}

		for (const [key, list] of candidates) {
			if (list.length === 1) {
				claims.byKey.set(key, list[0].record);
				continue;
			}

			const byId = list.filter((candidate) => candidate.byId);
			let lost = list.length;
			if (byId.length === 1) {
				claims.byKey.set(key, byId[0].record);
				lost--;
			} else {
				claims.contested.add(key);
			}
			claims.conflictsByKey.set(key, lost);
			claims.conflicts += lost;
			this.logger.warn(
				`[${context.runId}] ${list.length} ${source} records resolve to ${key}: ${list.map(({ record }) => record.externalId ?? record.displayName).join(', ')}`,
			);
		}

		return claims;
	}

	private async mergeHrEmployee(
		employee: HrEmployee,
		key: string,
		hrById: Map<string, HrEmployee>,
		summary: SyncSummary,
	): Promise<void> {
		try {
			const current = await this.rosterService.findOne(key);
			const hierarchy = this.normalizer.normalizeHierarchy({
				division: employee.division,
				direction: employee.department,
				unit: current.unit,
				team: current.team,
				location: employee.location,
				managerName: employee.managerName,
			});
			const manager = employee.managerExternalId ? hrById.get(employee.managerExternalId) : undefined;

			const update: RosterFieldUpdate = {
				email: employee.email,
				hrSystemId: employee.externalId,
				...hierarchy.fields,
				managerName: employee.managerName,
				contactHandle: employee.contactHandle,
				managerContactHandle: manager?.contactHandle,
				hireDate: employee.hireDate,
				controlManager: hierarchy.controlManager === null ? undefined : [hierarchy.controlManager],
				archived: false,
			};

			await this.apply(key, update, summary);
		} catch (error) {
			this.recordError(key, error, summary);
		}
	}

	private async mergeTrackerUser(user: TrackerUser, key: string, schedules: ScheduleIndex, summary: SyncSummary): Promise<void> {
		try {
			const current = await this.rosterService.findOne(key);
			const planStart = schedules.byId.get(user.externalId) ?? (user.email ? schedules.byEmail.get(user.email) : undefined);

			await this.apply(
				key,
				{
					trackerUserId: user.externalId,
					// HR owns the email once an entry has one
					email: current.email ? undefined : user.email,
					planStart,
				},
				summary,
			);
		} catch (error) {
			this.recordError(key, error, summary);
		}
	}

	private async archiveEntry(key: string, summary: SyncSummary): Promise<void> {
		try {
			const result = await this.rosterService.applyMerge(key, { archived: true });
			summary.skippedFields += result.skippedFields.length;
			if (result.changedFields.includes('archived')) {
				summary.archived++;
				this.logger.log(`Archived ${key}: no longer listed by the HR system`);
			}
		} catch (error) {
			this.recordError(key, error, summary);
		}
	}

	private async apply(key: string, update: RosterFieldUpdate, summary: SyncSummary): Promise<void> {
		const result = await this.rosterService.applyMerge(key, update);
		summary.skippedFields += result.skippedFields.length;
		if (result.changedFields.length > 0) {
			summary.merged++;
			this.logger.debug(`Merged ${key}: ${result.changedFields.join(', ')}`);
		} else {
			summary.unchanged++;
		}
	}

	/**
	 * Today's tracker summary, falling back to the previous working day when today has no rows yet
	 */
	private async loadSchedules(context: SyncRunContext): Promise<ScheduleIndex> {
		const index: ScheduleIndex = { byId: new Map(), byEmail: new Map() };
		const today = CalendarDayUtil.dayOf(this.clock.now(), this.timezone);

		for (const day of [today, CalendarDayUtil.previousWorkday(today)]) {
			const snapshot = await context.getTrackerDay(day);
			if (!snapshot.ok || snapshot.records.length === 0) continue;

			for (const record of snapshot.records) {
				if (!record.scheduleStart) continue;
				if (record.externalId) index.byId.set(record.externalId, record.scheduleStart);
				if (record.email) index.byEmail.set(normalizeEmail(record.email), record.scheduleStart);
			}
			break;
		}

		return index;
	}

	private recordError(key: string, error: unknown, summary: SyncSummary): void {
		const message = getErrorMessage(error);
		summary.errored++;
		summary.errors.push({ key, error: message });
		this.logger.error(`Failed to sync roster entry ${key}: ${message}`);
	}

	private emptySummary(context: SyncRunContext): SyncSummary {
		return {
			runId: context.runId,
			merged: 0,
			unchanged: 0,
			skippedFields: 0,
			errored: 0,
			unmatched: { tracker: 0, hr: 0 },
			conflicts: { tracker: 0, hr: 0 },
			archived: 0,
			errors: [],
			sourceErrors: {},
			startedAt: context.startedAt,
			finishedAt: context.startedAt,
		};
	}

	private countsOf(summary: SyncSummary): Omit<SyncSummary, 'errors' | 'startedAt' | 'finishedAt'> {
		const { errors: _errors, startedAt: _startedAt, finishedAt: _finishedAt, ...counts } = summary;
		return counts;
	}
}
