import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { InjectRepository } from '@nestjs/typeorm';
import { Cache } from 'cache-manager';
import { Repository } from 'typeorm';
import { CLOCK, Clock } from '../../lib/interfaces/clock.interface';
import { UpstreamSource } from '../../lib/enums/upstream.enums';
import { CalendarDayUtil } from '../../lib/utils/calendar-day.util';
import { RawIdentity, HrEmployee, TrackerUser, UpstreamSnapshot } from '../../upstream/interfaces/upstream-records.interface';
import { SyncRunContextFactory } from '../../upstream/sync-run.context';
import { RosterEntry } from '../entities/roster-entry.entity';
import { DiffResult, HrOnlyRecord, RosterRef, TrackerOnlyRecord } from '../interfaces/roster-diff.interface';
import { IdentityResolverService } from './identity-resolver.service';
import { HierarchyNormalizerService } from './hierarchy-normalizer.service';

export const LATEST_DIFF_CACHE_KEY = 'roster:diff:latest';

interface SideResult<T> {
	matchedKeys: Set<string>;
	unmatched: T[];
	dropped: number;
}

function byDisplayName(left: { name?: string; displayName?: string }, right: { name?: string; displayName?: string }): number {
	return (left.name ?? left.displayName ?? '').localeCompare(right.name ?? right.displayName ?? '');
}

function toRef(entry: RosterEntry): RosterRef {
	return {
		key: entry.key,
		name: entry.name,
		email: entry.email,
		trackerUserId: entry.trackerUserId,
		hrSystemId: entry.hrSystemId,
		division: entry.division,
		team: entry.team,
	};
}

/**
 * Compares both upstream populations with the roster and reports who is missing where.
 */
@Injectable()
export class RosterDiffService {
	private readonly logger = new Logger(RosterDiffService.name);
	private readonly timezone: string;
	private readonly cacheTtl: number;

	constructor(
		@InjectRepository(RosterEntry)
		private readonly rosterRepository: Repository<RosterEntry>,
		@Inject(CACHE_MANAGER) private readonly cacheManager: Cache,
		@Inject(CLOCK) private readonly clock: Clock,
		private readonly configService: ConfigService,
		private readonly resolver: IdentityResolverService,
		private readonly normalizer: HierarchyNormalizerService,
		private readonly contextFactory: SyncRunContextFactory,
	) {
		this.timezone = this.configService.get<string>('TIMEZONE') || CalendarDayUtil.DEFAULT_TIMEZONE;
		this.cacheTtl = (Number(this.configService.get<string>('CACHE_EXPIRATION_TIME')) || 300) * 1000;
	}

	/**
	 * Pure reconciliation of two snapshots against the roster.
	 *
	 * Records are matched against the non-ignored roster first. Ignored entries are
	 * tried only for records left unmatched, so their upstream records are not
	 * reported either. Archived entries match but are never reported missing.
	 */
	computeDiff(
		trackerSnapshot: UpstreamSnapshot<TrackerUser>,
		hrSnapshot: UpstreamSnapshot<HrEmployee>,
		roster: readonly RosterEntry[],
	): DiffResult {
		const generatedAt = this.clock.now();
		const today = CalendarDayUtil.dayOf(generatedAt, this.timezone);
		const reportable = roster.filter((entry) => !entry.ignored && !entry.archived);
		const errors: DiffResult['errors'] = {};

		let missingFromTracker: RosterRef[] = [];
		let trackerOnly: TrackerOnlyRecord[] = [];
		let dropped = 0;

		if (trackerSnapshot.ok) {
			const side = this.matchSide(trackerSnapshot.records, roster, UpstreamSource.TRACKER);
			dropped += side.dropped;
			missingFromTracker = reportable.filter((entry) => !side.matchedKeys.has(entry.key)).map(toRef);
			trackerOnly = side.unmatched.map((user) => ({
				externalId: user.externalId,
				displayName: user.displayName,
				email: user.email,
				group: user.group,
			}));
		} else {
			errors.tracker = trackerSnapshot.error;
		}

		let missingFromHr: RosterRef[] = [];
		let hrOnly: HrOnlyRecord[] = [];

		if (hrSnapshot.ok) {
			const current = hrSnapshot.records.filter((employee) => !employee.hireDate || employee.hireDate <= today);
			const side = this.matchSide(current, roster, UpstreamSource.HR);
			dropped += side.dropped;
			missingFromHr = reportable.filter((entry) => !side.matchedKeys.has(entry.key)).map(toRef);
			hrOnly = side.unmatched.map((employee) => this.toHrOnly(employee));
		} else {
			errors.hr = hrSnapshot.error;
		}

		missingFromTracker.sort(byDisplayName);
		missingFromHr.sort(byDisplayName);
		trackerOnly.sort(byDisplayName);
		hrOnly.sort(byDisplayName);

		return {
			missingFromTracker,
			missingFromHr,
			trackerOnly,
			hrOnly,
			counts: {
				missingFromTracker: missingFromTracker.length,
				missingFromHr: missingFromHr.length,
				trackerOnly: trackerOnly.length,
				hrOnly: hrOnly.length,
				dropped,
			},
			errors,
			generatedAt,
		};
	}

	/**
	 * Cached diff for admin reads; `force` recomputes from fresh upstream snapshots.
	 */
	async getLatestDiff(force = false): Promise<DiffResult> {
		if (!force) {
			const cached = await this.cacheManager.get<DiffResult>(LATEST_DIFF_CACHE_KEY);
			if (cached) return cached;
		}

		const context = this.contextFactory.create('roster_diff');
		const [trackerSnapshot, hrSnapshot, roster] = await Promise.all([
			context.getTrackerUsers(),
			context.getHrEmployees(),
			this.rosterRepository.find(),
		]);

		const diff = this.computeDiff(trackerSnapshot, hrSnapshot, roster);
		this.logger.log(`[${context.runId}] Diff computed: ${JSON.stringify(diff.counts)}`);

		await this.cacheManager.set(LATEST_DIFF_CACHE_KEY, diff, this.cacheTtl);
		return diff;
	}

	async invalidate(): Promise<void> {
		await this.cacheManager.del(LATEST_DIFF_CACHE_KEY);
	}

	private matchSide<T extends RawIdentity>(records: readonly T[], roster: readonly RosterEntry[], source: UpstreamSource): SideResult<T> {
		const result: SideResult<T> = { matchedKeys: new Set(), unmatched: [], dropped: 0 };
		const active = roster.filter((entry) => !entry.ignored);
		const ignored = roster.filter((entry) => entry.ignored);

		for (const record of records) {
			const hasId = record.externalId !== null && record.externalId !== undefined && String(record.externalId).trim() !== '';
			if (!hasId && !record.email && !record.displayName.trim()) {
				this.logger.warn(`Dropping ${source} record with no id, email or name`);
				result.dropped++;
				continue;
			}

			const entry = this.resolver.resolve(record, active, source);
			if (entry) {
				result.matchedKeys.add(entry.key);
				continue;
			}
			if (!this.resolver.resolve(record, ignored, source)) {
				result.unmatched.push(record);
			}
		}

		return result;
	}

	private toHrOnly(employee: HrEmployee): HrOnlyRecord {
		return {
			externalId: employee.externalId,
			displayName: employee.displayName,
			email: employee.email,
			division: employee.division,
			department: employee.department,
			managerName: employee.managerName,
			location: employee.location,
			position: employee.position,
			contactHandle: employee.contactHandle,
			hireDate: employee.hireDate,
			suggestion: this.normalizer.normalizeHierarchy({
				division: employee.division,
				direction: employee.department,
				managerName: employee.managerName,
				location: employee.location,
			}),
		};
	}
}
