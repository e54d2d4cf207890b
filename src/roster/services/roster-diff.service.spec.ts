import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { CLOCK, Clock } from '../../lib/interfaces/clock.interface';
import { TrackerClientService } from '../../upstream/tracker/tracker-client.service';
import { HrClientService } from '../../upstream/hr/hr-client.service';
import { SyncRunContextFactory } from '../../upstream/sync-run.context';
import { HrEmployee, TrackerUser, UpstreamSnapshot } from '../../upstream/interfaces/upstream-records.interface';
import { RepositoryMock, repositoryMockFactory } from '../../../test/utils/mock-factory';
import { buildHrEmployee, buildRosterEntry, buildTrackerUser } from '../../../test/utils/fixtures';
import { HIERARCHY_TABLE, loadHierarchyTable } from '../config/hierarchy-table.config';
import { RosterEntry } from '../entities/roster-entry.entity';
import { IdentityResolverService } from './identity-resolver.service';
import { HierarchyNormalizerService } from './hierarchy-normalizer.service';
import { LATEST_DIFF_CACHE_KEY, RosterDiffService } from './roster-diff.service';

describe('RosterDiffService', () => {
	const now = new Date('2024-03-14T08:00:00Z');
	const clock: Clock = { now: () => now };

	let service: RosterDiffService;
	let repositoryMock: RepositoryMock;
	let tracker: TrackerClientService;
	let hr: HrClientService;
	const cacheManager = { get: jest.fn(), set: jest.fn(), del: jest.fn() };

	const ivan = buildRosterEntry({ key: 'ivan@example.com', email: 'ivan@example.com', trackerUserId: '77', hrSystemId: '101' });
	const anna = buildRosterEntry({ key: 'anna@example.com', name: 'Anna Lysenko', email: 'anna@example.com' });
	const marta = buildRosterEntry({ key: 'marta@example.com', name: 'Marta Lysenko', email: 'marta@example.com', ignored: true });
	const oleh = buildRosterEntry({ key: 'oleh@example.com', name: 'Oleh Hnatiuk', email: 'oleh@example.com', archived: true });
	const roster = [ivan, anna, marta, oleh];

	function ok<T>(records: T[]): UpstreamSnapshot<T> {
		return { ok: true, records, fetchedAt: now };
	}

	beforeEach(async () => {
		jest.clearAllMocks();
		tracker = new TrackerClientService(new ConfigService({}));
		hr = new HrClientService(new ConfigService({}));

		const module: TestingModule = await Test.createTestingModule({
			providers: [
				RosterDiffService,
				IdentityResolverService,
				HierarchyNormalizerService,
				SyncRunContextFactory,
				{ provide: getRepositoryToken(RosterEntry), useFactory: repositoryMockFactory },
				{ provide: CACHE_MANAGER, useValue: cacheManager },
				{ provide: CLOCK, useValue: clock },
				{ provide: ConfigService, useValue: new ConfigService({ TIMEZONE: 'UTC' }) },
				{ provide: HIERARCHY_TABLE, useValue: loadHierarchyTable('config/hierarchy.json') },
				{ provide: TrackerClientService, useValue: tracker },
				{ provide: HrClientService, useValue: hr },
			],
		}).compile();

		service = module.get<RosterDiffService>(RosterDiffService);
		repositoryMock = module.get(getRepositoryToken(RosterEntry));
	});

	describe('computeDiff', () => {
		const trackerUsers: TrackerUser[] = [
			buildTrackerUser({ externalId: '77', email: 'ivan.p@example.com' }),
			buildTrackerUser({ externalId: '90', email: 'zoe@example.com', displayName: 'Zoe Unknown', group: 'Apps' }),
			buildTrackerUser({ externalId: '91', email: 'marta@example.com', displayName: 'Marta Lysenko' }),
			buildTrackerUser({ externalId: '', email: null, displayName: ' ' }),
		];
		const hrEmployees: HrEmployee[] = [
			buildHrEmployee({ externalId: '101', email: 'ivan@example.com' }),
			buildHrEmployee({ externalId: '102', email: 'anna@example.com', displayName: 'Anna Lysenko' }),
			buildHrEmployee({ externalId: '103', email: 'oleh@example.com', displayName: 'Oleh Hnatiuk' }),
			buildHrEmployee({ externalId: '104', email: 'future@example.com', displayName: 'Future Hire', hireDate: '2024-04-01' }),
			buildHrEmployee({
				externalId: '105',
				email: 'bohdan@example.com',
				displayName: 'Bohdan Shevchenko',
				division: 'apps division',
				hireDate: '2024-03-14',
			}),
		];

		it('should report who is missing on each side', () => {
			const diff = service.computeDiff(ok(trackerUsers), ok(hrEmployees), roster);

			expect(diff.missingFromTracker).toEqual([
				{
					key: 'anna@example.com',
					name: 'Anna Lysenko',
					email: 'anna@example.com',
					trackerUserId: null,
					hrSystemId: null,
					division: null,
					team: null,
				},
			]);
			expect(diff.missingFromHr).toEqual([]);
			expect(diff.trackerOnly).toEqual([{ externalId: '90', displayName: 'Zoe Unknown', email: 'zoe@example.com', group: 'Apps' }]);
			expect(diff.hrOnly.map((record) => record.externalId)).toEqual(['105']);
			expect(diff.counts).toEqual({ missingFromTracker: 1, missingFromHr: 0, trackerOnly: 1, hrOnly: 1, dropped: 1 });
			expect(diff.errors).toEqual({});
			expect(diff.generatedAt).toBe(now);
		});

		it('should attach a hierarchy suggestion to HR-only employees', () => {
			const diff = service.computeDiff(ok([]), ok(hrEmployees), roster);

			expect(diff.hrOnly[0].suggestion).toEqual({
				fields: { division: 'Apps', direction: null, unit: null, team: null, location: null },
				changed: true,
				controlManager: 2,
				matchedBy: 'division',
			});
		});

		it('should report a failed side as an error instead of as missing people', () => {
			const failed: UpstreamSnapshot<TrackerUser> = { ok: false, error: 'timeout of 30000ms exceeded', failedAt: now };

			const diff = service.computeDiff(failed, ok(hrEmployees), roster);

			expect(diff.errors).toEqual({ tracker: 'timeout of 30000ms exceeded' });
			expect(diff.missingFromTracker).toEqual([]);
			expect(diff.trackerOnly).toEqual([]);
			expect(diff.hrOnly).toHaveLength(1);
		});

		it('should report an HR failure without touching the tracker side', () => {
			const failed: UpstreamSnapshot<HrEmployee> = { ok: false, error: 'HR returned 503', failedAt: now };

			const diff = service.computeDiff(ok(trackerUsers), failed, roster);

			expect(diff.errors).toEqual({ hr: 'HR returned 503' });
			expect(diff.missingFromHr).toEqual([]);
			expect(diff.hrOnly).toEqual([]);
			expect(diff.missingFromTracker.map((ref) => ref.key)).toEqual(['anna@example.com']);
			expect(diff.trackerOnly.map((record) => record.externalId)).toEqual(['90']);
			expect(diff.counts).toEqual({ missingFromTracker: 1, missingFromHr: 0, trackerOnly: 1, hrOnly: 0, dropped: 1 });
		});

		it('should not let an ignored namesake hide an active entry', () => {
			const active = buildRosterEntry({ key: 'ivan@example.com', email: 'ivan@example.com' });
			const namesake = buildRosterEntry({ key: 'petrenko ivan', name: 'Petrenko Ivan', email: null, ignored: true });
			const users = [buildTrackerUser({ externalId: '77', email: null, displayName: 'Ivan Petrenko' })];

			const diff = service.computeDiff(ok(users), ok([]), [active, namesake]);

			expect(diff.missingFromTracker).toEqual([]);
			expect(diff.trackerOnly).toEqual([]);
		});

		it('should absorb records that only an ignored entry matches', () => {
			const users = [buildTrackerUser({ externalId: '91', email: 'marta@example.com', displayName: 'Marta Lysenko' })];

			const diff = service.computeDiff(ok(users), ok([]), [marta]);

			expect(diff.trackerOnly).toEqual([]);
			expect(diff.missingFromTracker).toEqual([]);
		});

		it('should sort every list by name', () => {
			const users = [
				buildTrackerUser({ externalId: '90', email: 'zoe@example.com', displayName: 'Zoe Unknown' }),
				buildTrackerUser({ externalId: '92', email: 'adam@example.com', displayName: 'Adam Unknown' }),
			];

			const diff = service.computeDiff(ok(users), ok([]), roster);

			expect(diff.trackerOnly.map((record) => record.displayName)).toEqual(['Adam Unknown', 'Zoe Unknown']);
			expect(diff.missingFromHr.map((ref) => ref.name)).toEqual(['Anna Lysenko', 'Ivan Petrenko']);
		});
	});

	describe('getLatestDiff', () => {
		it('should serve the cached diff', async () => {
			const cached = service.computeDiff(ok([]), ok([]), []);
			cacheManager.get.mockResolvedValue(cached);
			const getUsers = jest.spyOn(tracker, 'getUsers');

			await expect(service.getLatestDiff()).resolves.toBe(cached);
			expect(getUsers).not.toHaveBeenCalled();
		});

		it('should recompute and cache when forced', async () => {
			jest.spyOn(tracker, 'getUsers').mockResolvedValue([buildTrackerUser({ externalId: '77' })]);
			jest.spyOn(hr, 'getEmployees').mockResolvedValue([buildHrEmployee({ externalId: '101' })]);
			repositoryMock.find.mockResolvedValue([ivan]);

			const diff = await service.getLatestDiff(true);

			expect(cacheManager.get).not.toHaveBeenCalled();
			expect(diff.counts).toEqual({ missingFromTracker: 0, missingFromHr: 0, trackerOnly: 0, hrOnly: 0, dropped: 0 });
			expect(cacheManager.set).toHaveBeenCalledWith(LATEST_DIFF_CACHE_KEY, diff, 300000);
		});
	});

	it('should drop the cached diff on invalidate', async () => {
		await service.invalidate();

		expect(cacheManager.del).toHaveBeenCalledWith(LATEST_DIFF_CACHE_KEY);
	});
});
