import { Test, TestingModule } from '@nestjs/testing';
import { SyncLockService } from '../../lib/services/sync-lock.service';
import { AuditEvents } from '../../audit/audit.events';
import { buildHrEmployee, buildRosterEntry, buildTrackerDay, buildTrackerUser } from '../../../test/utils/fixtures';
import { createRosterTestbed, RosterTestbed, TEST_NOW } from '../../../test/utils/roster-testing';
import { ROSTER_SYNC_LOCK, RosterSyncService } from './roster-sync.service';

describe('RosterSyncService', () => {
	let service: RosterSyncService;
	let lockService: SyncLockService;
	let testbed: RosterTestbed;

	const roster = [
		buildRosterEntry({
			key: 'ivan@example.com',
			email: 'ivan@example.com',
			hrSystemId: '101',
			team: 'Custom Team',
			overrides: { team: true },
		}),
		buildRosterEntry({ key: 'anna@example.com', name: 'Anna Lysenko', email: 'anna@example.com' }),
		buildRosterEntry({ key: 'gone@example.com', name: 'Gone Person', email: 'gone@example.com', hrSystemId: '150' }),
		buildRosterEntry({ key: 'manual person', name: 'Manual Person', email: null }),
	];

	const hrEmployees = [
		buildHrEmployee({
			externalId: '101',
			email: 'ivan@example.com',
			division: 'agency',
			department: 'media buying',
			managerExternalId: '7',
			managerName: 'Olena Kovalenko',
			contactHandle: '@ivanp',
			hireDate: '2023-05-02',
		}),
		buildHrEmployee({
			externalId: '7',
			email: 'olena@example.com',
			displayName: 'Olena Kovalenko',
			firstName: 'Olena',
			lastName: 'Kovalenko',
			contactHandle: '@olena',
		}),
		buildHrEmployee({ externalId: '102', email: 'anna@example.com', displayName: 'Anna Lysenko', division: 'Apps Division' }),
	];

	const trackerUsers = [
		buildTrackerUser({ externalId: '77', email: 'ivan@example.com' }),
		buildTrackerUser({ externalId: '78', email: null, displayName: 'Manual Person' }),
		buildTrackerUser({ externalId: '99', email: 'stranger@example.com', displayName: 'Total Stranger' }),
	];

	beforeEach(async () => {
		testbed = createRosterTestbed(roster);

		const module: TestingModule = await Test.createTestingModule({
			providers: [RosterSyncService, ...testbed.providers],
		}).compile();

		service = module.get<RosterSyncService>(RosterSyncService);
		lockService = module.get<SyncLockService>(SyncLockService);

		jest.spyOn(testbed.hr, 'getEmployees').mockResolvedValue(hrEmployees);
		jest.spyOn(testbed.tracker, 'getUsers').mockResolvedValue(trackerUsers);
		jest.spyOn(testbed.tracker, 'getSummaryByDay').mockImplementation(async (day) =>
			day === '2024-03-14' ? [buildTrackerDay({ externalId: '77', scheduleStart: '09:00' })] : [],
		);
	});

	afterEach(() => {
		jest.restoreAllMocks();
	});

	describe('syncRoster', () => {
		it('should merge both sources into the roster', async () => {
			const outcome = await service.syncRoster();

			expect(outcome.status).toBe('completed');
			if (outcome.status !== 'completed') return;
			const summary = outcome.result;

			expect(summary.merged).toBe(4);
			expect(summary.unchanged).toBe(0);
			expect(summary.skippedFields).toBe(1);
			expect(summary.unmatched).toEqual({ tracker: 1, hr: 1 });
			expect(summary.archived).toBe(1);
			expect(summary.errored).toBe(0);
			expect(summary.sourceErrors).toEqual({});
			expect(summary.finishedAt).toBe(TEST_NOW);

			const ivan = testbed.store.get('ivan@example.com');
			expect(ivan).toMatchObject({
				trackerUserId: '77',
				division: 'Agency',
				direction: 'Media Buying',
				unit: 'RTB',
				team: 'Custom Team',
				location: 'Remote Ukraine',
				planStart: '09:00',
				controlManager: [1],
				managerName: 'Olena Kovalenko',
				contactHandle: '@ivanp',
				managerContactHandle: '@olena',
				hireDate: '2023-05-02',
			});
			expect(testbed.store.get('anna@example.com')).toMatchObject({ hrSystemId: '102', division: 'Apps', controlManager: [2] });
			expect(testbed.store.get('manual person')).toMatchObject({ trackerUserId: '78', email: null, planStart: null });
			expect(testbed.store.get('gone@example.com')?.archived).toBe(true);
		});

		it('should change nothing on a second run over the same data', async () => {
			await service.syncRoster();

			const outcome = await service.syncRoster();

			expect(outcome.status === 'completed' && outcome.result).toMatchObject({
				merged: 0,
				unchanged: 4,
				skippedFields: 1,
				archived: 0,
			});
		});

		it('should not overwrite an email the entry already has with the tracker one', async () => {
			jest.spyOn(testbed.tracker, 'getUsers').mockResolvedValue([buildTrackerUser({ externalId: '77', email: 'other@example.com', displayName: 'Ivan Petrenko' })]);
			testbed.store.set('ivan@example.com', buildRosterEntry({ key: 'ivan@example.com', email: 'ivan@example.com', trackerUserId: '77' }));

			await service.syncRoster();

			expect(testbed.store.get('ivan@example.com')?.email).toBe('ivan@example.com');
		});

		it('should fall back to the previous working day for schedules', async () => {
			jest.spyOn(testbed.tracker, 'getSummaryByDay').mockImplementation(async (day) =>
				day === '2024-03-13' ? [buildTrackerDay({ externalId: '78', email: null, scheduleStart: '10:00' })] : [],
			);

			await service.syncRoster();

			expect(testbed.store.get('manual person')?.planStart).toBe('10:00');
			expect(testbed.store.get('ivan@example.com')?.planStart).toBeNull();
		});

		it('should skip HR merging and archiving when the HR fetch fails', async () => {
			jest.spyOn(testbed.hr, 'getEmployees').mockRejectedValue(new Error('HR returned 503'));

			const outcome = await service.syncRoster();

			expect(outcome.status === 'completed' && outcome.result).toMatchObject({
				merged: 2,
				archived: 0,
				sourceErrors: { hr: 'HR returned 503' },
			});
			expect(testbed.store.get('gone@example.com')?.archived).toBe(false);
		});

		it('should record a failing entry and carry on', async () => {
			const save = testbed.rosterRepository.save.getMockImplementation();
			testbed.rosterRepository.save.mockImplementation((entry: { key: string }) =>
				entry.key === 'anna@example.com' ? Promise.reject(new Error('Deadlock found')) : save?.(entry),
			);

			const outcome = await service.syncRoster();

			expect(outcome.status === 'completed' && outcome.result).toMatchObject({
				merged: 3,
				errored: 1,
				errors: [{ key: 'anna@example.com', error: 'Deadlock found' }],
			});
		});

		it('should announce the finished run', async () => {
			const emit = jest.spyOn(testbed.eventEmitter, 'emit');

			const outcome = await service.syncRoster();

			expect(outcome.status).toBe('completed');
			expect(emit).toHaveBeenCalledWith(
				AuditEvents.ROSTER_SYNCED,
				expect.objectContaining({ summary: expect.objectContaining({ merged: 4, archived: 1 }) }),
			);
		});

		it('should keep the account holding the stored id when duplicate accounts match one entry', async () => {
			testbed.store.set('ivan@example.com', buildRosterEntry({ key: 'ivan@example.com', email: 'ivan@example.com', hrSystemId: '101', trackerUserId: '77' }));
			jest.spyOn(testbed.tracker, 'getUsers').mockResolvedValue([
				buildTrackerUser({ externalId: '77', email: null, displayName: 'Ivan Petrenko' }),
				buildTrackerUser({ externalId: '88', email: null, displayName: 'Petrenko Ivan' }),
			]);

			await service.syncRoster();
			const outcome = await service.syncRoster();

			expect(outcome.status === 'completed' && outcome.result).toMatchObject({
				merged: 0,
				unmatched: { tracker: 0, hr: 1 },
				conflicts: { tracker: 1, hr: 0 },
			});
			expect(testbed.store.get('ivan@example.com')?.trackerUserId).toBe('77');
		});

		it('should merge none of several accounts that match an entry only by name', async () => {
			jest.spyOn(testbed.tracker, 'getUsers').mockResolvedValue([
				buildTrackerUser({ externalId: '87', email: null, displayName: 'Ivan Petrenko' }),
				buildTrackerUser({ externalId: '88', email: null, displayName: 'Petrenko Ivan' }),
			]);

			const outcome = await service.syncRoster();

			expect(outcome.status === 'completed' && outcome.result).toMatchObject({ conflicts: { tracker: 2, hr: 0 } });
			expect(testbed.store.get('ivan@example.com')?.trackerUserId).toBeNull();
		});

		it('should not archive an entry that two HR records contest', async () => {
			jest.spyOn(testbed.hr, 'getEmployees').mockResolvedValue([
				hrEmployees[0],
				buildHrEmployee({ externalId: '160', email: null, displayName: 'Gone Person' }),
				buildHrEmployee({ externalId: '161', email: null, displayName: 'Person Gone' }),
			]);

			const outcome = await service.syncRoster();

			expect(outcome.status === 'completed' && outcome.result).toMatchObject({ archived: 0, conflicts: { tracker: 0, hr: 2 } });
			expect(testbed.store.get('gone@example.com')).toMatchObject({ hrSystemId: '150', archived: false });
		});

		it('should refuse to start while another roster sync runs', async () => {
			const outer = await lockService.runExclusive(ROSTER_SYNC_LOCK, () => service.syncRoster());

			expect(outer).toEqual({ status: 'completed', result: { status: 'already_running', startedAt: TEST_NOW } });
		});
	});

	describe('syncEntry', () => {
		it('should merge only the requested entry', async () => {
			const outcome = await service.syncEntry('anna@example.com');

			expect(outcome.status === 'completed' && outcome.result.merged).toBe(1);
			expect(testbed.store.get('anna@example.com')?.hrSystemId).toBe('102');
			expect(testbed.store.get('ivan@example.com')?.trackerUserId).toBeNull();
		});

		it('should reject unknown keys', async () => {
			await expect(service.syncEntry('nobody@example.com')).rejects.toThrow('Roster entry nobody@example.com not found');
		});

		it('should refuse to start while a full roster sync runs', async () => {
			const outer = await lockService.runExclusive(ROSTER_SYNC_LOCK, () => service.syncEntry('anna@example.com'));

			expect(outer).toEqual({ status: 'completed', result: { status: 'already_running', startedAt: TEST_NOW } });
			expect(testbed.store.get('anna@example.com')?.hrSystemId).toBeNull();
		});
	});
});
