import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ServiceUnavailableException } from '@nestjs/common';
import { AttendanceStatus } from '../../lib/enums/attendance.enums';
import { ExclusiveRunResult, SyncLockService } from '../../lib/services/sync-lock.service';
import { AuditEvents } from '../../audit/audit.events';
import { LeaveDay, TrackerDayRecord } from '../../upstream/interfaces/upstream-records.interface';
import { RepositoryMock, repositoryMockFactory } from '../../../test/utils/mock-factory';
import { buildAttendanceRecord, buildRosterEntry, buildTrackerDay } from '../../../test/utils/fixtures';
import { createRosterTestbed, RosterTestbed } from '../../../test/utils/roster-testing';
import { AttendanceRecord } from '../entities/attendance-record.entity';
import { AttendanceSyncSummary } from '../interfaces/attendance-record.interface';
import { AttendanceCalculatorService } from './attendance-calculator.service';
import { ATTENDANCE_SYNC_LOCK, AttendanceSyncService } from './attendance-sync.service';

describe('AttendanceSyncService', () => {
	let service: AttendanceSyncService;
	let lockService: SyncLockService;
	let attendanceRepository: RepositoryMock;
	let testbed: RosterTestbed;

	const ivan = buildRosterEntry({ key: 'ivan@example.com', email: 'ivan@example.com', trackerUserId: '77', planStart: '09:00' });
	const anna = buildRosterEntry({ key: 'anna@example.com', name: 'Anna Lysenko', email: 'anna@example.com' });
	const marta = buildRosterEntry({ key: 'marta@example.com', name: 'Marta Lysenko', email: 'marta@example.com', ignored: true });
	const oleh = buildRosterEntry({ key: 'oleh@example.com', name: 'Oleh Hnatiuk', email: 'oleh@example.com', archived: true });
	const nadia = buildRosterEntry({ key: 'nadia@example.com', name: 'Nadia Bilyk', email: 'nadia@example.com' });

	const ivanDay = buildTrackerDay({
		externalId: '77',
		email: 'ivan@example.com',
		timeStart: '09:15',
		scheduleStart: '09:00',
		productiveSeconds: 28800,
		nonProductiveSeconds: 3600,
		notCategorizedSeconds: 1800,
		totalSeconds: 34200,
	});
	const trackerRows: TrackerDayRecord[] = [
		ivanDay,
		buildTrackerDay({ externalId: '80', email: 'marta@example.com', displayName: 'Marta Lysenko', totalSeconds: 600 }),
		buildTrackerDay({ externalId: '99', email: 'stranger@example.com', displayName: 'Total Stranger', totalSeconds: 600 }),
	];
	const leaves: LeaveDay[] = [{ email: 'anna@example.com', reason: 'Vacation', amount: 1 }];

	function completed<T>(outcome: ExclusiveRunResult<T>): T {
		if (outcome.status !== 'completed') {
			throw new Error(`Run did not complete: ${outcome.status}`);
		}
		return outcome.result;
	}

	function savedRecords(): AttendanceRecord[] {
		return attendanceRepository.save.mock.calls.map(([record]: [AttendanceRecord]) => record);
	}

	beforeEach(async () => {
		testbed = createRosterTestbed([ivan, anna, marta, oleh, nadia], { ATTENDANCE_GRACE_MINUTES: '10' });

		const module: TestingModule = await Test.createTestingModule({
			providers: [
				AttendanceSyncService,
				AttendanceCalculatorService,
				{ provide: getRepositoryToken(AttendanceRecord), useFactory: repositoryMockFactory },
				...testbed.providers,
			],
		}).compile();

		service = module.get<AttendanceSyncService>(AttendanceSyncService);
		lockService = module.get<SyncLockService>(SyncLockService);
		attendanceRepository = module.get(getRepositoryToken(AttendanceRecord));

		jest.spyOn(testbed.tracker, 'getSummaryByDay').mockResolvedValue(trackerRows);
		jest.spyOn(testbed.hr, 'getLeavesForDay').mockResolvedValue(leaves);
	});

	afterEach(() => {
		jest.restoreAllMocks();
	});

	describe('syncDay', () => {
		it('should write a record for every active roster entry', async () => {
			const summary = completed(await service.syncDay('2024-03-14', { includeAbsent: true }));

			expect(summary).toMatchObject({
				date: '2024-03-14',
				created: 3,
				updated: 0,
				skipped: 0,
				unmatched: 1,
				excluded: 1,
				errored: 0,
				byStatus: {
					[AttendanceStatus.PRESENT]: 0,
					[AttendanceStatus.LATE]: 1,
					[AttendanceStatus.ABSENT]: 1,
					[AttendanceStatus.LEAVE]: 1,
				},
				sourceErrors: {},
			});

			const byKey = new Map(savedRecords().map((record) => [record.entryKey, record]));
			expect(byKey.get('ivan@example.com')).toMatchObject({ status: AttendanceStatus.LATE, minutesLate: 15, totalMinutes: 570 });
			expect(byKey.get('anna@example.com')).toMatchObject({ status: AttendanceStatus.LEAVE, leaveReason: 'Vacation' });
			expect(byKey.get('nadia@example.com')).toMatchObject({ status: AttendanceStatus.ABSENT });
			expect([...byKey.keys()]).toEqual(['ivan@example.com', 'anna@example.com', 'nadia@example.com']);
		});

		it('should skip idle entries without a record when absences are not requested', async () => {
			const summary = completed(await service.syncDay('2024-03-14'));

			expect(summary.created).toBe(2);
			expect(summary.skipped).toBe(1);
			expect(savedRecords().map((record) => record.entryKey)).toEqual(['ivan@example.com', 'anna@example.com']);
		});

		it('should refresh an existing record of an idle entry', async () => {
			attendanceRepository.find.mockResolvedValue([buildAttendanceRecord({ uid: 4, entryKey: 'nadia@example.com', status: AttendanceStatus.PRESENT })]);

			const summary = completed(await service.syncDay('2024-03-14'));

			expect(summary.updated).toBe(1);
			expect(summary.skipped).toBe(0);
			expect(savedRecords().find((record) => record.entryKey === 'nadia@example.com')).toMatchObject({
				uid: 4,
				status: AttendanceStatus.ABSENT,
			});
		});

		it('should write nothing when the tracker summary is unavailable', async () => {
			jest.spyOn(testbed.tracker, 'getSummaryByDay').mockRejectedValue(new Error('timeout of 30000ms exceeded'));
			const emit = jest.spyOn(testbed.eventEmitter, 'emit');

			const summary = completed(await service.syncDay('2024-03-14', { includeAbsent: true }));

			expect(summary.sourceErrors).toEqual({ tracker: 'timeout of 30000ms exceeded' });
			expect(attendanceRepository.save).not.toHaveBeenCalled();
			expect(emit).toHaveBeenCalledWith(AuditEvents.ATTENDANCE_SYNCED, { runId: summary.runId, summary });
		});

		it('should not write absences when leave data is unavailable', async () => {
			jest.spyOn(testbed.hr, 'getLeavesForDay').mockRejectedValue(new Error('HR returned 503'));

			const summary = completed(await service.syncDay('2024-03-14', { includeAbsent: true }));

			expect(summary.sourceErrors).toEqual({ hr: 'HR returned 503' });
			expect(summary.created).toBe(1);
			expect(summary.skipped).toBe(2);
			expect(savedRecords().map((record) => record.entryKey)).toEqual(['ivan@example.com']);
		});

		it('should keep the row with more tracked time when two rows resolve to one entry', async () => {
			jest
				.spyOn(testbed.tracker, 'getSummaryByDay')
				.mockResolvedValue([ivanDay, buildTrackerDay({ externalId: null, email: 'ivan@example.com', timeStart: '08:00', totalSeconds: 600, productiveSeconds: 600 })]);

			completed(await service.syncDay('2024-03-14'));

			expect(savedRecords().find((record) => record.entryKey === 'ivan@example.com')?.totalMinutes).toBe(570);
		});

		it('should record a failing entry and carry on', async () => {
			attendanceRepository.save.mockImplementation((record: AttendanceRecord) =>
				record.entryKey === 'anna@example.com' ? Promise.reject(new Error('Deadlock found')) : Promise.resolve(record),
			);

			const summary = completed(await service.syncDay('2024-03-14', { includeAbsent: true }));

			expect(summary.errored).toBe(1);
			expect(summary.errors).toEqual([{ entryKey: 'anna@example.com', error: 'Deadlock found' }]);
			expect(summary.created).toBe(2);
		});

		it('should refuse to start while another attendance sync runs', async () => {
			const outer = await lockService.runExclusive(ATTENDANCE_SYNC_LOCK, () => service.syncDay('2024-03-14'));

			expect(completed(outer).status).toBe('already_running');
		});

		it('should reject an invalid day', () => {
			expect(() => service.syncDay('14.03.2024')).toThrow('Invalid calendar day "14.03.2024", expected YYYY-MM-DD');
		});
	});

	describe('syncRange', () => {
		it('should sync each day once in order', async () => {
			const summaries: AttendanceSyncSummary[] = completed(await service.syncRange('2024-03-13', '2024-03-14'));

			expect(summaries.map((summary) => summary.date)).toEqual(['2024-03-13', '2024-03-14']);
			expect(new Set(summaries.map((summary) => summary.runId)).size).toBe(1);
			expect(testbed.tracker.getSummaryByDay).toHaveBeenCalledTimes(2);
		});
	});

	describe('recomputeEntryDay', () => {
		it('should recompute one entry from a fresh fetch', async () => {
			const existing = buildAttendanceRecord({ uid: 7, entryKey: 'ivan@example.com', totalMinutes: 10 });

			const record = await service.recomputeEntryDay(ivan, '2024-03-14', existing);

			expect(record).toMatchObject({ uid: 7, totalMinutes: 570, status: AttendanceStatus.LATE });
			expect(attendanceRepository.save).toHaveBeenCalledTimes(1);
		});

		it('should fail without touching the record when the tracker is down', async () => {
			jest.spyOn(testbed.tracker, 'getSummaryByDay').mockRejectedValue(new Error('timeout'));

			await expect(service.recomputeEntryDay(ivan, '2024-03-14', null)).rejects.toBeInstanceOf(ServiceUnavailableException);
			expect(attendanceRepository.save).not.toHaveBeenCalled();
		});
	});
});
