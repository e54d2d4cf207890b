import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Between, LessThan, Repository } from 'typeorm';
import { CalendarDayUtil } from '../lib/utils/calendar-day.util';
import { validateDto } from '../lib/utils/validation.util';
import { AdminAction, AdminActionEvent, AuditEvents } from '../audit/audit.events';
import { RosterService } from '../roster/roster.service';
import { AttendanceRecord } from './entities/attendance-record.entity';
import { UpdateAttendanceRecordDto } from './dto/update-attendance-record.dto';
import { MANUAL_FIELDS, ManualField } from './interfaces/attendance-record.interface';
import { AttendanceSyncService } from './services/attendance-sync.service';

/**
 * Reads and admin transitions of attendance records.
 */
@Injectable()
export class AttendanceService {
	private readonly logger = new Logger(AttendanceService.name);

	constructor(
		@InjectRepository(AttendanceRecord)
		private readonly attendanceRepository: Repository<AttendanceRecord>,
		private readonly rosterService: RosterService,
		private readonly attendanceSyncService: AttendanceSyncService,
		private readonly eventEmitter: EventEmitter2,
	) {}

	findForDate(date: string): Promise<AttendanceRecord[]> {
		return this.attendanceRepository.find({
			where: { recordDate: CalendarDayUtil.assertValidDay(date) },
			order: { entryName: 'ASC' },
		});
	}

	findForEntry(entryKey: string, from: string, to: string): Promise<AttendanceRecord[]> {
		return this.attendanceRepository.find({
			where: {
				entryKey,
				recordDate: Between(CalendarDayUtil.assertValidDay(from), CalendarDayUtil.assertValidDay(to)),
			},
			order: { recordDate: 'ASC' },
		});
	}

	async findOne(uid: number): Promise<AttendanceRecord> {
		const record = await this.attendanceRepository.findOne({ where: { uid } });
		if (!record) {
			throw new NotFoundException(`Attendance record ${uid} not found`);
		}
		return record;
	}

	/**
	 * Admin correction: write the given fields and mark them manual
	 */
	async editRecord(uid: number, input: unknown, actor?: string): Promise<AttendanceRecord> {
		const dto = await validateDto(UpdateAttendanceRecordDto, input);
		const record = await this.findOne(uid);

		const edited: ManualField[] = MANUAL_FIELDS.filter((field) => dto[field] !== undefined);
		if (edited.length === 0) {
			throw new BadRequestException('No attendance fields to update');
		}

		Object.assign(record, dto);

		record.manualFields = [...new Set([...(record.manualFields ?? []), ...edited])];
		record.manualEdit = true;

		const saved = await this.attendanceRepository.save(record);
		this.emitAdminAction('attendance.record.edited', actor, {
			uid,
			entryKey: record.entryKey,
			recordDate: record.recordDate,
			fields: edited,
		});
		return saved;
	}

	/**
	 * Drop every manual edit of a record and recompute it from a fresh tracker fetch.
	 * Nothing is cleared when the upstream fetch fails.
	 */
	async resetManualEdits(uid: number, actor?: string): Promise<AttendanceRecord> {
		const record = await this.findOne(uid);
		const entry = await this.rosterService.findOne(record.entryKey);

		const cleared = Object.assign(new AttendanceRecord(), record, { manualFields: [], manualEdit: false });
		const recomputed = await this.attendanceSyncService.recomputeEntryDay(entry, record.recordDate, cleared);

		this.logger.log(`Manual edits reset for ${record.entryKey} on ${record.recordDate}`);
		this.emitAdminAction('attendance.record.reset', actor, {
			uid,
			entryKey: record.entryKey,
			recordDate: record.recordDate,
			fields: record.manualFields,
		});
		return recomputed;
	}

	/**
	 * Delete records older than `before` that carry no manual edit. Returns the number deleted.
	 */
	async pruneRecords(before: string, actor?: string): Promise<number> {
		const result = await this.attendanceRepository.delete({
			recordDate: LessThan(CalendarDayUtil.assertValidDay(before)),
			manualEdit: false,
		});
		const deleted = result.affected ?? 0;

		this.logger.log(`Pruned ${deleted} attendance records older than ${before}`);
		this.emitAdminAction('attendance.records.pruned', actor, { before, deleted });
		return deleted;
	}

	private emitAdminAction(action: AdminAction, actor: string | undefined, details: Record<string, unknown>): void {
		const event: AdminActionEvent = { action, actor: actor ?? null, details };
		this.eventEmitter.emit(AuditEvents.ADMIN_ACTION, event);
	}
}
