import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn, Unique, UpdateDateColumn } from 'typeorm';
import { AttendanceStatus } from '../../lib/enums/attendance.enums';
import { ManualField } from '../interfaces/attendance-record.interface';

@Entity('attendance_records')
@Unique(['entryKey', 'recordDate'])
@Index(['recordDate'])
export class AttendanceRecord {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ type: 'varchar', length: 255 })
	entryKey!: string;

	/** Calendar day, YYYY-MM-DD */
	@Column({ type: 'date' })
	recordDate!: string;

	@Column({ type: 'varchar', length: 5, nullable: true })
	scheduledStart!: string | null;

	@Column({ type: 'varchar', length: 5, nullable: true })
	actualStart!: string | null;

	@Column({ type: 'int', default: 0 })
	minutesLate!: number;

	@Column({
		type: 'enum',
		enum: AttendanceStatus,
		default: AttendanceStatus.ABSENT,
	})
	status!: AttendanceStatus;

	@Column({ type: 'int', default: 0 })
	nonProductiveMinutes!: number;

	@Column({ type: 'int', default: 0 })
	notCategorizedMinutes!: number;

	@Column({ type: 'int', default: 0 })
	productiveMinutes!: number;

	@Column({ type: 'int', default: 0 })
	totalMinutes!: number;

	@Column({ type: 'int', default: 0 })
	correctedTotalMinutes!: number;

	@Column({ type: 'text', nullable: true })
	notes!: string | null;

	@Column({ type: 'varchar', length: 128, nullable: true })
	leaveReason!: string | null;

	/** 0.5 for half-day leave, 1 for a full day */
	@Column({ type: 'float', nullable: true })
	halfDayAmount!: number | null;

	@Column({ type: 'simple-json' })
	manualFields!: ManualField[];

	@Column({ type: 'boolean', default: false })
	manualEdit!: boolean;

	@Column({ type: 'varchar', length: 255 })
	entryName!: string;

	@Column({ type: 'varchar', length: 128, nullable: true })
	division!: string | null;

	@Column({ type: 'varchar', length: 128, nullable: true })
	direction!: string | null;

	@Column({ type: 'varchar', length: 128, nullable: true })
	unit!: string | null;

	@Column({ type: 'varchar', length: 128, nullable: true })
	team!: string | null;

	@Column({ type: 'varchar', length: 128, nullable: true })
	location!: string | null;

	@Column({ type: 'simple-json' })
	controlManager!: number[];

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
