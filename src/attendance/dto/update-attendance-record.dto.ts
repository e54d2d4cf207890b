import { IsEnum, IsInt, IsOptional, IsString, Matches, MaxLength, Min } from 'class-validator';
import { AttendanceStatus } from '../../lib/enums/attendance.enums';
import { TIME_OF_DAY_PATTERN } from '../../roster/dto/create-roster-entry.dto';

/**
 * Admin correction of one attendance record. Every field given is marked manual.
 */
export class UpdateAttendanceRecordDto {
	@IsOptional()
	@Matches(TIME_OF_DAY_PATTERN, { message: 'scheduledStart must be HH:MM' })
	scheduledStart?: string;

	@IsOptional()
	@Matches(TIME_OF_DAY_PATTERN, { message: 'actualStart must be HH:MM' })
	actualStart?: string;

	@IsOptional()
	@IsInt()
	@Min(0)
	minutesLate?: number;

	@IsOptional()
	@IsInt()
	@Min(0)
	nonProductiveMinutes?: number;

	@IsOptional()
	@IsInt()
	@Min(0)
	notCategorizedMinutes?: number;

	@IsOptional()
	@IsInt()
	@Min(0)
	productiveMinutes?: number;

	@IsOptional()
	@IsInt()
	@Min(0)
	totalMinutes?: number;

	@IsOptional()
	@IsInt()
	@Min(0, { message: 'correctedTotalMinutes must not be negative' })
	correctedTotalMinutes?: number;

	@IsOptional()
	@IsEnum(AttendanceStatus)
	status?: AttendanceStatus;

	@IsOptional()
	@IsString()
	@MaxLength(2000)
	notes?: string;

	@IsOptional()
	@IsString()
	@MaxLength(128)
	leaveReason?: string;
}
