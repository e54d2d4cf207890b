import { ArrayUnique, IsArray, IsBoolean, IsEmail, IsInt, IsNotEmpty, IsOptional, IsString, Matches, Min } from 'class-validator';
import { CALENDAR_DAY_PATTERN, TIME_OF_DAY_PATTERN } from './create-roster-entry.dto';

/**
 * Admin edit of a roster entry. Every field given here becomes overridden.
 */
export class UpdateRosterEntryDto {
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	name?: string;

	@IsOptional()
	@IsEmail()
	email?: string;

	@IsOptional()
	@IsString()
	trackerUserId?: string;

	@IsOptional()
	@IsString()
	hrSystemId?: string;

	@IsOptional()
	@IsString()
	division?: string;

	@IsOptional()
	@IsString()
	direction?: string;

	@IsOptional()
	@IsString()
	unit?: string;

	@IsOptional()
	@IsString()
	team?: string;

	@IsOptional()
	@IsString()
	location?: string;

	@IsOptional()
	@Matches(TIME_OF_DAY_PATTERN, { message: 'planStart must be HH:MM' })
	planStart?: string;

	@IsOptional()
	@IsArray()
	@ArrayUnique()
	@IsInt({ each: true })
	@Min(1, { each: true })
	controlManager?: number[];

	@IsOptional()
	@IsString()
	contactHandle?: string;

	@IsOptional()
	@IsString()
	managerContactHandle?: string;

	@IsOptional()
	@IsString()
	managerName?: string;

	@IsOptional()
	@Matches(CALENDAR_DAY_PATTERN, { message: 'hireDate must be YYYY-MM-DD' })
	hireDate?: string;

	@IsOptional()
	@IsBoolean()
	archived?: boolean;

	/** Not an upstream field, so it carries no override flag */
	@IsOptional()
	@IsBoolean()
	continuousSchedule?: boolean;
}
