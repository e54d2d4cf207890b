import { ArrayUnique, IsArray, IsBoolean, IsEmail, IsInt, IsNotEmpty, IsOptional, IsString, Matches, Min } from 'class-validator';

export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;
export const CALENDAR_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export class CreateRosterEntryDto {
	@IsString()
	@IsNotEmpty()
	name!: string;

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
	@IsBoolean()
	continuousSchedule?: boolean;

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
}
