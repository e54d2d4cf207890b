import { ArrayNotEmpty, ArrayUnique, IsArray, IsBoolean, IsInt, IsOptional, IsString, Min } from 'class-validator';

/**
 * Bulk control-manager assignment. Targets are the listed keys, or every entry in
 * the given team/division when no keys are listed.
 */
export class AssignControlManagerDto {
	@IsOptional()
	@IsArray()
	@IsString({ each: true })
	keys?: string[];

	@IsOptional()
	@IsString()
	team?: string;

	@IsOptional()
	@IsString()
	division?: string;

	@IsArray()
	@ArrayNotEmpty()
	@ArrayUnique()
	@IsInt({ each: true })
	@Min(1, { each: true })
	managerIds!: number[];

	@IsOptional()
	@IsBoolean()
	ignoreOverrides?: boolean;
}
