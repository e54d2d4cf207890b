import { BadRequestException, ValidationPipe } from '@nestjs/common';

const validationPipe = new ValidationPipe({ transform: true, whitelist: true, forbidNonWhitelisted: true });

/**
 * Validate admin input against a class-validator DTO outside of an HTTP request.
 * Throws BadRequestException listing every constraint that failed.
 */
export async function validateDto<T extends object>(metatype: new () => T, value: unknown): Promise<T> {
	const result: unknown = await validationPipe.transform(value ?? {}, { type: 'body', metatype });
	if (!(result instanceof metatype)) {
		throw new BadRequestException(`Expected ${metatype.name} input`);
	}
	return result;
}
