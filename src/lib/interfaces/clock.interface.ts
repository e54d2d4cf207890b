export const CLOCK = Symbol('CLOCK');

export interface Clock {
	now(): Date;
}

export class SystemClock implements Clock {
	now(): Date {
		return new Date();
	}
}
