import { addDays, eachDayOfInterval, endOfMonth, format, getDay, isValid, parseISO, startOfMonth, subMonths } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

const DAY_FORMAT = 'yyyy-MM-dd';
const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar-day helpers. Days travel through the system as `YYYY-MM-DD` strings in the
 * organisation's timezone, never as Date objects, so that MySQL DATE columns and
 * upstream query parameters agree.
 */
export class CalendarDayUtil {
	static readonly DEFAULT_TIMEZONE = 'Europe/Kyiv';

	/**
	 * Check a `YYYY-MM-DD` string names a real day
	 */
	static isValidDay(value: string | null | undefined): value is string {
		if (!value || !DAY_PATTERN.test(value)) return false;
		const parsed = parseISO(value);
		return isValid(parsed) && format(parsed, DAY_FORMAT) === value;
	}

	static assertValidDay(value: string): string {
		if (!CalendarDayUtil.isValidDay(value)) {
			throw new Error(`Invalid calendar day "${value}", expected YYYY-MM-DD`);
		}
		return value;
	}

	/**
	 * The calendar day an instant falls on in the given timezone
	 */
	static dayOf(instant: Date, timezone: string = CalendarDayUtil.DEFAULT_TIMEZONE): string {
		return formatInTimeZone(instant, timezone, DAY_FORMAT);
	}

	static shift(day: string, days: number): string {
		return format(addDays(parseISO(CalendarDayUtil.assertValidDay(day)), days), DAY_FORMAT);
	}

	/**
	 * Every day from `from` to `to`, both inclusive. An inverted range is empty.
	 */
	static range(from: string, to: string): string[] {
		const start = parseISO(CalendarDayUtil.assertValidDay(from));
		const end = parseISO(CalendarDayUtil.assertValidDay(to));
		if (start > end) return [];

		return eachDayOfInterval({ start, end }).map((day) => format(day, DAY_FORMAT));
	}

	/**
	 * First and last day of the month before the one `day` falls in
	 */
	static previousMonth(day: string): { from: string; to: string } {
		const previous = subMonths(parseISO(CalendarDayUtil.assertValidDay(day)), 1);
		return {
			from: format(startOfMonth(previous), DAY_FORMAT),
			to: format(endOfMonth(previous), DAY_FORMAT),
		};
	}

	/**
	 * First day of the month `months` before the one `day` falls in.
	 * Used as the retention cut-off.
	 */
	static monthsBefore(day: string, months: number): string {
		return format(startOfMonth(subMonths(parseISO(CalendarDayUtil.assertValidDay(day)), months)), DAY_FORMAT);
	}

	/**
	 * The working day before `day`: Friday for a Monday, Saturday or Sunday
	 */
	static previousWorkday(day: string): string {
		const weekday = getDay(parseISO(CalendarDayUtil.assertValidDay(day)));
		if (weekday === 1) return CalendarDayUtil.shift(day, -3);
		if (weekday === 0) return CalendarDayUtil.shift(day, -2);
		return CalendarDayUtil.shift(day, -1);
	}
}
