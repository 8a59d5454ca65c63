/**
 * Wall-clock helpers for a configured IANA timezone.
 *
 * All local-time maths goes through Intl.DateTimeFormat so the process
 * timezone (TZ) never leaks into scheduling decisions.
 */

import { ConfigError } from "../errors.js";
import { pad2 } from "../utils.js";

/** Injectable time source. The scheduler core never calls `new Date()` directly. */
export type Clock = {
	now(): Date;
};

export const systemClock: Clock = {
	now: () => new Date(),
};

/** Injectable sleep; resolves early when the signal aborts. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export type ZonedParts = {
	year: number;
	month: number;
	day: number;
	hour: number;
	minute: number;
	second: number;
};

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_MINUTE = 60_000;
const MINUTES_PER_DAY = 1440;

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
	let formatter = formatterCache.get(timeZone);
	if (!formatter) {
		formatter = new Intl.DateTimeFormat("en-US", {
			timeZone,
			year: "numeric",
			month: "2-digit",
			day: "2-digit",
			hour: "2-digit",
			minute: "2-digit",
			second: "2-digit",
			hourCycle: "h23",
		});
		formatterCache.set(timeZone, formatter);
	}
	return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
	try {
		getFormatter(timeZone);
		return true;
	} catch {
		return false;
	}
}

export function assertTimeZone(timeZone: string): void {
	if (!isValidTimeZone(timeZone)) {
		throw new ConfigError(`unknown timezone '${timeZone}'`);
	}
}

export function getZonedParts(date: Date, timeZone: string): ZonedParts {
	const parts = getFormatter(timeZone).formatToParts(date);
	const getPart = (type: Intl.DateTimeFormatPartTypes): number => {
		const value = parts.find((part) => part.type === type)?.value;
		return value ? Number(value) : 0;
	};
	return {
		year: getPart("year"),
		month: getPart("month"),
		day: getPart("day"),
		hour: getPart("hour"),
		minute: getPart("minute"),
		second: getPart("second"),
	};
}

export function toDateKey(parts: Pick<ZonedParts, "year" | "month" | "day">): string {
	return `${parts.year}-${pad2(parts.month)}-${pad2(parts.day)}`;
}

export function parseDateKey(dateKey: string): { year: number; month: number; day: number } {
	const match = DATE_KEY_PATTERN.exec(dateKey);
	if (!match) {
		throw new Error(`invalid date '${dateKey}' (expected YYYY-MM-DD)`);
	}
	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const candidate = new Date(Date.UTC(year, month - 1, day));
	if (candidate.getUTCMonth() !== month - 1 || candidate.getUTCDate() !== day) {
		throw new Error(`invalid date '${dateKey}'`);
	}
	return { year, month, day };
}

export function addDays(dateKey: string, days: number): string {
	const { year, month, day } = parseDateKey(dateKey);
	const shifted = new Date(Date.UTC(year, month - 1, day + days));
	return toDateKey({
		year: shifted.getUTCFullYear(),
		month: shifted.getUTCMonth() + 1,
		day: shifted.getUTCDate(),
	});
}

export function getTimezoneOffsetMinutes(date: Date, timeZone: string): number {
	const parts = getZonedParts(date, timeZone);
	const reconstructedUtcMs = Date.UTC(
		parts.year,
		parts.month - 1,
		parts.day,
		parts.hour,
		parts.minute,
		parts.second,
	);
	const wholeSecondsMs = date.getTime() - date.getUTCMilliseconds();
	return Math.round((reconstructedUtcMs - wholeSecondsMs) / MS_PER_MINUTE);
}

/**
 * Convert "minute `minute` counted from local midnight of `dateKey`" into an
 * instant. `minute` may exceed 1440 to address the following day(s).
 */
export function zonedTimeToUtc(dateKey: string, minute: number, timeZone: string): Date {
	const { year, month, day } = parseDateKey(dateKey);
	const dayOffset = Math.floor(minute / MINUTES_PER_DAY);
	const minuteOfDay = minute - dayOffset * MINUTES_PER_DAY;
	const utcGuessMs = Date.UTC(year, month - 1, day + dayOffset, 0, minuteOfDay, 0);

	const firstOffset = getTimezoneOffsetMinutes(new Date(utcGuessMs), timeZone);
	let timestamp = utcGuessMs - firstOffset * MS_PER_MINUTE;

	const secondOffset = getTimezoneOffsetMinutes(new Date(timestamp), timeZone);
	if (secondOffset !== firstOffset) {
		timestamp = utcGuessMs - secondOffset * MS_PER_MINUTE;
	}

	return new Date(timestamp);
}

/** Format an instant as local `YYYY-MM-DD HH:mm` in the given timezone. */
export function formatLocal(date: Date, timeZone: string): string {
	const parts = getZonedParts(date, timeZone);
	return `${toDateKey(parts)} ${pad2(parts.hour)}:${pad2(parts.minute)}`;
}
