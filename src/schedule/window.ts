/**
 * Posting window policy.
 *
 * Hours live on an extended wheel: the window is [start, end) with
 * 0 <= start <= 23 and start < end <= start + 24, so `end = 26` reads as
 * 02:00 the following day. Local hours are folded onto the same wheel
 * (h < start => h + 24) before comparing, which makes every check a plain
 * half-open interval test.
 */

import { ConfigError } from "../errors.js";
import {
	addDays,
	assertTimeZone,
	formatLocal,
	getZonedParts,
	toDateKey,
	zonedTimeToUtc,
} from "./clock.js";

export type PostingWindowInput = {
	startHour: number;
	endHour: number;
	primeStartHour: number;
	primeEndHour: number;
};

/** Normalised window: start <= primeStartHour < primeEndHour <= endHour <= start + 24. */
export type PostingWindow = Readonly<PostingWindowInput>;

export type WindowBounds = {
	start: Date;
	end: Date;
	primeStart: Date;
	primeEnd: Date;
};

export type TimeInfo = {
	localTime: string;
	timezone: string;
	postingDate: string;
	isPostingTime: boolean;
	isPrimeTime: boolean;
};

function isWholeHour(value: number, max: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= max;
}

/**
 * Validate and normalise raw window hours. Throws ConfigError listing every
 * problem found.
 */
export function normalizeWindow(input: PostingWindowInput): PostingWindow {
	const issues: string[] = [];
	const { startHour } = input;
	let { endHour, primeStartHour, primeEndHour } = input;

	if (!isWholeHour(startHour, 23)) issues.push(`postingHoursStart must be 0-23 (got ${startHour})`);
	if (!isWholeHour(endHour, 47)) issues.push(`postingHoursEnd must be 0-47 (got ${endHour})`);
	if (!isWholeHour(primeStartHour, 47)) issues.push(`primeStart must be 0-47 (got ${primeStartHour})`);
	if (!isWholeHour(primeEndHour, 47)) issues.push(`primeEnd must be 0-47 (got ${primeEndHour})`);
	if (issues.length > 0) {
		throw new ConfigError("invalid posting window", issues);
	}

	// "22 to 2" means 22 to 26
	if (endHour <= startHour && endHour < 24) {
		endHour += 24;
	}
	if (endHour <= startHour) {
		issues.push(`postingHoursEnd (${input.endHour}) must be after postingHoursStart (${startHour})`);
	} else if (endHour - startHour > 24) {
		issues.push(`posting window spans ${endHour - startHour}h; at most 24h is allowed`);
	}

	if (primeStartHour < startHour) {
		primeStartHour += 24;
	}
	if (primeEndHour <= primeStartHour && primeEndHour < 24) {
		primeEndHour += 24;
	}
	if (primeEndHour <= primeStartHour) {
		issues.push(`primeEnd (${input.primeEndHour}) must be after primeStart (${input.primeStartHour})`);
	} else if (primeStartHour < startHour || primeEndHour > endHour) {
		issues.push(
			`prime window ${input.primeStartHour}-${input.primeEndHour} is not inside posting window ${startHour}-${input.endHour}`,
		);
	}

	if (issues.length > 0) {
		throw new ConfigError("invalid posting window", issues);
	}

	return Object.freeze({ startHour, endHour, primeStartHour, primeEndHour });
}

/** Fold a local hour (0-23) onto the wheel that starts at `startHour`. */
export function foldHour(hour: number, startHour: number): number {
	return hour < startHour ? hour + 24 : hour;
}

export class WindowPolicy {
	readonly window: PostingWindow;
	readonly timeZone: string;

	constructor(window: PostingWindow, timeZone: string) {
		assertTimeZone(timeZone);
		this.window = window;
		this.timeZone = timeZone;
	}

	/** True when the window runs past local midnight. */
	get crossesMidnight(): boolean {
		return this.window.endHour > 24;
	}

	private foldedHour(now: Date): number {
		return foldHour(getZonedParts(now, this.timeZone).hour, this.window.startHour);
	}

	isPostingTime(now: Date): boolean {
		const folded = this.foldedHour(now);
		return this.window.startHour <= folded && folded < this.window.endHour;
	}

	isPrimeTime(now: Date): boolean {
		const folded = this.foldedHour(now);
		return this.window.primeStartHour <= folded && folded < this.window.primeEndHour;
	}

	/**
	 * The date whose window `now` belongs to. When the window crosses midnight
	 * the day boundary moves to the window's end hour, so 01:00 still belongs
	 * to the previous evening's window.
	 */
	postingDateOf(now: Date): string {
		const parts = getZonedParts(now, this.timeZone);
		const dateKey = toDateKey(parts);
		if (this.crossesMidnight && parts.hour < this.window.endHour - 24) {
			return addDays(dateKey, -1);
		}
		return dateKey;
	}

	/** Window edges in minutes counted from local midnight of the posting date. */
	minuteBounds(): { start: number; end: number; primeStart: number; primeEnd: number } {
		return {
			start: this.window.startHour * 60,
			end: this.window.endHour * 60,
			primeStart: this.window.primeStartHour * 60,
			primeEnd: this.window.primeEndHour * 60,
		};
	}

	windowBounds(date: string): WindowBounds {
		const minutes = this.minuteBounds();
		return {
			start: zonedTimeToUtc(date, minutes.start, this.timeZone),
			end: zonedTimeToUtc(date, minutes.end, this.timeZone),
			primeStart: zonedTimeToUtc(date, minutes.primeStart, this.timeZone),
			primeEnd: zonedTimeToUtc(date, minutes.primeEnd, this.timeZone),
		};
	}

	/** Instant at which `postingDateOf` stops returning `date`. */
	dateEnd(date: string): Date {
		return zonedTimeToUtc(date, Math.max(this.window.endHour * 60, 24 * 60), this.timeZone);
	}

	describeTime(now: Date): TimeInfo {
		return {
			localTime: formatLocal(now, this.timeZone),
			timezone: this.timeZone,
			postingDate: this.postingDateOf(now),
			isPostingTime: this.isPostingTime(now),
			isPrimeTime: this.isPrimeTime(now),
		};
	}
}

export function createWindowPolicy(input: PostingWindowInput & { timeZone: string }): WindowPolicy {
	return new WindowPolicy(normalizeWindow(input), input.timeZone);
}
