import { describe, expect, it } from "vitest";

import {
	addDays,
	formatLocal,
	getTimezoneOffsetMinutes,
	getZonedParts,
	isValidTimeZone,
	parseDateKey,
	zonedTimeToUtc,
} from "../../src/schedule/clock.js";

describe("schedule/clock", () => {
	it("reads wall-clock parts in the requested zone", () => {
		const instant = new Date("2024-03-15T16:05:09Z");
		expect(getZonedParts(instant, "Asia/Taipei")).toEqual({
			year: 2024,
			month: 3,
			day: 16,
			hour: 0,
			minute: 5,
			second: 9,
		});
	});

	it("computes offsets including daylight saving", () => {
		expect(getTimezoneOffsetMinutes(new Date("2024-03-15T12:00:00Z"), "Asia/Taipei")).toBe(480);
		expect(getTimezoneOffsetMinutes(new Date("2024-01-15T12:00:00Z"), "America/New_York")).toBe(-300);
		expect(getTimezoneOffsetMinutes(new Date("2024-07-15T12:00:00Z"), "America/New_York")).toBe(-240);
	});

	it("converts local minutes to instants, past midnight too", () => {
		expect(zonedTimeToUtc("2024-03-15", 21 * 60, "Asia/Taipei").toISOString()).toBe(
			"2024-03-15T13:00:00.000Z",
		);
		expect(zonedTimeToUtc("2024-03-15", 26 * 60, "Asia/Taipei").toISOString()).toBe(
			"2024-03-15T18:00:00.000Z",
		);
		expect(zonedTimeToUtc("2024-07-01", 21 * 60 + 30, "America/New_York").toISOString()).toBe(
			"2024-07-02T01:30:00.000Z",
		);
		expect(zonedTimeToUtc("2024-12-31", 25 * 60, "UTC").toISOString()).toBe("2025-01-01T01:00:00.000Z");
	});

	it("formats local time", () => {
		expect(formatLocal(new Date("2024-03-15T17:30:00Z"), "Asia/Taipei")).toBe("2024-03-16 01:30");
	});

	it("adds days across month and year ends", () => {
		expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
		expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
		expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
	});

	it("rejects malformed and impossible dates", () => {
		expect(() => parseDateKey("20240101")).toThrow("expected YYYY-MM-DD");
		expect(() => parseDateKey("2023-02-29")).toThrow("invalid date '2023-02-29'");
		expect(parseDateKey("2024-02-29")).toEqual({ year: 2024, month: 2, day: 29 });
	});

	it("validates timezone names", () => {
		expect(isValidTimeZone("Asia/Taipei")).toBe(true);
		expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
	});
});
