import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { type SqliteDatabase, openDatabase } from "../../src/storage/db.js";
import { QuotaTracker, emptyQuota } from "../../src/schedule/quota.js";
import { SqliteSchedulerStore } from "../../src/schedule/store.js";
import type { ExecutionAttempt } from "../../src/schedule/types.js";

const DATE = "2024-03-15";

function attemptFor(slotIndex: number, outcome: ExecutionAttempt["outcome"]): ExecutionAttempt {
	return {
		date: DATE,
		slotIndex,
		plannedAt: "2024-03-15T21:00:00.000Z",
		actualAt: "2024-03-15T21:00:01.000Z",
		outcome,
		attempts: outcome === "success" ? 1 : 0,
	};
}

describe("schedule/quota", () => {
	let db: SqliteDatabase;
	let store: SqliteSchedulerStore;

	beforeEach(() => {
		db = openDatabase(":memory:");
		store = new SqliteSchedulerStore(db);
	});

	afterEach(() => {
		db.close();
	});

	it("starts an unseen date at zero", () => {
		const tracker = new QuotaTracker(store, 5);
		expect(tracker.open(DATE)).toEqual(emptyQuota(DATE));
		expect(tracker.canPostNow(DATE, 4)).toBe(true);
	});

	it("refuses for the rest of the day once the cap is reached", () => {
		store.saveQuota({ date: DATE, postsMadeToday: 5, lastPostAt: "2024-03-15T23:00:00.000Z", inflightSlot: null, nextSlotIndex: 5 });
		const tracker = new QuotaTracker(store, 5);

		expect(tracker.canPostNow(DATE, 8)).toBe(false);
		tracker.recordSkip(DATE, 5, attemptFor(5, "skippedQuotaExceeded"));
		expect(tracker.canPostNow(DATE, 8)).toBe(false);
	});

	it("limits to the smaller of plan target and cap", () => {
		const tracker = new QuotaTracker(store, 5);
		expect(tracker.limit(3)).toBe(3);
		expect(tracker.limit(8)).toBe(5);
	});

	it("counts a claimed slot against the limit", () => {
		store.saveQuota({ date: DATE, postsMadeToday: 2, lastPostAt: null, inflightSlot: null, nextSlotIndex: 2 });
		const tracker = new QuotaTracker(store, 5);

		tracker.claimSlot(DATE, 2);
		expect(tracker.canPostNow(DATE, 3)).toBe(false);
		expect(store.loadQuota(DATE)?.inflightSlot).toBe(2);
		expect(() => tracker.claimSlot(DATE, 3)).toThrow("slot 2 on 2024-03-15 is still in flight");
	});

	it("records a success exactly once and clears the claim", () => {
		const tracker = new QuotaTracker(store, 5);
		tracker.claimSlot(DATE, 0);

		const next = tracker.recordSuccess(DATE, new Date("2024-03-15T21:00:01Z"), 0, {
			attempt: attemptFor(0, "success"),
		});

		expect(next).toEqual({
			date: DATE,
			postsMadeToday: 1,
			lastPostAt: "2024-03-15T21:00:01.000Z",
			inflightSlot: null,
			nextSlotIndex: 1,
		});
		expect(store.loadQuota(DATE)).toEqual(next);
		expect(store.listAttempts(DATE)).toHaveLength(1);
	});

	it("settles failures without counting them", () => {
		const tracker = new QuotaTracker(store, 5);
		tracker.claimSlot(DATE, 0);

		const next = tracker.recordFailure(DATE, 0, { ...attemptFor(0, "failedFatal"), error: "auth: 401" });

		expect(next.postsMadeToday).toBe(0);
		expect(next.inflightSlot).toBeNull();
		expect(next.nextSlotIndex).toBe(1);
	});

	it("switches records on rollover and reports the date left behind", () => {
		const tracker = new QuotaTracker(store, 5);
		expect(tracker.rolloverIfNeeded(DATE)).toBeNull();
		tracker.recordSuccess(DATE, new Date("2024-03-15T21:00:01Z"), 0, { attempt: attemptFor(0, "success") });

		expect(tracker.rolloverIfNeeded(DATE)).toBeNull();
		expect(tracker.rolloverIfNeeded("2024-03-16")).toBe(DATE);
		expect(tracker.record).toEqual(emptyQuota("2024-03-16"));
		expect(store.loadQuota(DATE)?.postsMadeToday).toBe(1);
	});

	it("counts an interrupted publish conservatively on recovery", () => {
		store.saveQuota({ date: DATE, postsMadeToday: 1, lastPostAt: "2024-03-15T20:10:00.000Z", inflightSlot: 1, nextSlotIndex: 1 });
		const tracker = new QuotaTracker(store, 5);
		const now = new Date("2024-03-15T21:05:00Z");

		const recovered = tracker.recoverInterrupted(DATE, now, "2024-03-15T21:00:00.000Z");

		expect(recovered).toEqual({
			date: DATE,
			slotIndex: 1,
			plannedAt: "2024-03-15T21:00:00.000Z",
			actualAt: "2024-03-15T21:05:00.000Z",
			outcome: "failedFatal",
			attempts: 0,
			error: "publish interrupted before its outcome was recorded; counted against quota",
		});
		expect(store.loadQuota(DATE)).toEqual({
			date: DATE,
			postsMadeToday: 2,
			lastPostAt: "2024-03-15T21:05:00.000Z",
			inflightSlot: null,
			nextSlotIndex: 2,
		});
		expect(tracker.recoverInterrupted(DATE, now, undefined)).toBeNull();
	});
});
