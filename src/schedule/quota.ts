import { getChildLogger } from "../logging.js";
import type { SchedulerStore } from "./store.js";
import type { ExecutionAttempt, PostRecord, QuotaRecord } from "./types.js";

const logger = getChildLogger({ module: "quota" });

export function emptyQuota(date: string): QuotaRecord {
	return { date, postsMadeToday: 0, lastPostAt: null, inflightSlot: null, nextSlotIndex: 0 };
}

/**
 * Per-date post counter.
 *
 * Every mutation is a single store write (or transaction), so the persisted
 * record is always one of: before the claim, claimed, settled.
 */
export class QuotaTracker {
	private current: QuotaRecord | null = null;

	constructor(
		private readonly store: SchedulerStore,
		private readonly maxPostsPerDay: number,
	) {}

	/** Load (or start) the record for `date` and make it current. */
	open(date: string): QuotaRecord {
		if (this.current?.date === date) return this.current;
		this.current = this.store.loadQuota(date) ?? emptyQuota(date);
		return this.current;
	}

	get record(): QuotaRecord | null {
		return this.current;
	}

	/** Effective daily limit for a plan with `targetCount` slots. */
	limit(targetCount: number): number {
		return Math.min(targetCount, this.maxPostsPerDay);
	}

	canPostNow(date: string, targetCount: number): boolean {
		const record = this.open(date);
		const pending = record.inflightSlot === null ? 0 : 1;
		return record.postsMadeToday + pending < this.limit(targetCount);
	}

	/**
	 * Switch to `date` if it differs from the current record. Returns the date
	 * that was left behind, or null when nothing changed.
	 */
	rolloverIfNeeded(date: string): string | null {
		const previous = this.current?.date ?? null;
		if (previous === date) return null;
		this.open(date);
		if (previous !== null) {
			logger.info({ from: previous, to: date }, "quota rolled over to new posting date");
		}
		return previous;
	}

	/** Persist the intent to publish `slotIndex` before any network call. */
	claimSlot(date: string, slotIndex: number): QuotaRecord {
		const record = this.open(date);
		if (record.inflightSlot !== null) {
			throw new Error(`slot ${record.inflightSlot} on ${date} is still in flight`);
		}
		const next = { ...record, inflightSlot: slotIndex };
		this.store.saveQuota(next);
		this.current = next;
		return next;
	}

	recordSuccess(
		date: string,
		timestamp: Date,
		slotIndex: number,
		details: { attempt: ExecutionAttempt; post?: PostRecord },
	): QuotaRecord {
		const record = this.open(date);
		const next: QuotaRecord = {
			date,
			postsMadeToday: record.postsMadeToday + 1,
			lastPostAt: timestamp.toISOString(),
			inflightSlot: null,
			nextSlotIndex: Math.max(record.nextSlotIndex, slotIndex + 1),
		};
		this.store.commitSlot({ quota: next, attempt: details.attempt, post: details.post });
		this.current = next;
		return next;
	}

	/** Settle a slot that was skipped without ever being claimed. */
	recordSkip(date: string, slotIndex: number, attempt: ExecutionAttempt): QuotaRecord {
		return this.settleWithoutPost(date, slotIndex, attempt);
	}

	/** Settle a slot that ended in a fatal failure, whether or not it was claimed. */
	recordFailure(date: string, slotIndex: number, attempt: ExecutionAttempt): QuotaRecord {
		return this.settleWithoutPost(date, slotIndex, attempt);
	}

	private settleWithoutPost(date: string, slotIndex: number, attempt: ExecutionAttempt): QuotaRecord {
		const record = this.open(date);
		const next: QuotaRecord = {
			...record,
			inflightSlot: null,
			nextSlotIndex: Math.max(record.nextSlotIndex, slotIndex + 1),
		};
		this.store.commitSlot({ quota: next, attempt });
		this.current = next;
		return next;
	}

	/**
	 * Settle a publish claimed by a previous process that never recorded an
	 * outcome. It may have reached the platform, so it counts against the
	 * quota and is never published again.
	 */
	recoverInterrupted(date: string, now: Date, plannedAt: string | undefined): ExecutionAttempt | null {
		const record = this.open(date);
		const slotIndex = record.inflightSlot;
		if (slotIndex === null) return null;

		const attempt: ExecutionAttempt = {
			date,
			slotIndex,
			plannedAt: plannedAt ?? now.toISOString(),
			actualAt: now.toISOString(),
			outcome: "failedFatal",
			attempts: 0,
			error: "publish interrupted before its outcome was recorded; counted against quota",
		};
		const next: QuotaRecord = {
			date,
			postsMadeToday: record.postsMadeToday + 1,
			lastPostAt: now.toISOString(),
			inflightSlot: null,
			nextSlotIndex: Math.max(record.nextSlotIndex, slotIndex + 1),
		};
		this.store.commitSlot({ quota: next, attempt });
		this.current = next;
		logger.warn({ date, slotIndex }, "settled interrupted publish conservatively");
		return attempt;
	}
}
