/**
 * Scheduler data model. Timestamps are ISO-8601 strings (UTC) so records
 * round-trip through SQLite and `--json` output unchanged.
 */

export type DailyPlan = {
	/** Posting date (YYYY-MM-DD in the configured timezone). */
	date: string;
	targetCount: number;
	/** Strictly increasing slot instants inside the window for `date`. */
	slots: string[];
	/** Resume pointer: slots before this index have a terminal outcome. */
	consumedIndex: number;
	seed: string;
	createdAt: string;
};

export type QuotaRecord = {
	date: string;
	postsMadeToday: number;
	lastPostAt: string | null;
	/** Slot whose publish was claimed but not yet settled. */
	inflightSlot: number | null;
	/** First slot without a settled outcome. Source of truth for resume. */
	nextSlotIndex: number;
};

export const SLOT_OUTCOMES = [
	"success",
	"retriedThenSuccess",
	"failedFatal",
	"skippedQuotaExceeded",
	"skippedOutsideWindow",
] as const;

export type SlotOutcome = (typeof SLOT_OUTCOMES)[number];

export type ExecutionAttempt = {
	date: string;
	slotIndex: number;
	plannedAt: string;
	actualAt: string;
	outcome: SlotOutcome;
	/** Publish attempts made (0 for skips). */
	attempts: number;
	postId?: string;
	error?: string;
};

export type PostRecord = {
	postId: string;
	content: string;
	date: string;
	slotIndex: number;
	postedAt: string;
};

export type LoopState =
	| "Idle"
	| "AwaitingNextSlot"
	| "Publishing"
	| "Recording"
	| "DayRollover"
	| "Terminated";

export function isSuccessOutcome(outcome: SlotOutcome): boolean {
	return outcome === "success" || outcome === "retriedThenSuccess";
}
