import { PersistenceError } from "../errors.js";
import type { SqliteDatabase } from "../storage/db.js";
import {
	type DailyPlan,
	type ExecutionAttempt,
	type PostRecord,
	type QuotaRecord,
	SLOT_OUTCOMES,
	type SlotOutcome,
} from "./types.js";

/**
 * Everything a slot settles, written in one transaction so a crash leaves
 * either all of it or none of it.
 */
export type SlotCommit = {
	quota: QuotaRecord;
	attempt: ExecutionAttempt;
	post?: PostRecord;
};

export interface SchedulerStore {
	loadPlan(date: string): DailyPlan | null;
	savePlan(plan: DailyPlan): void;
	retirePlan(date: string, at: Date): void;
	loadQuota(date: string): QuotaRecord | null;
	saveQuota(record: QuotaRecord): void;
	commitSlot(commit: SlotCommit): void;
	listAttempts(date: string): ExecutionAttempt[];
	recentPosts(limit: number): PostRecord[];
}

type PlanRow = {
	date: string;
	target_count: number;
	slots: string;
	consumed_index: number;
	seed: string;
	created_at: number;
};

type QuotaRow = {
	date: string;
	posts_made: number;
	last_post_at: number | null;
	inflight_slot: number | null;
	next_slot_index: number;
};

type AttemptRow = {
	date: string;
	slot_index: number;
	planned_at: number;
	actual_at: number;
	outcome: string;
	attempts: number;
	post_id: string | null;
	error: string | null;
};

type PostRow = {
	post_id: string;
	content: string;
	date: string;
	slot_index: number;
	posted_at: number;
};

function toMs(iso: string): number {
	const ms = Date.parse(iso);
	if (Number.isNaN(ms)) {
		throw new PersistenceError(`invalid timestamp '${iso}'`);
	}
	return ms;
}

function toIso(ms: number): string {
	return new Date(ms).toISOString();
}

function parseSlots(row: PlanRow): string[] {
	const parsed: unknown = JSON.parse(row.slots);
	if (!Array.isArray(parsed) || !parsed.every((slot): slot is string => typeof slot === "string")) {
		throw new PersistenceError(`plan ${row.date} has malformed slots`);
	}
	return parsed;
}

function parseOutcome(row: AttemptRow): SlotOutcome {
	const outcome = SLOT_OUTCOMES.find((candidate) => candidate === row.outcome);
	if (!outcome) {
		throw new PersistenceError(`attempt for ${row.date}#${row.slot_index} has unknown outcome '${row.outcome}'`);
	}
	return outcome;
}

function rowToPlan(row: PlanRow): DailyPlan {
	return {
		date: row.date,
		targetCount: row.target_count,
		slots: parseSlots(row),
		consumedIndex: row.consumed_index,
		seed: row.seed,
		createdAt: toIso(row.created_at),
	};
}

function rowToQuota(row: QuotaRow): QuotaRecord {
	return {
		date: row.date,
		postsMadeToday: row.posts_made,
		lastPostAt: row.last_post_at === null ? null : toIso(row.last_post_at),
		inflightSlot: row.inflight_slot,
		nextSlotIndex: row.next_slot_index,
	};
}

function rowToAttempt(row: AttemptRow): ExecutionAttempt {
	return {
		date: row.date,
		slotIndex: row.slot_index,
		plannedAt: toIso(row.planned_at),
		actualAt: toIso(row.actual_at),
		outcome: parseOutcome(row),
		attempts: row.attempts,
		...(row.post_id ? { postId: row.post_id } : {}),
		...(row.error ? { error: row.error } : {}),
	};
}

function rowToPost(row: PostRow): PostRecord {
	return {
		postId: row.post_id,
		content: row.content,
		date: row.date,
		slotIndex: row.slot_index,
		postedAt: toIso(row.posted_at),
	};
}

/**
 * SQLite-backed scheduler state. Every failure surfaces as PersistenceError;
 * the loop treats that as fatal rather than risk double-posting.
 */
export class SqliteSchedulerStore implements SchedulerStore {
	constructor(private readonly db: SqliteDatabase) {}

	private run<T>(operation: string, fn: () => T): T {
		try {
			return fn();
		} catch (err) {
			if (err instanceof PersistenceError) throw err;
			throw new PersistenceError(`${operation} failed: ${String(err)}`, { cause: err });
		}
	}

	loadPlan(date: string): DailyPlan | null {
		return this.run("loadPlan", () => {
			const row = this.db
				.prepare(
					"SELECT date, target_count, slots, consumed_index, seed, created_at FROM daily_plans WHERE date = ? AND retired_at IS NULL",
				)
				.get(date) as PlanRow | undefined;
			return row ? rowToPlan(row) : null;
		});
	}

	savePlan(plan: DailyPlan): void {
		this.run("savePlan", () => {
			this.db
				.prepare(
					`INSERT INTO daily_plans (date, target_count, slots, consumed_index, seed, created_at, retired_at)
					VALUES (?, ?, ?, ?, ?, ?, NULL)
					ON CONFLICT(date) DO UPDATE SET
						target_count = excluded.target_count,
						slots = excluded.slots,
						consumed_index = excluded.consumed_index,
						seed = excluded.seed,
						created_at = excluded.created_at,
						retired_at = NULL`,
				)
				.run(
					plan.date,
					plan.targetCount,
					JSON.stringify(plan.slots),
					plan.consumedIndex,
					plan.seed,
					toMs(plan.createdAt),
				);
		});
	}

	retirePlan(date: string, at: Date): void {
		this.run("retirePlan", () => {
			this.db
				.prepare("UPDATE daily_plans SET retired_at = ? WHERE date = ? AND retired_at IS NULL")
				.run(at.getTime(), date);
		});
	}

	loadQuota(date: string): QuotaRecord | null {
		return this.run("loadQuota", () => {
			const row = this.db
				.prepare(
					"SELECT date, posts_made, last_post_at, inflight_slot, next_slot_index FROM quota_records WHERE date = ?",
				)
				.get(date) as QuotaRow | undefined;
			return row ? rowToQuota(row) : null;
		});
	}

	saveQuota(record: QuotaRecord): void {
		this.run("saveQuota", () => this.writeQuota(record));
	}

	private writeQuota(record: QuotaRecord): void {
		this.db
			.prepare(
				`INSERT INTO quota_records (date, posts_made, last_post_at, inflight_slot, next_slot_index, updated_at)
				VALUES (?, ?, ?, ?, ?, ?)
				ON CONFLICT(date) DO UPDATE SET
					posts_made = excluded.posts_made,
					last_post_at = excluded.last_post_at,
					inflight_slot = excluded.inflight_slot,
					next_slot_index = excluded.next_slot_index,
					updated_at = excluded.updated_at`,
			)
			.run(
				record.date,
				record.postsMadeToday,
				record.lastPostAt === null ? null : toMs(record.lastPostAt),
				record.inflightSlot,
				record.nextSlotIndex,
				Date.now(),
			);
	}

	private writeAttempt(attempt: ExecutionAttempt): void {
		this.db
			.prepare(
				`INSERT INTO slot_attempts (date, slot_index, planned_at, actual_at, outcome, attempts, post_id, error)
				VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
			)
			.run(
				attempt.date,
				attempt.slotIndex,
				toMs(attempt.plannedAt),
				toMs(attempt.actualAt),
				attempt.outcome,
				attempt.attempts,
				attempt.postId ?? null,
				attempt.error ?? null,
			);
	}

	commitSlot(commit: SlotCommit): void {
		this.run("commitSlot", () => {
			const tx = this.db.transaction((input: SlotCommit) => {
				this.writeQuota(input.quota);
				this.db
					.prepare(
						"UPDATE daily_plans SET consumed_index = MAX(consumed_index, ?) WHERE date = ? AND retired_at IS NULL",
					)
					.run(input.quota.nextSlotIndex, input.quota.date);
				this.writeAttempt(input.attempt);
				if (input.post) {
					this.db
						.prepare(
							`INSERT OR IGNORE INTO posts (post_id, content, date, slot_index, posted_at)
							VALUES (?, ?, ?, ?, ?)`,
						)
						.run(
							input.post.postId,
							input.post.content,
							input.post.date,
							input.post.slotIndex,
							toMs(input.post.postedAt),
						);
				}
			});
			tx(commit);
		});
	}

	listAttempts(date: string): ExecutionAttempt[] {
		return this.run("listAttempts", () => {
			const rows = this.db
				.prepare(
					"SELECT date, slot_index, planned_at, actual_at, outcome, attempts, post_id, error FROM slot_attempts WHERE date = ? ORDER BY id ASC",
				)
				.all(date) as AttemptRow[];
			return rows.map(rowToAttempt);
		});
	}

	recentPosts(limit: number): PostRecord[] {
		return this.run("recentPosts", () => {
			const rows = this.db
				.prepare(
					"SELECT post_id, content, date, slot_index, posted_at FROM posts ORDER BY posted_at DESC LIMIT ?",
				)
				.all(limit) as PostRow[];
			return rows.map(rowToPost);
		});
	}
}
