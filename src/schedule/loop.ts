/**
 * Execution loop: walks the day's plan slot by slot, waits until each slot is
 * due, publishes through the retry wrapper and settles the outcome.
 *
 * Crash safety rests on two persisted fields of the quota record:
 * `inflightSlot` is written before any network call and `nextSlotIndex` is
 * advanced in the same transaction that records the outcome. A restart
 * therefore resumes at the first unsettled slot and never republishes one
 * that was already claimed.
 */

import type { RetrySettings } from "../config/config.js";
import type { CircuitBreaker } from "../infra/circuit-breaker.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { type RetryResult, withRetry } from "../infra/retry.js";
import { getChildLogger } from "../logging.js";
import { type PublishFailureClassification, classifyPublishError } from "../social/classify.js";
import type { ContentGenerator, PublishResult, Publisher } from "../social/types.js";
import { sleep as defaultSleep } from "../utils.js";
import { type Clock, type Sleeper, formatLocal, systemClock } from "./clock.js";
import { generatePlan, spacingFloorMinutes } from "./plan.js";
import { QuotaTracker } from "./quota.js";
import { createPlanRandom, generateSeed, type RandomSource, systemRandom } from "./random.js";
import { LoggingSlotReporter, type SlotReporter } from "./reporter.js";
import type { SchedulerSettings } from "./settings.js";
import type { SchedulerStore } from "./store.js";
import type { DailyPlan, ExecutionAttempt, LoopState, SlotOutcome } from "./types.js";
import type { WindowPolicy } from "./window.js";

const logger = getChildLogger({ module: "execution-loop" });

export type ExecutionLoopOptions = {
	policy: WindowPolicy;
	settings: SchedulerSettings;
	retry: RetrySettings;
	store: SchedulerStore;
	generator: ContentGenerator;
	publisher: Publisher;
	clock?: Clock;
	sleep?: Sleeper;
	/** Jitter source for retry backoff. */
	random?: RandomSource;
	reporter?: SlotReporter;
	/** How many recent posts the generator sees. */
	recentPostsContext?: number;
	/** Seed source for new plans when `settings.seed` is unset. */
	newSeed?: () => string;
	/** Pauses generate/publish after consecutive fatal slot failures. */
	breaker?: CircuitBreaker;
};

export type LoopExitReason = "stopped" | "budget-exhausted";

export type LoopSummary = {
	reason: LoopExitReason;
	published: number;
	outcomes: Record<SlotOutcome, number>;
};

function emptyOutcomeCounts(): Record<SlotOutcome, number> {
	return {
		success: 0,
		retriedThenSuccess: 0,
		failedFatal: 0,
		skippedQuotaExceeded: 0,
		skippedOutsideWindow: 0,
	};
}

export class ExecutionLoop {
	private currentState: LoopState = "Idle";
	private readonly controller = new AbortController();
	private readonly quota: QuotaTracker;
	private readonly clock: Clock;
	private readonly sleep: Sleeper;
	private readonly random: RandomSource;
	private readonly reporter: SlotReporter;
	private readonly newSeed: () => string;
	private readonly breaker: CircuitBreaker | null;
	private plan: DailyPlan | null = null;
	private deadlineMs: number | null = null;
	private stopReason: string | null = null;
	private outcomes = emptyOutcomeCounts();

	constructor(private readonly options: ExecutionLoopOptions) {
		this.quota = new QuotaTracker(options.store, options.settings.maxPostsPerDay);
		this.clock = options.clock ?? systemClock;
		this.sleep = options.sleep ?? defaultSleep;
		this.random = options.random ?? systemRandom;
		this.reporter = options.reporter ?? new LoggingSlotReporter();
		this.newSeed = options.newSeed ?? generateSeed;
		this.breaker = options.breaker ?? null;
	}

	get state(): LoopState {
		return this.currentState;
	}

	get currentPlan(): DailyPlan | null {
		return this.plan;
	}

	/**
	 * Ask the loop to finish. Pending waits end immediately; an in-flight
	 * generate or publish call completes and is recorded, but no further
	 * call starts.
	 */
	stop(reason = "stop requested"): void {
		if (this.controller.signal.aborted) return;
		this.stopReason = reason;
		logger.info({ reason, state: this.currentState }, "stopping execution loop");
		this.controller.abort();
	}

	private setState(next: LoopState): void {
		if (next !== this.currentState) {
			logger.debug({ from: this.currentState, to: next }, "loop state");
			this.currentState = next;
		}
	}

	private get stopped(): boolean {
		return this.controller.signal.aborted;
	}

	private budgetExpired(now: Date): boolean {
		return this.deadlineMs !== null && now.getTime() >= this.deadlineMs;
	}

	async run(): Promise<LoopSummary> {
		if (this.currentState !== "Idle") {
			throw new Error(`execution loop cannot run from state ${this.currentState}`);
		}
		const startedAt = this.clock.now();
		const budgetMs = this.options.settings.executionBudgetMs;
		this.deadlineMs = budgetMs > 0 ? startedAt.getTime() + budgetMs : null;
		this.outcomes = emptyOutcomeCounts();

		try {
			const reason = await this.loop();
			const summary: LoopSummary = {
				reason,
				published: this.outcomes.success + this.outcomes.retriedThenSuccess,
				outcomes: { ...this.outcomes },
			};
			logger.info({ ...summary, stopReason: this.stopReason }, "execution loop finished");
			return summary;
		} finally {
			this.setState("Terminated");
		}
	}

	private async loop(): Promise<LoopExitReason> {
		const { policy } = this.options;
		this.enterDate(policy.postingDateOf(this.clock.now()));

		for (;;) {
			if (this.stopped) return "stopped";
			const now = this.clock.now();
			if (this.budgetExpired(now)) return "budget-exhausted";

			const plan = this.requirePlan();
			const date = policy.postingDateOf(now);
			if (date !== plan.date) {
				this.rollover(plan, date);
				continue;
			}

			const index = this.nextIndex(plan);
			if (index >= plan.slots.length) {
				// Day is done; sleep toward the next posting date
				this.setState("AwaitingNextSlot");
				await this.waitUntil(policy.dateEnd(plan.date), now);
				continue;
			}

			if (!this.quota.canPostNow(plan.date, plan.targetCount)) {
				this.skip(plan, index, "skippedQuotaExceeded", now);
				continue;
			}

			const windowEnd = policy.windowBounds(plan.date).end;
			const due = this.dueTime(plan, index);
			if (due.getTime() >= windowEnd.getTime()) {
				this.skip(plan, index, "skippedOutsideWindow", now);
				continue;
			}

			if (now.getTime() < due.getTime()) {
				this.setState("AwaitingNextSlot");
				await this.waitUntil(due, now);
				continue;
			}

			if (now.getTime() >= windowEnd.getTime() || !policy.isPostingTime(now)) {
				this.skip(plan, index, "skippedOutsideWindow", now);
				continue;
			}

			if (this.breaker && !this.breaker.canAttempt()) {
				this.settleUnattempted(
					plan,
					index,
					now,
					`circuit open after ${this.breaker.consecutiveFailures} consecutive failures; retry in ${Math.ceil(this.breaker.remainingMs() / 1000)}s`,
				);
				continue;
			}

			await this.publishSlot(plan, index);
		}
	}

	private requirePlan(): DailyPlan {
		if (!this.plan) {
			throw new Error("execution loop has no plan loaded");
		}
		return this.plan;
	}

	private nextIndex(plan: DailyPlan): number {
		return Math.max(plan.consumedIndex, this.quota.record?.nextSlotIndex ?? 0);
	}

	private advance(plan: DailyPlan, index: number): void {
		this.plan = { ...plan, consumedIndex: Math.max(plan.consumedIndex, index + 1) };
	}

	/**
	 * Load or create the plan for `date`, settle a publish interrupted by a
	 * previous process and line the resume pointer up with the quota record.
	 */
	private enterDate(date: string): void {
		const { store, policy, settings } = this.options;
		const now = this.clock.now();
		this.quota.rolloverIfNeeded(date);

		let plan = store.loadPlan(date);
		if (!plan) {
			const seed = settings.seed ?? this.newSeed();
			plan = generatePlan(date, policy, settings, {
				random: createPlanRandom(date, seed),
				seed,
				createdAt: now,
				notBefore: now,
			});
			store.savePlan(plan);
			logger.info(
				{
					date,
					targetCount: plan.targetCount,
					slots: plan.slots.map((slot) => formatLocal(new Date(slot), policy.timeZone)),
				},
				"generated daily plan",
			);
		}

		const inflight = this.quota.record?.inflightSlot ?? null;
		const recovered = this.quota.recoverInterrupted(
			date,
			now,
			inflight === null ? undefined : plan.slots[inflight],
		);
		if (recovered) {
			this.count(recovered);
			this.reporter.report(recovered);
		}

		const resumeAt = Math.max(plan.consumedIndex, this.quota.record?.nextSlotIndex ?? 0);
		this.plan = { ...plan, consumedIndex: resumeAt };
		if (resumeAt > 0) {
			logger.info({ date, resumeAt, slots: plan.slots.length }, "resuming daily plan");
		}
	}

	/**
	 * Leave `plan` behind: whatever it still held is recorded as missed, the
	 * plan is retired and the new date starts from a fresh plan and quota.
	 */
	private rollover(plan: DailyPlan, date: string): void {
		this.setState("DayRollover");
		const now = this.clock.now();
		for (let index = this.nextIndex(plan); index < plan.slots.length; index++) {
			this.skip(plan, index, "skippedOutsideWindow", now);
		}
		this.options.store.retirePlan(plan.date, now);
		logger.info({ from: plan.date, to: date }, "posting date rolled over");
		this.plan = null;
		this.enterDate(date);
	}

	/** Slot time pushed back, if needed, to respect spacing since the last post. */
	private dueTime(plan: DailyPlan, index: number): Date {
		const slot = new Date(plan.slots[index]);
		const lastPostAt = this.quota.record?.lastPostAt;
		if (!lastPostAt) return slot;

		const last = new Date(lastPostAt);
		const { policy, settings } = this.options;
		const floorMinutes = spacingFloorMinutes(settings, policy.isPrimeTime(last), policy.isPrimeTime(slot));
		return new Date(Math.max(slot.getTime(), last.getTime() + floorMinutes * 60_000));
	}

	/** Sleep toward `target` in chunks so rollover, budget and stop are re-checked. */
	private async waitUntil(target: Date, now: Date): Promise<void> {
		let waitMs = Math.min(target.getTime() - now.getTime(), this.options.settings.maxSleepMs);
		if (this.deadlineMs !== null) {
			waitMs = Math.min(waitMs, this.deadlineMs - now.getTime());
		}
		await this.sleep(Math.max(1, waitMs), this.controller.signal);
	}

	private skip(plan: DailyPlan, index: number, outcome: SlotOutcome, now: Date): void {
		const attempt: ExecutionAttempt = {
			date: plan.date,
			slotIndex: index,
			plannedAt: plan.slots[index],
			actualAt: now.toISOString(),
			outcome,
			attempts: 0,
		};
		this.quota.recordSkip(plan.date, index, attempt);
		this.advance(plan, index);
		this.count(attempt);
		this.reporter.report(attempt);
	}

	/** Settle a due slot as failed without calling the generator or publisher. */
	private settleUnattempted(plan: DailyPlan, index: number, now: Date, error: string): void {
		const attempt: ExecutionAttempt = {
			date: plan.date,
			slotIndex: index,
			plannedAt: plan.slots[index],
			actualAt: now.toISOString(),
			outcome: "failedFatal",
			attempts: 0,
			error,
		};
		this.quota.recordFailure(plan.date, index, attempt);
		this.advance(plan, index);
		this.count(attempt);
		this.reporter.report(attempt);
	}

	private count(attempt: ExecutionAttempt): void {
		this.outcomes[attempt.outcome] += 1;
	}

	private retryOptions() {
		const { retry } = this.options;
		return {
			maxAttempts: retry.maxAttempts,
			baseDelayMs: retry.baseDelayMs,
			maxDelayMs: retry.maxDelayMs,
			jitter: retry.jitter,
			classify: classifyPublishError,
			canRetry: () => !this.stopped && !this.budgetExpired(this.clock.now()),
			maxWaitMs: () => (this.deadlineMs === null ? undefined : this.deadlineMs - this.clock.now().getTime()),
			signal: this.controller.signal,
			sleep: this.sleep,
			random: () => this.random.next(),
		};
	}

	private async publishSlot(plan: DailyPlan, index: number): Promise<void> {
		const { policy, store, generator, publisher } = this.options;
		const plannedAt = plan.slots[index];
		const slotTime = new Date(plannedAt);

		this.setState("Publishing");
		this.quota.claimSlot(plan.date, index);

		const recentPosts = store
			.recentPosts(this.options.recentPostsContext ?? 5)
			.map((post) => post.content);
		const context = {
			date: plan.date,
			slotIndex: index,
			plannedAt,
			isPrimeTime: policy.isPrimeTime(slotTime),
			localTime: formatLocal(slotTime, policy.timeZone),
			recentPosts,
		};

		const generated = await withRetry(() => generator.generate(context), {
			...this.retryOptions(),
			label: "generate",
			onRetry: (err, info) =>
				logger.warn(
					{ slotIndex: index, attempt: info.attempt, delayMs: info.delayMs, error: formatErrorSafe(err) },
					"content generation failed; retrying",
				),
		});

		if (generated.ok && (this.stopped || this.budgetExpired(this.clock.now()))) {
			// Text is ready but termination was requested meanwhile; never start a publish
			this.setState("Recording");
			this.settleUnattempted(
				plan,
				index,
				this.clock.now(),
				this.stopped ? "stopped before publish" : "execution budget ran out before publish",
			);
			return;
		}

		let published: RetryResult<PublishResult, PublishFailureClassification> | null = null;
		if (generated.ok) {
			const text = generated.value;
			published = await withRetry(() => publisher.publish(text), {
				...this.retryOptions(),
				label: "publish",
				onRetry: (err, info) =>
					logger.warn(
						{ slotIndex: index, attempt: info.attempt, delayMs: info.delayMs, error: formatErrorSafe(err) },
						"publish failed; retrying",
					),
			});
		}

		this.setState("Recording");
		const actualAt = this.clock.now();
		const base = { date: plan.date, slotIndex: index, plannedAt, actualAt: actualAt.toISOString() };
		let attempt: ExecutionAttempt;

		if (generated.ok && published?.ok) {
			const retried = generated.attempts > 1 || published.attempts > 1;
			attempt = {
				...base,
				outcome: retried ? "retriedThenSuccess" : "success",
				attempts: published.attempts,
				postId: published.value.postId,
			};
			this.quota.recordSuccess(plan.date, actualAt, index, {
				attempt,
				post: {
					postId: published.value.postId,
					content: published.value.text,
					date: plan.date,
					slotIndex: index,
					postedAt: actualAt.toISOString(),
				},
			});
			this.breaker?.recordSuccess();
		} else {
			const failure = published && !published.ok ? published : generated.ok ? null : generated;
			attempt = {
				...base,
				outcome: "failedFatal",
				attempts: failure?.attempts ?? 0,
				error: failure
					? `${failure.classification.category}${failure.exhausted ? " (attempts exhausted)" : ""}: ${formatErrorSafe(failure.error)}`
					: "unknown failure",
			};
			this.quota.recordFailure(plan.date, index, attempt);
			if (this.breaker?.recordFailure()) {
				logger.warn(
					{ slotIndex: index, failures: this.breaker.consecutiveFailures, cooldownMs: this.breaker.remainingMs() },
					"circuit opened; pausing generate and publish",
				);
			}
		}

		this.advance(plan, index);
		this.count(attempt);
		this.reporter.report(attempt);
	}
}
