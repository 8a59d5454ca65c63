import type { ScheduleConfig } from "../config/config.js";
import { ConfigError } from "../errors.js";
import { isValidTimeZone } from "./clock.js";
import { WindowPolicy, normalizeWindow } from "./window.js";

/** Values the plan generator and quota tracker consume. Intervals are minutes. */
export type PlanSettings = {
	minDailyPosts: number;
	maxDailyPosts: number;
	maxPostsPerDay: number;
	primeFraction: number;
	primeTimeMinInterval: number;
	primeTimeMaxInterval: number;
	otherTimeMinInterval: number;
	otherTimeMaxInterval: number;
};

export type SchedulerSettings = PlanSettings & {
	timezone: string;
	/** 0 disables the budget. */
	executionBudgetMs: number;
	maxSleepMs: number;
	seed?: string;
};

export type ResolvedSchedule = {
	settings: SchedulerSettings;
	policy: WindowPolicy;
};

/**
 * Turn the `schedule` config section into validated settings plus a frozen
 * window policy. Any inconsistency is a ConfigError so the loop never starts.
 */
export function resolveSchedule(schedule: ScheduleConfig | undefined): ResolvedSchedule {
	if (!schedule) {
		throw new ConfigError("missing 'schedule' section", [
			"schedule.maxPostsPerDay has no default and must be configured",
		]);
	}

	const issues: string[] = [];
	if (schedule.minDailyPosts > schedule.maxDailyPosts) {
		issues.push(
			`minDailyPosts (${schedule.minDailyPosts}) exceeds maxDailyPosts (${schedule.maxDailyPosts})`,
		);
	}
	if (schedule.primeTimeMinInterval > schedule.primeTimeMaxInterval) {
		issues.push(
			`primeTimeMinInterval (${schedule.primeTimeMinInterval}) exceeds primeTimeMaxInterval (${schedule.primeTimeMaxInterval})`,
		);
	}
	if (schedule.otherTimeMinInterval > schedule.otherTimeMaxInterval) {
		issues.push(
			`otherTimeMinInterval (${schedule.otherTimeMinInterval}) exceeds otherTimeMaxInterval (${schedule.otherTimeMaxInterval})`,
		);
	}
	if (!isValidTimeZone(schedule.timezone)) {
		issues.push(`unknown timezone '${schedule.timezone}'`);
	}

	let window: ReturnType<typeof normalizeWindow> | null = null;
	try {
		window = normalizeWindow({
			startHour: schedule.postingHoursStart,
			endHour: schedule.postingHoursEnd,
			primeStartHour: schedule.primeStart,
			primeEndHour: schedule.primeEnd,
		});
	} catch (err) {
		if (!(err instanceof ConfigError)) throw err;
		issues.push(...err.issues);
	}

	if (issues.length > 0 || !window) {
		throw new ConfigError("invalid schedule configuration", issues);
	}

	return {
		settings: {
			timezone: schedule.timezone,
			minDailyPosts: schedule.minDailyPosts,
			maxDailyPosts: schedule.maxDailyPosts,
			maxPostsPerDay: schedule.maxPostsPerDay,
			primeFraction: schedule.primeFraction,
			primeTimeMinInterval: schedule.primeTimeMinInterval,
			primeTimeMaxInterval: schedule.primeTimeMaxInterval,
			otherTimeMinInterval: schedule.otherTimeMinInterval,
			otherTimeMaxInterval: schedule.otherTimeMaxInterval,
			executionBudgetMs: schedule.executionBudgetSeconds * 1000,
			maxSleepMs: schedule.maxSleepSeconds * 1000,
			...(schedule.seed ? { seed: schedule.seed } : {}),
		},
		policy: new WindowPolicy(window, schedule.timezone),
	};
}
