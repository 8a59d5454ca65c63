/**
 * Daily plan generation.
 *
 * A plan is a layout (how many slots go before, inside and after the prime
 * sub-window) plus concrete minutes for each slot. Feasibility of a layout is
 * decided with two tight chains over the slot sequence:
 *
 *   earliest[i] = max(lo[i], earliest[i-1] + gap[i])
 *   latest[i]   = min(hi[i] - 1, latest[i+1] - gap[i+1])
 *
 * A layout fits iff earliest[i] <= latest[i] for every slot. Placement then
 * keeps every choice inside those chains, so the spacing floor can never be
 * violated by a random draw.
 */

import { getChildLogger } from "../logging.js";
import { zonedTimeToUtc } from "./clock.js";
import { type RandomSource, randomInt } from "./random.js";
import type { PlanSettings } from "./settings.js";
import type { DailyPlan } from "./types.js";
import type { WindowPolicy } from "./window.js";

const logger = getChildLogger({ module: "plan-generator" });

type Segment = "pre" | "prime" | "post";

type MinuteRange = { lo: number; hi: number };

type Layout = {
	pre: number;
	prime: number;
	post: number;
};

type Chains = {
	segments: Segment[];
	gaps: number[];
	earliest: number[];
	latest: number[];
};

export type GeneratePlanOptions = {
	random: RandomSource;
	/** Recorded with the plan so it can be regenerated for inspection. */
	seed: string;
	createdAt: Date;
	/** Slots are never placed before this instant (plans created mid-window). */
	notBefore?: Date;
};

/** Minimum spacing between two neighbouring slots. */
export function spacingFloorMinutes(
	settings: PlanSettings,
	previousInPrime: boolean,
	nextInPrime: boolean,
): number {
	return previousInPrime && nextInPrime
		? settings.primeTimeMinInterval
		: settings.otherTimeMinInterval;
}

function clamp(value: number, lo: number, hi: number): number {
	return Math.min(hi, Math.max(lo, value));
}

function buildChains(
	layout: Layout,
	ranges: Record<Segment, MinuteRange>,
	settings: PlanSettings,
): Chains | null {
	const segments: Segment[] = [
		...Array<Segment>(layout.pre).fill("pre"),
		...Array<Segment>(layout.prime).fill("prime"),
		...Array<Segment>(layout.post).fill("post"),
	];
	const n = segments.length;
	const gaps = segments.map((segment, i) =>
		i === 0
			? 0
			: spacingFloorMinutes(settings, segments[i - 1] === "prime", segment === "prime"),
	);

	const earliest: number[] = new Array<number>(n).fill(0);
	const latest: number[] = new Array<number>(n).fill(0);
	for (let i = 0; i < n; i++) {
		const range = ranges[segments[i]];
		earliest[i] = i === 0 ? range.lo : Math.max(range.lo, earliest[i - 1] + gaps[i]);
	}
	for (let i = n - 1; i >= 0; i--) {
		const range = ranges[segments[i]];
		latest[i] = i === n - 1 ? range.hi - 1 : Math.min(range.hi - 1, latest[i + 1] - gaps[i + 1]);
	}
	for (let i = 0; i < n; i++) {
		if (earliest[i] > latest[i]) return null;
	}
	return { segments, gaps, earliest, latest };
}

/**
 * Pick a layout for `count` slots. Prefers layouts that put at least
 * ceil(primeFraction * count) slots in prime; when prime is too short for
 * that, takes the layouts with the most prime slots and flags spill mode.
 */
function chooseLayout(
	count: number,
	ranges: Record<Segment, MinuteRange>,
	settings: PlanSettings,
	random: RandomSource,
): { layout: Layout; chains: Chains; spill: boolean } | null {
	const feasible: Array<{ layout: Layout; chains: Chains }> = [];
	for (let prime = 0; prime <= count; prime++) {
		for (let pre = 0; pre <= count - prime; pre++) {
			const layout = { pre, prime, post: count - prime - pre };
			const chains = buildChains(layout, ranges, settings);
			if (chains) feasible.push({ layout, chains });
		}
	}
	if (feasible.length === 0) return null;

	const minPrime = Math.ceil(settings.primeFraction * count);
	const biased = feasible.filter((candidate) => candidate.layout.prime >= minPrime);
	if (biased.length > 0) {
		const picked = biased[randomInt(random, 0, biased.length - 1)];
		return { ...picked, spill: false };
	}

	const mostPrime = Math.max(...feasible.map((candidate) => candidate.layout.prime));
	const best = feasible.filter((candidate) => candidate.layout.prime === mostPrime);
	const picked = best[randomInt(random, 0, best.length - 1)];
	return { ...picked, spill: true };
}

/**
 * Place concrete minutes. Prime slots go first (left to right), then the
 * pre-prime slots walking back from prime, then post-prime slots walking
 * forward. In spill mode the non-prime slots hug the prime boundaries.
 */
function placeSlots(
	layout: Layout,
	chains: Chains,
	settings: PlanSettings,
	random: RandomSource,
	spill: boolean,
): number[] {
	const { gaps, earliest, latest } = chains;
	const n = gaps.length;
	const positions: Array<number | undefined> = new Array<number | undefined>(n).fill(undefined);
	const primeFrom = layout.pre;
	const postFrom = layout.pre + layout.prime;

	for (let i = primeFrom; i < postFrom; i++) {
		const previous = i > primeFrom ? positions[i - 1] : undefined;
		const lower = previous === undefined ? earliest[i] : Math.max(earliest[i], previous + gaps[i]);
		const upper = latest[i];
		positions[i] =
			previous === undefined
				? randomInt(random, lower, Math.min(upper, lower + settings.primeTimeMaxInterval))
				: clamp(
						previous +
							randomInt(random, settings.primeTimeMinInterval, settings.primeTimeMaxInterval),
						lower,
						upper,
					);
	}

	for (let i = primeFrom - 1; i >= 0; i--) {
		const next = positions[i + 1];
		const lower = earliest[i];
		const upper = next === undefined ? latest[i] : Math.min(latest[i], next - gaps[i + 1]);
		if (spill) {
			positions[i] = upper;
		} else if (next === undefined) {
			positions[i] = randomInt(random, lower, upper);
		} else {
			const target =
				next - randomInt(random, settings.otherTimeMinInterval, settings.otherTimeMaxInterval);
			positions[i] = clamp(target, lower, upper);
		}
	}

	for (let i = postFrom; i < n; i++) {
		const previous = i > 0 ? positions[i - 1] : undefined;
		const lower = previous === undefined ? earliest[i] : Math.max(earliest[i], previous + gaps[i]);
		const upper = latest[i];
		if (spill) {
			positions[i] = lower;
		} else if (previous === undefined) {
			positions[i] = randomInt(random, lower, upper);
		} else {
			const target =
				previous + randomInt(random, settings.otherTimeMinInterval, settings.otherTimeMaxInterval);
			positions[i] = clamp(target, lower, upper);
		}
	}

	return positions.map((position, i) => position ?? earliest[i]);
}

function minuteOfInstant(policy: WindowPolicy, date: string, instant: Date): number {
	const { start } = policy.minuteBounds();
	const windowStart = policy.windowBounds(date).start;
	return start + Math.ceil((instant.getTime() - windowStart.getTime()) / 60_000);
}

/**
 * Generate the posting plan for `date`.
 *
 * The drawn target count is reduced to the largest count whose spacing fits
 * the (remaining) window; the spacing floor itself is never relaxed.
 */
export function generatePlan(
	date: string,
	policy: WindowPolicy,
	settings: PlanSettings,
	options: GeneratePlanOptions,
): DailyPlan {
	const bounds = policy.minuteBounds();
	const firstMinute = options.notBefore
		? Math.max(bounds.start, minuteOfInstant(policy, date, options.notBefore))
		: bounds.start;

	const ranges: Record<Segment, MinuteRange> = {
		pre: { lo: firstMinute, hi: bounds.primeStart },
		prime: { lo: Math.max(firstMinute, bounds.primeStart), hi: bounds.primeEnd },
		post: { lo: Math.max(firstMinute, bounds.primeEnd), hi: bounds.end },
	};

	const drawn = randomInt(options.random, settings.minDailyPosts, settings.maxDailyPosts);
	let minutes: number[] = [];

	for (let count = drawn; count > 0; count--) {
		const choice = chooseLayout(count, ranges, settings, options.random);
		if (!choice) continue;
		if (count < drawn) {
			logger.info({ date, drawn, count }, "reduced target count to fit spacing");
		}
		if (choice.spill) {
			logger.info(
				{ date, count, prime: choice.layout.prime },
				"prime window too short for bias; spilling slots next to prime",
			);
		}
		minutes = placeSlots(choice.layout, choice.chains, settings, options.random, choice.spill);
		break;
	}

	const slots: string[] = [];
	let previousMs = Number.NEGATIVE_INFINITY;
	for (const minute of minutes) {
		const instant = zonedTimeToUtc(date, minute, policy.timeZone);
		// A DST jump can fold two local minutes onto one instant
		if (instant.getTime() <= previousMs) {
			logger.warn({ date, minute }, "dropping slot that collides after timezone conversion");
			continue;
		}
		previousMs = instant.getTime();
		slots.push(instant.toISOString());
	}

	return {
		date,
		targetCount: slots.length,
		slots,
		consumedIndex: 0,
		seed: options.seed,
		createdAt: options.createdAt.toISOString(),
	};
}
