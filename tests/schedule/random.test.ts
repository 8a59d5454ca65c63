import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	createPlanRandom,
	createSeededRandom,
	generateSeed,
	randomInt,
	stringToSeed,
} from "../../src/schedule/random.js";

function take(count: number, next: () => number): number[] {
	return Array.from({ length: count }, next);
}

describe("schedule/random", () => {
	it("replays the same stream for the same seed", () => {
		const a = createSeededRandom("evening");
		const b = createSeededRandom("evening");
		expect(take(5, () => a.next())).toEqual(take(5, () => b.next()));
	});

	it("separates streams by date", () => {
		const first = take(3, () => createPlanRandom("2024-03-15", "seed").next());
		const second = take(3, () => createPlanRandom("2024-03-16", "seed").next());
		expect(first).not.toEqual(second);
	});

	it("hashes strings to unsigned 32-bit seeds", () => {
		expect(stringToSeed("")).toBe(0x811c9dc5);
		expect(stringToSeed("a")).toBe(stringToSeed("a"));
		expect(stringToSeed("a")).not.toBe(stringToSeed("b"));
	});

	it("keeps randomInt inside its inclusive bounds", () => {
		fc.assert(
			fc.property(fc.integer(), fc.integer({ min: -50, max: 50 }), fc.nat(100), (seed, min, span) => {
				const random = createSeededRandom(seed);
				const value = randomInt(random, min, min + span);
				return Number.isInteger(value) && value >= min && value <= min + span;
			}),
		);
	});

	it("returns min for an empty range", () => {
		expect(randomInt({ next: () => 0.99 }, 7, 3)).toBe(7);
		expect(randomInt({ next: () => 0.99 }, 7, 7)).toBe(7);
	});

	it("generates hex seeds", () => {
		expect(generateSeed()).toMatch(/^[0-9a-f]{16}$/);
	});
});
