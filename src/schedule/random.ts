import crypto from "node:crypto";

/** Uniform source in [0, 1). Injected wherever scheduling needs randomness. */
export type RandomSource = {
	next(): number;
};

export const systemRandom: RandomSource = {
	next: () => Math.random(),
};

/** FNV-1a over UTF-16 code units; enough to spread short seed strings. */
export function stringToSeed(input: string): number {
	let hash = 0x811c9dc5;
	for (let i = 0; i < input.length; i++) {
		hash ^= input.charCodeAt(i);
		hash = Math.imul(hash, 0x01000193);
	}
	return hash >>> 0;
}

/** mulberry32: small, fast, reproducible. Not for anything security-related. */
export function createSeededRandom(seed: number | string): RandomSource {
	let state = typeof seed === "string" ? stringToSeed(seed) : seed >>> 0;
	return {
		next: () => {
			state = (state + 0x6d2b79f5) >>> 0;
			let t = state;
			t = Math.imul(t ^ (t >>> 15), t | 1);
			t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
			return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
		},
	};
}

/** The same (date, seed) pair always yields the same stream. */
export function createPlanRandom(date: string, seed: string): RandomSource {
	return createSeededRandom(`${seed}:${date}`);
}

export function generateSeed(): string {
	return crypto.randomBytes(8).toString("hex");
}

/** Integer in [min, max] inclusive. Returns `min` when the range is empty. */
export function randomInt(random: RandomSource, min: number, max: number): number {
	if (max <= min) return min;
	return min + Math.floor(random.next() * (max - min + 1));
}
