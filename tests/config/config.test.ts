import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadConfig, parseConfig, resetConfigCache } from "../../src/config/config.js";
import { resetConfigPath, setConfigPath } from "../../src/config/path.js";

describe("config", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "postpace-config-"));
	});

	afterEach(() => {
		resetConfigCache();
		resetConfigPath();
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("fills schedule and collaborator defaults", () => {
		const cfg = parseConfig({ schedule: { maxPostsPerDay: 5 } });

		expect(cfg.schedule).toMatchObject({
			timezone: "UTC",
			postingHoursStart: 20,
			postingHoursEnd: 26,
			primeStart: 21,
			primeEnd: 25,
			minDailyPosts: 3,
			maxDailyPosts: 5,
			maxPostsPerDay: 5,
			primeTimeMinInterval: 30,
			otherTimeMinInterval: 90,
			executionBudgetSeconds: 0,
		});
		expect(cfg.retry).toEqual({ maxAttempts: 3, baseDelayMs: 1500, maxDelayMs: 60_000, jitter: 0.25 });
		expect(cfg.guard.maxMemoryPercent).toBe(80);
		expect(cfg.breaker).toEqual({ failureThreshold: 3, cooldownMinutes: 60 });
		expect(cfg.threads.maxLength).toBe(500);
		expect(cfg.openai.temperature).toBe(0.7);
		expect(cfg.openai.maxTokens).toBe(150);
		expect(cfg.persona.recentPostsContext).toBe(5);
	});

	it("requires maxPostsPerDay once a schedule section exists", () => {
		expect(() => parseConfig({ schedule: { timezone: "Asia/Taipei" } })).toThrow(/maxPostsPerDay/);
	});

	it("rejects out-of-range hours", () => {
		expect(() => parseConfig({ schedule: { maxPostsPerDay: 3, postingHoursStart: 24 } })).toThrow();
	});

	it("loads a JSON5 file from the configured path", () => {
		const file = path.join(tempDir, "postpace.json");
		fs.writeFileSync(
			file,
			`{
				// evening persona
				schedule: { timezone: "Asia/Taipei", maxPostsPerDay: 4, },
				persona: { name: "night-owl" },
			}`,
		);
		setConfigPath(file);

		const cfg = loadConfig();

		expect(cfg.schedule?.timezone).toBe("Asia/Taipei");
		expect(cfg.schedule?.maxPostsPerDay).toBe(4);
		expect(cfg.persona.name).toBe("night-owl");
	});

	it("returns defaults without a schedule when the file is missing", () => {
		setConfigPath(path.join(tempDir, "absent.json"));

		const cfg = loadConfig();

		expect(cfg.schedule).toBeUndefined();
		expect(cfg.retry.maxAttempts).toBe(3);
	});
});
