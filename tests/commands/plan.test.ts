import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { describePlan, registerPlanCommand } from "../../src/commands/plan.js";
import { resetConfigCache } from "../../src/config/config.js";
import { resetConfigPath, setConfigPath } from "../../src/config/path.js";
import { createWindowPolicy } from "../../src/schedule/window.js";

async function runPlanCli(args: string[]): Promise<void> {
	const program = new Command();
	registerPlanCommand(program);
	await program.parseAsync(args, { from: "user" });
}

describe("commands/plan describePlan", () => {
	it("adds local times and prime flags to each slot", () => {
		const policy = createWindowPolicy({
			startHour: 20,
			endHour: 26,
			primeStartHour: 21,
			primeEndHour: 25,
			timeZone: "Asia/Taipei",
		});
		const view = describePlan(
			{
				date: "2024-03-15",
				targetCount: 2,
				slots: ["2024-03-15T12:30:00.000Z", "2024-03-15T16:10:00.000Z"],
				consumedIndex: 0,
				seed: "preview",
				createdAt: "2024-03-15T00:00:00.000Z",
			},
			policy,
		);

		expect(view.localSlots).toEqual([
			{ at: "2024-03-15 20:30", prime: false },
			{ at: "2024-03-16 00:10", prime: true },
		]);
		expect(view.targetCount).toBe(2);
	});
});

describe("plan command", () => {
	let tempDir = "";

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "postpace-plan-"));
		const configPath = path.join(tempDir, "postpace.json");
		fs.writeFileSync(configPath, "{ schedule: { maxPostsPerDay: 5 } }", "utf8");
		setConfigPath(configPath);
		process.exitCode = undefined;
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
		process.exitCode = undefined;
		resetConfigCache();
		resetConfigPath();
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("previews a seeded plan as JSON", async () => {
		await runPlanCli(["plan", "--date", "2024-03-15", "--seed", "fixed", "--json"]);

		expect(process.exitCode).toBeUndefined();
		const output = vi.mocked(console.log).mock.calls[0][0];
		expect(typeof output).toBe("string");
		const view: unknown = JSON.parse(String(output));
		expect(view).toMatchObject({ date: "2024-03-15", seed: "fixed", source: "preview", consumedIndex: 0 });
	});

	it("redacts URLs and tokens from error output", async () => {
		await runPlanCli(["plan", "--date", "https://graph.example/?access_token=test-secret"]);

		expect(process.exitCode).toBe(1);
		expect(console.error).toHaveBeenCalledWith("Error: Error: invalid date '[URL] (expected YYYY-MM-DD)");
	});
});
