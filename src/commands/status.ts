import fs from "node:fs";
import type { Command } from "commander";
import { getConfigPath, loadConfig } from "../config/config.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { formatLocal, parseDateKey } from "../schedule/clock.js";
import { emptyQuota } from "../schedule/quota.js";
import { resolveSchedule } from "../schedule/settings.js";
import { SqliteSchedulerStore } from "../schedule/store.js";
import { getDb, getDbPath } from "../storage/db.js";

const logger = getChildLogger({ module: "cmd-status" });

export type StatusOptions = {
	date?: string;
	json?: boolean;
};

export function registerStatusCommand(program: Command): void {
	program
		.command("status")
		.description("Show quota, plan and slot outcomes for a posting date")
		.option("--date <YYYY-MM-DD>", "Posting date (default: current posting date)")
		.option("--json", "Output as JSON")
		.action((opts: StatusOptions) => {
			try {
				const configPath = getConfigPath();
				const cfg = loadConfig();
				const { settings, policy } = resolveSchedule(cfg.schedule);
				const date = opts.date ?? policy.postingDateOf(new Date());
				parseDateKey(date);

				const store = new SqliteSchedulerStore(getDb());
				const plan = store.loadPlan(date);
				const quota = store.loadQuota(date) ?? emptyQuota(date);
				const attempts = store.listAttempts(date);
				const limit = Math.min(plan?.targetCount ?? settings.maxPostsPerDay, settings.maxPostsPerDay);

				const status = {
					config: { path: configPath, exists: fs.existsSync(configPath) },
					database: getDbPath(),
					date,
					timezone: policy.timeZone,
					quota: { ...quota, limit },
					plan: plan
						? {
								targetCount: plan.targetCount,
								consumedIndex: plan.consumedIndex,
								seed: plan.seed,
								slots: plan.slots,
							}
						: null,
					attempts,
				};

				if (opts.json) {
					console.log(JSON.stringify(status, null, 2));
					return;
				}

				console.log("=== postpace status ===\n");
				console.log(`Config:   ${status.config.path}${status.config.exists ? "" : " (missing)"}`);
				console.log(`Database: ${status.database}`);
				console.log(`Date:     ${date} (${policy.timeZone})`);
				console.log();
				console.log("Quota:");
				console.log(`  Posts made: ${quota.postsMadeToday}/${limit}`);
				console.log(
					`  Last post:  ${quota.lastPostAt ? formatLocal(new Date(quota.lastPostAt), policy.timeZone) : "none"}`,
				);
				if (quota.inflightSlot !== null) {
					console.log(`  In flight:  slot ${quota.inflightSlot + 1}`);
				}
				console.log();

				if (!plan) {
					console.log("No plan stored for this date.");
					return;
				}
				console.log(`Plan (${plan.targetCount} slots):`);
				plan.slots.forEach((slot, index) => {
					const outcomes = attempts
						.filter((attempt) => attempt.slotIndex === index)
						.map((attempt) => attempt.outcome);
					const label = outcomes.length > 0 ? outcomes.join(", ") : index < plan.consumedIndex ? "settled" : "pending";
					console.log(`  ${index + 1}. ${formatLocal(new Date(slot), policy.timeZone)}  ${label}`);
				});
			} catch (err) {
				logger.error({ error: formatErrorSafe(err) }, "status command failed");
				console.error(`Error: ${formatErrorSafe(err)}`);
				process.exitCode = 1;
			}
		});
}
