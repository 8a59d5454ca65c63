import type { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { formatLocal, parseDateKey } from "../schedule/clock.js";
import { generatePlan } from "../schedule/plan.js";
import { createPlanRandom, generateSeed } from "../schedule/random.js";
import { resolveSchedule } from "../schedule/settings.js";
import { SqliteSchedulerStore } from "../schedule/store.js";
import type { DailyPlan } from "../schedule/types.js";
import type { WindowPolicy } from "../schedule/window.js";
import { getDb } from "../storage/db.js";

const logger = getChildLogger({ module: "cmd-plan" });

export type PlanOptions = {
	date?: string;
	seed?: string;
	json?: boolean;
};

export function describePlan(plan: DailyPlan, policy: WindowPolicy) {
	return {
		...plan,
		localSlots: plan.slots.map((slot) => {
			const at = new Date(slot);
			return { at: formatLocal(at, policy.timeZone), prime: policy.isPrimeTime(at) };
		}),
	};
}

export function registerPlanCommand(program: Command): void {
	program
		.command("plan")
		.description("Show the posting plan for a date (stored plan, or a preview)")
		.option("--date <YYYY-MM-DD>", "Posting date (default: current posting date)")
		.option("--seed <seed>", "Preview the plan this seed would produce")
		.option("--json", "Output as JSON")
		.action((opts: PlanOptions) => {
			try {
				const cfg = loadConfig();
				const { settings, policy } = resolveSchedule(cfg.schedule);
				const date = opts.date ?? policy.postingDateOf(new Date());
				parseDateKey(date);

				const stored = opts.seed ? null : new SqliteSchedulerStore(getDb()).loadPlan(date);
				const seed = opts.seed ?? settings.seed ?? generateSeed();
				const plan =
					stored ??
					generatePlan(date, policy, settings, {
						random: createPlanRandom(date, seed),
						seed,
						createdAt: new Date(),
					});
				const view = { ...describePlan(plan, policy), source: stored ? "stored" : "preview" };

				if (opts.json) {
					console.log(JSON.stringify(view, null, 2));
					return;
				}
				console.log(`Plan for ${date} (${view.source}, seed ${plan.seed})`);
				console.log(`Target: ${plan.targetCount} posts, resume at slot ${plan.consumedIndex}`);
				view.localSlots.forEach((slot, index) => {
					console.log(`  ${index + 1}. ${slot.at}${slot.prime ? "  [prime]" : ""}`);
				});
			} catch (err) {
				logger.error({ error: formatErrorSafe(err) }, "plan command failed");
				console.error(`Error: ${formatErrorSafe(err)}`);
				process.exitCode = 1;
			}
		});
}
