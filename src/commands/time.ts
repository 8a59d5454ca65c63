import type { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { resolveSchedule } from "../schedule/settings.js";

const logger = getChildLogger({ module: "cmd-time" });

export type TimeOptions = {
	json?: boolean;
};

export function registerTimeCommand(program: Command): void {
	program
		.command("time")
		.description("Show the current time as the scheduler sees it")
		.option("--json", "Output as JSON")
		.action((opts: TimeOptions) => {
			try {
				const { policy } = resolveSchedule(loadConfig().schedule);
				const info = policy.describeTime(new Date());

				if (opts.json) {
					console.log(JSON.stringify(info, null, 2));
					return;
				}
				console.log(`Local time:   ${info.localTime} (${info.timezone})`);
				console.log(`Posting date: ${info.postingDate}`);
				console.log(`In window:    ${info.isPostingTime ? "yes" : "no"}`);
				console.log(`Prime time:   ${info.isPrimeTime ? "yes" : "no"}`);
			} catch (err) {
				logger.error({ error: formatErrorSafe(err) }, "time command failed");
				console.error(`Error: ${formatErrorSafe(err)}`);
				process.exitCode = 1;
			}
		});
}
