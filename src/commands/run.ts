import type { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { CircuitBreaker } from "../infra/circuit-breaker.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { installUnhandledRejectionHandler } from "../infra/unhandled-rejections.js";
import { startResourceGuard } from "../infra/watchdog.js";
import { getChildLogger } from "../logging.js";
import { ExecutionLoop } from "../schedule/loop.js";
import { resolveSchedule } from "../schedule/settings.js";
import { SqliteSchedulerStore } from "../schedule/store.js";
import { createThreadsPublisher } from "../social/backends/threads.js";
import { createOpenAIContentGenerator } from "../social/generator.js";
import { getDb } from "../storage/db.js";

const logger = getChildLogger({ module: "cmd-run" });

export type RunOptions = {
	budget?: string;
};

function parseBudgetSeconds(value: string | undefined): number | undefined {
	if (value === undefined) return undefined;
	const seconds = Number(value);
	if (!Number.isInteger(seconds) || seconds < 0) {
		throw new Error(`--budget must be a whole number of seconds (got '${value}')`);
	}
	return seconds;
}

export function registerRunCommand(program: Command): void {
	program
		.command("run")
		.description("Start the posting loop")
		.option("--budget <seconds>", "Stop after this many seconds (0 = no limit)")
		.action(async (opts: RunOptions) => {
			try {
				const cfg = loadConfig();
				const budgetSeconds = parseBudgetSeconds(opts.budget);
				const { settings, policy } = resolveSchedule(
					cfg.schedule && budgetSeconds !== undefined
						? { ...cfg.schedule, executionBudgetSeconds: budgetSeconds }
						: cfg.schedule,
				);

				const publisher = createThreadsPublisher(cfg.threads);
				const generator = createOpenAIContentGenerator(cfg.openai, cfg.persona);
				const store = new SqliteSchedulerStore(getDb());

				installUnhandledRejectionHandler("run");

				const loop = new ExecutionLoop({
					policy,
					settings,
					retry: cfg.retry,
					store,
					generator,
					publisher,
					recentPostsContext: cfg.persona.recentPostsContext,
					breaker: new CircuitBreaker({
						failureThreshold: cfg.breaker.failureThreshold,
						resetMs: cfg.breaker.cooldownMinutes * 60_000,
					}),
				});

				const guard = cfg.guard.enabled
					? startResourceGuard({
							maxMemoryPercent: cfg.guard.maxMemoryPercent,
							intervalMs: cfg.guard.checkIntervalSeconds * 1000,
							onExceeded: (reason) => loop.stop(reason),
						})
					: null;

				const shutdown = (signal: string) => {
					console.log(`\nReceived ${signal}, finishing current slot...`);
					loop.stop(signal);
				};
				process.on("SIGINT", () => shutdown("SIGINT"));
				process.on("SIGTERM", () => shutdown("SIGTERM"));

				console.log(
					`Posting as ${cfg.persona.name} via ${publisher.serviceId} (${policy.timeZone}, window ${policy.window.startHour}:00-${policy.window.endHour % 24}:00)`,
				);

				try {
					const summary = await loop.run();
					console.log(
						`Loop finished (${summary.reason}): ${summary.published} published, ${summary.outcomes.failedFatal} failed, ${summary.outcomes.skippedOutsideWindow + summary.outcomes.skippedQuotaExceeded} skipped.`,
					);
				} finally {
					guard?.stop();
				}
			} catch (err) {
				logger.error({ error: formatErrorSafe(err) }, "run command failed");
				console.error(`Error: ${formatErrorSafe(err)}`);
				process.exitCode = 1;
			}
		});
}
