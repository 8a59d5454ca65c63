/**
 * Process-level unhandled rejection handler.
 *
 * - ConfigError, PersistenceError and resource exhaustion → exit(1)
 * - Transient network errors → warn and continue
 * - AbortError → suppressed (expected during shutdown)
 */

import { ConfigError, PersistenceError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { formatErrorSafe, isAbortError, isTransientNetworkError } from "./network-errors.js";

const logger = getChildLogger({ module: "unhandled-rejections" });

export type RejectionCategory = "fatal" | "config" | "transient" | "abort" | "unknown";

const FATAL_PATTERNS = [/out of memory/i, /maximum call stack/i, /database disk image is malformed/i];

export function categorize(err: unknown): RejectionCategory {
	if (err instanceof ConfigError) return "config";
	// Losing scheduler state risks double posting
	if (err instanceof PersistenceError) return "fatal";
	if (isAbortError(err)) return "abort";
	if (isTransientNetworkError(err)) return "transient";

	const message = formatErrorSafe(err, 1000);
	if (FATAL_PATTERNS.some((pattern) => pattern.test(message))) {
		return "fatal";
	}
	return "unknown";
}

/**
 * Install the unhandled rejection handler. Call once from a long-running
 * command (`run`).
 */
export function installUnhandledRejectionHandler(
	processLabel: string,
	exit: (code: number) => void = (code) => process.exit(code),
): void {
	process.on("unhandledRejection", (reason: unknown) => {
		const category = categorize(reason);
		const formatted = formatErrorSafe(reason);

		switch (category) {
			case "abort":
				logger.debug({ process: processLabel }, `suppressed abort rejection: ${formatted}`);
				break;

			case "transient":
				logger.warn(
					{ process: processLabel, category },
					`transient unhandled rejection (continuing): ${formatted}`,
				);
				break;

			case "config":
			case "fatal":
				logger.fatal({ process: processLabel, category }, `unhandled rejection (exiting): ${formatted}`);
				exit(1);
				break;

			default:
				logger.error({ process: processLabel, category }, `unhandled rejection: ${formatted}`);
				break;
		}
	});

	logger.debug({ process: processLabel }, "unhandled rejection handler installed");
}
