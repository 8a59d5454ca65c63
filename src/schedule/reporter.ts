import { getChildLogger } from "../logging.js";
import { type ExecutionAttempt, isSuccessOutcome } from "./types.js";

const logger = getChildLogger({ module: "slot-reporter" });

/** Receives every settled slot. Persistence happens before `report` is called. */
export interface SlotReporter {
	report(attempt: ExecutionAttempt): void;
}

/** Skips are routine and log at info; fatal failures at warn. */
export class LoggingSlotReporter implements SlotReporter {
	report(attempt: ExecutionAttempt): void {
		const fields = {
			date: attempt.date,
			slotIndex: attempt.slotIndex,
			plannedAt: attempt.plannedAt,
			actualAt: attempt.actualAt,
			outcome: attempt.outcome,
			attempts: attempt.attempts,
			...(attempt.postId ? { postId: attempt.postId } : {}),
			...(attempt.error ? { error: attempt.error } : {}),
		};
		if (attempt.outcome === "failedFatal") {
			logger.warn(fields, "slot failed");
		} else if (isSuccessOutcome(attempt.outcome)) {
			logger.info(fields, "slot published");
		} else {
			logger.info(fields, "slot skipped");
		}
	}
}
