import os from "node:os";

import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "resource-guard" });

export type MemorySnapshot = {
	/** System memory in use, 0-100. */
	usedPercent: number;
	rssBytes: number;
};

export type MemoryReader = () => MemorySnapshot;

export function readSystemMemory(): MemorySnapshot {
	const total = os.totalmem();
	const used = total - os.freemem();
	return {
		usedPercent: total > 0 ? (used / total) * 100 : 0,
		rssBytes: process.memoryUsage.rss(),
	};
}

export type ResourceGuard = {
	/** Run one check now. Returns the reason when a limit is exceeded. */
	check: () => string | null;
	stop: () => void;
};

/**
 * Poll memory usage and call `onExceeded` (once) when it crosses
 * `maxMemoryPercent`. The callback is expected to stop the execution loop.
 */
export function startResourceGuard(options: {
	maxMemoryPercent: number;
	intervalMs: number;
	onExceeded: (reason: string) => void;
	readMemory?: MemoryReader;
}): ResourceGuard {
	const readMemory = options.readMemory ?? readSystemMemory;
	let tripped = false;

	const check = (): string | null => {
		const snapshot = readMemory();
		if (snapshot.usedPercent < options.maxMemoryPercent) {
			return null;
		}
		const reason = `memory usage ${snapshot.usedPercent.toFixed(1)}% exceeds ${options.maxMemoryPercent}%`;
		if (!tripped) {
			tripped = true;
			logger.warn(
				{ usedPercent: snapshot.usedPercent, rssBytes: snapshot.rssBytes, limit: options.maxMemoryPercent },
				"resource limit exceeded; requesting shutdown",
			);
			options.onExceeded(reason);
		}
		return reason;
	};

	const timer = setInterval(() => {
		check();
	}, options.intervalMs);
	timer.unref();

	return {
		check,
		stop: () => {
			clearInterval(timer);
		},
	};
}
