import os from "node:os";
import path from "node:path";

/**
 * Sleep for `ms`, resolving early (without throwing) when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

export function pad2(value: number): string {
	return value.toString().padStart(2, "0");
}

export const CONFIG_DIR = process.env.POSTPACE_DATA_DIR ?? path.join(os.homedir(), ".postpace");
