import { afterEach, describe, expect, it, vi } from "vitest";
import { readSystemMemory, startResourceGuard } from "../../src/infra/watchdog.js";

describe("infra/watchdog", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("reports nothing while memory stays under the limit", () => {
		const onExceeded = vi.fn();
		const guard = startResourceGuard({
			maxMemoryPercent: 80,
			intervalMs: 1000,
			onExceeded,
			readMemory: () => ({ usedPercent: 79.9, rssBytes: 1 }),
		});

		expect(guard.check()).toBeNull();
		expect(onExceeded).not.toHaveBeenCalled();
		guard.stop();
	});

	it("fires onExceeded once when the limit is crossed", () => {
		const onExceeded = vi.fn();
		const guard = startResourceGuard({
			maxMemoryPercent: 80,
			intervalMs: 1000,
			onExceeded,
			readMemory: () => ({ usedPercent: 91.26, rssBytes: 1 }),
		});

		expect(guard.check()).toBe("memory usage 91.3% exceeds 80%");
		guard.check();
		expect(onExceeded).toHaveBeenCalledTimes(1);
		expect(onExceeded).toHaveBeenCalledWith("memory usage 91.3% exceeds 80%");
		guard.stop();
	});

	it("polls on its interval until stopped", async () => {
		vi.useFakeTimers();
		const readMemory = vi.fn(() => ({ usedPercent: 10, rssBytes: 1 }));
		const guard = startResourceGuard({
			maxMemoryPercent: 80,
			intervalMs: 1000,
			onExceeded: vi.fn(),
			readMemory,
		});

		await vi.advanceTimersByTimeAsync(3000);
		expect(readMemory).toHaveBeenCalledTimes(3);

		guard.stop();
		await vi.advanceTimersByTimeAsync(3000);
		expect(readMemory).toHaveBeenCalledTimes(3);
	});

	it("reads a plausible system memory snapshot", () => {
		const snapshot = readSystemMemory();
		expect(snapshot.usedPercent).toBeGreaterThan(0);
		expect(snapshot.usedPercent).toBeLessThanOrEqual(100);
		expect(snapshot.rssBytes).toBeGreaterThan(0);
	});
});
