import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchWithTimeout, TimeoutError } from "../../src/infra/timeout.js";

function hangingFetch() {
	let capturedSignal: AbortSignal | undefined;
	const fetchImpl = vi.fn(
		(_url: string | URL, init?: RequestInit) =>
			new Promise<Response>((_resolve, reject) => {
				capturedSignal = init?.signal ?? undefined;
				capturedSignal?.addEventListener("abort", () => reject(capturedSignal?.reason), {
					once: true,
				});
			}),
	);
	return { fetchImpl, signal: () => capturedSignal };
}

describe("infra/timeout", () => {
	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	it("fetchWithTimeout calls the injected fetch directly when timeout is disabled", async () => {
		const response = new Response("ok", { status: 200 });
		const fetchImpl = vi.fn(async () => response);

		const result = await fetchWithTimeout("https://example.test", { method: "POST" }, 0, fetchImpl);

		expect(result).toBe(response);
		expect(fetchImpl).toHaveBeenCalledWith("https://example.test", { method: "POST" });
	});

	it("fetchWithTimeout aborts the request and throws TimeoutError", async () => {
		vi.useFakeTimers();
		const { fetchImpl, signal } = hangingFetch();

		const result = fetchWithTimeout("https://example.test", undefined, 25, fetchImpl).catch(
			(err: unknown) => err,
		);
		await vi.advanceTimersByTimeAsync(25);

		const err = await result;
		expect(err).toBeInstanceOf(TimeoutError);
		expect(err).toMatchObject({ message: "request timed out after 25ms", timeoutMs: 25 });
		expect(signal()?.aborted).toBe(true);
	});

	it("fetchWithTimeout relays an external abort unchanged", async () => {
		const external = new AbortController();
		const { fetchImpl } = hangingFetch();

		const promise = fetchWithTimeout("https://example.test", { signal: external.signal }, 5000, fetchImpl);
		external.abort(new Error("shutdown"));

		await expect(promise).rejects.toMatchObject({ message: "shutdown" });
	});
});
