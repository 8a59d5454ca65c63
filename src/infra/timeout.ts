/**
 * Timeout utilities for outbound calls.
 */

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * fetch() that aborts the request when `timeoutMs` elapses and rejects with
 * TimeoutError. An abort from `init.signal` is relayed unchanged.
 */
export async function fetchWithTimeout(
	url: string | URL,
	init: RequestInit | undefined,
	timeoutMs: number,
	fetchImpl: FetchLike = fetch,
): Promise<Response> {
	if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
		return fetchImpl(url, init);
	}

	const controller = new AbortController();
	const timeoutError = new TimeoutError(`request timed out after ${timeoutMs}ms`, timeoutMs);

	let detachExternal: (() => void) | undefined;
	const externalSignal = init?.signal;
	if (externalSignal) {
		if (externalSignal.aborted) {
			controller.abort(externalSignal.reason);
		} else {
			const onAbort = () => controller.abort(externalSignal.reason);
			externalSignal.addEventListener("abort", onAbort, { once: true });
			detachExternal = () => externalSignal.removeEventListener("abort", onAbort);
		}
	}

	const timer = setTimeout(() => controller.abort(timeoutError), timeoutMs);
	timer.unref();

	try {
		return await fetchImpl(url, { ...init, signal: controller.signal });
	} catch (err) {
		if (controller.signal.reason === timeoutError) {
			throw timeoutError;
		}
		throw err;
	} finally {
		clearTimeout(timer);
		detachExternal?.();
	}
}
