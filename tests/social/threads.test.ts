import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { parseConfig } from "../../src/config/config.js";
import { ConfigError, PublishError } from "../../src/errors.js";
import type { FetchLike } from "../../src/infra/timeout.js";
import {
	ThreadsPublisher,
	createThreadsPublisher,
	parseRetryAfter,
	truncateForThreads,
} from "../../src/social/backends/threads.js";

function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
	return new Response(JSON.stringify(body), init);
}

async function publishError(promise: Promise<unknown>): Promise<PublishError> {
	try {
		await promise;
	} catch (err) {
		if (err instanceof PublishError) return err;
		throw err;
	}
	throw new Error("expected a PublishError");
}

describe("social/backends/threads", () => {
	let fetchImpl: Mock<FetchLike>;
	let sleep: Mock<(ms: number, signal?: AbortSignal) => Promise<void>>;
	let publisher: ThreadsPublisher;

	beforeEach(() => {
		fetchImpl = vi.fn<FetchLike>();
		sleep = vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>().mockResolvedValue(undefined);
		publisher = new ThreadsPublisher({
			accessToken: "test-secret",
			userId: "me",
			baseUrl: "https://graph.example/v1.0/",
			timeoutMs: 0,
			publishDelayMs: 5000,
			maxLength: 500,
			fetchImpl,
			sleep,
		});
	});

	it("creates a container, waits, then publishes it", async () => {
		fetchImpl
			.mockResolvedValueOnce(jsonResponse({ id: "c-1" }))
			.mockResolvedValueOnce(jsonResponse({ id: "p-1" }));

		const result = await publisher.publish("hello world");

		expect(result).toEqual({ postId: "p-1", text: "hello world" });
		expect(fetchImpl).toHaveBeenCalledTimes(2);
		expect(fetchImpl.mock.calls[0][0]).toBe(
			"https://graph.example/v1.0/me/threads?media_type=TEXT&text=hello+world&access_token=test-secret",
		);
		expect(fetchImpl.mock.calls[0][1]).toEqual({ method: "POST", signal: undefined });
		expect(fetchImpl.mock.calls[1][0]).toBe(
			"https://graph.example/v1.0/me/threads_publish?creation_id=c-1&access_token=test-secret",
		);
		expect(sleep).toHaveBeenCalledWith(5000, undefined);
	});

	it("carries status and Retry-After on a rate limit", async () => {
		fetchImpl.mockResolvedValueOnce(
			jsonResponse({ error: { message: "Rate limited", code: 4 } }, { status: 429, headers: { "retry-after": "30" } }),
		);

		const err = await publishError(publisher.publish("hello"));

		expect(err.message).toBe("threads threads failed (429): Rate limited");
		expect(err.status).toBe(429);
		expect(err.retryAfterMs).toBe(30_000);
		expect(sleep).not.toHaveBeenCalled();
	});

	it("wraps transport failures without a status", async () => {
		const cause = new TypeError("fetch failed");
		fetchImpl.mockRejectedValueOnce(cause);

		const err = await publishError(publisher.publish("hello"));

		expect(err.message).toBe("threads threads request failed: TypeError: fetch failed");
		expect(err.status).toBeUndefined();
		expect(err.cause).toBe(cause);
	});

	it("treats a container response without an id as a retriable server fault", async () => {
		fetchImpl.mockResolvedValueOnce(jsonResponse({}));

		const err = await publishError(publisher.publish("hello"));

		expect(err.message).toBe("threads threads returned no id");
		expect(err.status).toBe(502);
		expect(fetchImpl).toHaveBeenCalledTimes(1);
	});

	it("reports a publish response without an id as posted under the container id", async () => {
		fetchImpl.mockResolvedValueOnce(jsonResponse({ id: "c-1" })).mockResolvedValueOnce(jsonResponse({}));

		const result = await publisher.publish("hello");

		expect(result).toEqual({ postId: "c-1", text: "hello" });
		expect(fetchImpl).toHaveBeenCalledTimes(2);
	});

	it("returns the truncated text it actually sent", async () => {
		const short = new ThreadsPublisher({
			accessToken: "test-secret",
			userId: "me",
			baseUrl: "https://graph.example/v1.0",
			timeoutMs: 0,
			publishDelayMs: 0,
			maxLength: 20,
			fetchImpl,
		});
		fetchImpl
			.mockResolvedValueOnce(jsonResponse({ id: "c-1" }))
			.mockResolvedValueOnce(jsonResponse({ id: "p-1" }));

		const result = await short.publish("alpha beta gamma delta");

		expect(result.text).toBe("alpha beta gamma…");
	});
});

describe("social/backends/threads helpers", () => {
	it("truncates on code points and prefers a word boundary", () => {
		expect(truncateForThreads("short", 10)).toBe("short");
		expect(truncateForThreads("alpha beta gamma delta", 20)).toBe("alpha beta gamma…");
		expect(truncateForThreads("hello world foo", 10)).toBe("hello wor…");
		expect(truncateForThreads("😀😀😀😀😀", 3)).toBe("😀😀…");
	});

	it("parses Retry-After seconds and dates", () => {
		const now = Date.parse("Wed, 21 Oct 2015 07:28:00 GMT");
		expect(parseRetryAfter("30", now)).toBe(30_000);
		expect(parseRetryAfter("Wed, 21 Oct 2015 07:28:30 GMT", now)).toBe(30_000);
		expect(parseRetryAfter("Wed, 21 Oct 2015 07:27:00 GMT", now)).toBe(0);
		expect(parseRetryAfter("soon", now)).toBeUndefined();
		expect(parseRetryAfter(null, now)).toBeUndefined();
	});
});

describe("createThreadsPublisher", () => {
	const saved = process.env.THREADS_ACCESS_TOKEN;

	afterEach(() => {
		if (saved === undefined) {
			delete process.env.THREADS_ACCESS_TOKEN;
		} else {
			process.env.THREADS_ACCESS_TOKEN = saved;
		}
	});

	it("requires an access token", () => {
		delete process.env.THREADS_ACCESS_TOKEN;
		expect(() => createThreadsPublisher(parseConfig({}).threads)).toThrow(ConfigError);
	});

	it("prefers the environment token over the config file", async () => {
		process.env.THREADS_ACCESS_TOKEN = "env-secret";
		const fetchImpl = vi
			.fn<FetchLike>()
			.mockResolvedValueOnce(jsonResponse({ id: "c-1" }))
			.mockResolvedValueOnce(jsonResponse({ id: "p-1" }));
		const publisher = createThreadsPublisher(parseConfig({ threads: { accessToken: "file-secret" } }).threads, {
			fetchImpl,
			sleep: vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>().mockResolvedValue(undefined),
		});

		await publisher.publish("hi");

		expect(String(fetchImpl.mock.calls[0][0])).toContain("access_token=env-secret");
	});
});
