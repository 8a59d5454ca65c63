import { describe, expect, it } from "vitest";

import { ContentRejectedError, GenerationError, PublishError } from "../../src/errors.js";
import { TimeoutError } from "../../src/infra/timeout.js";
import { classifyPublishError } from "../../src/social/classify.js";

describe("social/classify", () => {
	it("never retries refused content", () => {
		expect(classifyPublishError(new ContentRejectedError("refused"))).toEqual({
			retriable: false,
			category: "content-policy",
		});
	});

	it("retries generation failures", () => {
		expect(classifyPublishError(new GenerationError("model returned empty content"))).toEqual({
			retriable: true,
			category: "generation",
		});
	});

	it("honours the server-suggested delay on 429", () => {
		expect(
			classifyPublishError(new PublishError("rate limited", { status: 429, retryAfterMs: 30_000 })),
		).toEqual({ retriable: true, category: "rate-limited", retryAfterMs: 30_000 });
	});

	it.each([
		[500, true, "server"],
		[503, true, "server"],
		[401, false, "auth"],
		[403, false, "auth"],
		[400, false, "malformed"],
		[422, false, "malformed"],
	])("maps status %i to retriable=%s (%s)", (status, retriable, category) => {
		expect(classifyPublishError(new PublishError("failed", { status }))).toMatchObject({ retriable, category });
	});

	it("reads a status from anywhere in the cause chain", () => {
		const wrapped = new Error("sdk call failed", { cause: { status: 502, message: "Bad Gateway" } });
		expect(classifyPublishError(wrapped)).toMatchObject({ retriable: true, category: "server" });
	});

	it("retries timeouts and transient network failures", () => {
		expect(classifyPublishError(new TimeoutError("request timed out after 100ms", 100))).toEqual({
			retriable: true,
			category: "timeout",
		});
		const dropped = new PublishError("threads request failed", {
			cause: Object.assign(new Error("read ECONNRESET"), { code: "ECONNRESET" }),
		});
		expect(classifyPublishError(dropped)).toEqual({ retriable: true, category: "network" });
	});

	it("treats anything unexplained as fatal", () => {
		expect(classifyPublishError(new Error("unexpected"))).toEqual({ retriable: false, category: "unknown" });
	});
});
