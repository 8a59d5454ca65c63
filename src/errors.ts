/**
 * Error taxonomy shared by the scheduler and its collaborators.
 *
 * - ConfigError / PersistenceError terminate the process.
 * - GenerationError, ContentRejectedError and PublishError are slot-level and
 *   are contained by the execution loop.
 */

export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly issues: readonly string[] = [],
	) {
		super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
		this.name = "ConfigError";
	}
}

export class PersistenceError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "PersistenceError";
	}
}

/** Content generation failed in a way worth retrying (timeouts, empty output, 5xx). */
export class GenerationError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "GenerationError";
	}
}

/** The model or the platform refused the content. Never retried. */
export class ContentRejectedError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ContentRejectedError";
	}
}

export class PublishError extends Error {
	/** HTTP status, when the failure came from a response. */
	readonly status?: number;
	/** Server-suggested delay before retrying (from Retry-After). */
	readonly retryAfterMs?: number;

	constructor(
		message: string,
		options?: { status?: number; retryAfterMs?: number; cause?: unknown },
	) {
		super(message, { cause: options?.cause });
		this.name = "PublishError";
		this.status = options?.status;
		this.retryAfterMs = options?.retryAfterMs;
	}
}
