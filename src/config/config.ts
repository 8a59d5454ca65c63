import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { resolveConfigPath } from "./path.js";

// Posting schedule. Hours use the extended 0-47 wheel so a window may cross
// midnight (end 26 = 02:00 the next day). Intervals are in minutes.
const ScheduleConfigSchema = z.object({
	timezone: z.string().min(1).default("UTC"),
	postingHoursStart: z.number().int().min(0).max(23).default(20),
	postingHoursEnd: z.number().int().min(0).max(47).default(26),
	primeStart: z.number().int().min(0).max(47).default(21),
	primeEnd: z.number().int().min(0).max(47).default(25),
	minDailyPosts: z.number().int().positive().default(3),
	maxDailyPosts: z.number().int().positive().default(5),
	// Hard ceiling; no default, must be set explicitly.
	maxPostsPerDay: z.number().int().positive(),
	primeFraction: z.number().min(0).max(1).default(0.6),
	primeTimeMinInterval: z.number().int().positive().default(30),
	primeTimeMaxInterval: z.number().int().positive().default(60),
	otherTimeMinInterval: z.number().int().positive().default(90),
	otherTimeMaxInterval: z.number().int().positive().default(180),
	executionBudgetSeconds: z.number().int().min(0).default(0), // 0 = unlimited
	maxSleepSeconds: z.number().int().positive().default(300),
	seed: z.string().min(1).optional(),
});

const RetryConfigSchema = z.object({
	maxAttempts: z.number().int().positive().default(3),
	baseDelayMs: z.number().int().min(0).default(1500),
	maxDelayMs: z.number().int().min(0).default(60_000),
	jitter: z.number().min(0).max(1).default(0.25),
});

// After this many fatal slot failures in a row, generate/publish calls pause
// for the cool-down. 0 disables the breaker.
const BreakerConfigSchema = z.object({
	failureThreshold: z.number().int().min(0).default(3),
	cooldownMinutes: z.number().int().positive().default(60),
});

const GuardConfigSchema = z.object({
	enabled: z.boolean().default(true),
	maxMemoryPercent: z.number().min(1).max(100).default(80),
	checkIntervalSeconds: z.number().int().positive().default(30),
});

const ThreadsConfigSchema = z.object({
	accessToken: z.string().optional(), // THREADS_ACCESS_TOKEN env var takes precedence
	userId: z.string().min(1).default("me"),
	baseUrl: z.string().url().default("https://graph.threads.net/v1.0"),
	timeoutMs: z.number().int().positive().default(30_000),
	// The platform needs a moment between creating a container and publishing it.
	publishDelayMs: z.number().int().min(0).default(5_000),
	maxLength: z.number().int().positive().default(500),
});

const OpenAIConfigSchema = z.object({
	apiKey: z.string().optional(), // OPENAI_API_KEY env var takes precedence
	baseUrl: z.string().optional(),
	model: z.string().min(1).default("gpt-4o-mini"),
	temperature: z.number().min(0).max(2).default(0.7),
	maxTokens: z.number().int().positive().default(150),
});

const PersonaConfigSchema = z.object({
	name: z.string().min(1).default("persona"),
	prompt: z
		.string()
		.min(1)
		.default("You write short, casual first-person posts for a social feed. One post, no hashtags."),
	recentPostsContext: z.number().int().min(0).max(20).default(5),
});

const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

const PostpaceConfigSchema = z.object({
	schedule: ScheduleConfigSchema.optional(),
	retry: RetryConfigSchema.default({}),
	breaker: BreakerConfigSchema.default({}),
	guard: GuardConfigSchema.default({}),
	threads: ThreadsConfigSchema.default({}),
	openai: OpenAIConfigSchema.default({}),
	persona: PersonaConfigSchema.default({}),
	logging: LoggingConfigSchema.optional(),
});

export type PostpaceConfig = z.infer<typeof PostpaceConfigSchema>;
export type ScheduleConfig = z.infer<typeof ScheduleConfigSchema>;
export type RetrySettings = z.infer<typeof RetryConfigSchema>;
export type BreakerConfig = z.infer<typeof BreakerConfigSchema>;
export type GuardConfig = z.infer<typeof GuardConfigSchema>;
export type ThreadsConfig = z.infer<typeof ThreadsConfigSchema>;
export type OpenAIConfig = z.infer<typeof OpenAIConfigSchema>;
export type PersonaConfig = z.infer<typeof PersonaConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

let cachedConfig: PostpaceConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Parse a raw (already JSON5-decoded) config object.
 */
export function parseConfig(raw: unknown): PostpaceConfig {
	return PostpaceConfigSchema.parse(raw ?? {});
}

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): PostpaceConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		// Invalidate cache if path changed or mtime changed
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const validated = parseConfig(JSON5.parse(raw));

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			// No config file - use defaults
			return parseConfig({});
		}
		throw err;
	}
}

/**
 * Get the current config file path being used.
 */
export function getConfigPath(): string {
	return resolveConfigPath();
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}
