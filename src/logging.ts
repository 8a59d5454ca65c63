import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { type PostpaceConfig, loadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";
import { CONFIG_DIR } from "./utils.js";

const DEFAULT_LOG_DIR = path.join(CONFIG_DIR, "logs");
const DEFAULT_LOG_FILE = path.join(DEFAULT_LOG_DIR, "postpace.log");

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};

type Destination = ReturnType<typeof pino.destination>;

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: Destination | null = null;

function isLevel(value: string): value is LevelWithSilent {
	return ALLOWED_LEVELS.some((level) => level === value);
}

function normalizeLevel(level?: string): LevelWithSilent {
	// The env override wins so test runs and cron wrappers can silence output.
	const envLevel = process.env.POSTPACE_LOG_LEVEL;
	if (envLevel && isLevel(envLevel)) return envLevel;
	if (isVerbose()) return "debug";
	const candidate = level ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

function readLoggingConfig(): PostpaceConfig["logging"] {
	try {
		return loadConfig().logging;
	} catch {
		// A broken config file is reported by the command that loads it.
		return undefined;
	}
}

function resolveSettings(): ResolvedSettings {
	const cfg = readLoggingConfig();
	const level = normalizeLevel(cfg?.level);
	const file = cfg?.file ?? DEFAULT_LOG_FILE;
	return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: Destination): void {
	try {
		dest.flushSync();
	} catch {
		// best-effort: flushSync throws when the stream is not ready yet
	}
	dest.end();
}

function buildLogger(settings: ResolvedSettings): { logger: Logger; destination: Destination | null } {
	if (settings.level === "silent") {
		return { logger: pino({ level: "silent" }), destination: null };
	}

	const logDir = path.dirname(settings.file);
	fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });

	// Ensure file exists with 0600 so post drafts in logs are not world-readable
	try {
		const fd = fs.openSync(
			settings.file,
			fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
			0o600,
		);
		fs.closeSync(fd);
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code !== "EEXIST") {
			throw err;
		}
	}

	const destination = pino.destination({
		dest: settings.file,
		mkdir: true,
		sync: true, // deterministic; log volume is a handful of lines per slot.
	});
	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
		},
		destination,
	);
	return { logger, destination };
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
	}
	return cachedLogger;
}

export function getChildLogger(bindings?: Bindings, opts?: { level?: LevelWithSilent }): Logger {
	return getLogger().child(bindings ?? {}, opts);
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
