/**
 * SQLite storage layer for postpace.
 *
 * Provides persistent, atomic storage for:
 * - Daily posting plans
 * - Per-date quota records
 * - Slot attempt history
 * - Published post history
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { getChildLogger } from "../logging.js";
import { CONFIG_DIR } from "../utils.js";

const logger = getChildLogger({ module: "storage" });

const DB_PATH = path.join(CONFIG_DIR, "postpace.db");
const SCHEMA_VERSION = 2;

export type SqliteDatabase = Database.Database;

let db: SqliteDatabase | null = null;

/**
 * Open a database at `dbPath` and bring its schema up to date.
 * Pass ":memory:" for an in-process database (tests, dry runs).
 */
export function openDatabase(dbPath: string): SqliteDatabase {
	const inMemory = dbPath === ":memory:";
	if (!inMemory) {
		fs.mkdirSync(path.dirname(dbPath), { recursive: true, mode: 0o700 });
	}

	const database = new Database(dbPath);

	if (!inMemory) {
		try {
			fs.chmodSync(dbPath, 0o600);
		} catch {
			logger.warn({ path: dbPath }, "could not set database file permissions to 0600");
		}
		// WAL keeps a reader (status command) from blocking the running loop
		database.pragma("journal_mode = WAL");
	}

	migrate(database);
	return database;
}

/**
 * Get or create the shared database connection.
 */
export function getDb(): SqliteDatabase {
	if (db) return db;
	db = openDatabase(DB_PATH);
	logger.info({ path: DB_PATH }, "database initialized");
	return db;
}

/**
 * Close the database connection.
 */
export function closeDb(): void {
	if (db) {
		db.close();
		db = null;
		logger.debug("database closed");
	}
}

/**
 * Run database migrations.
 */
function migrate(database: SqliteDatabase): void {
	database.exec(`
		CREATE TABLE IF NOT EXISTS schema_version (
			version INTEGER PRIMARY KEY
		)
	`);

	const row = database.prepare("SELECT version FROM schema_version LIMIT 1").get() as
		| { version: number }
		| undefined;
	const currentVersion = row?.version ?? 0;

	if (currentVersion >= SCHEMA_VERSION) {
		return;
	}

	logger.info({ from: currentVersion, to: SCHEMA_VERSION }, "running migrations");

	// Migration 1: plans and quota
	if (currentVersion < 1) {
		database.exec(`
			-- One plan per posting date; slots is a JSON array of ISO timestamps
			CREATE TABLE IF NOT EXISTS daily_plans (
				date TEXT PRIMARY KEY,
				target_count INTEGER NOT NULL,
				slots TEXT NOT NULL,
				consumed_index INTEGER NOT NULL DEFAULT 0,
				seed TEXT NOT NULL,
				created_at INTEGER NOT NULL,
				retired_at INTEGER
			);

			-- Quota counters keyed by posting date
			CREATE TABLE IF NOT EXISTS quota_records (
				date TEXT PRIMARY KEY,
				posts_made INTEGER NOT NULL DEFAULT 0,
				last_post_at INTEGER,
				inflight_slot INTEGER,
				next_slot_index INTEGER NOT NULL DEFAULT 0,
				updated_at INTEGER NOT NULL
			);
		`);
	}

	// Migration 2: execution history
	if (currentVersion < 2) {
		database.exec(`
			CREATE TABLE IF NOT EXISTS slot_attempts (
				id INTEGER PRIMARY KEY AUTOINCREMENT,
				date TEXT NOT NULL,
				slot_index INTEGER NOT NULL,
				planned_at INTEGER NOT NULL,
				actual_at INTEGER NOT NULL,
				outcome TEXT NOT NULL,
				attempts INTEGER NOT NULL DEFAULT 0,
				post_id TEXT,
				error TEXT
			);
			CREATE INDEX IF NOT EXISTS idx_slot_attempts_date ON slot_attempts(date, slot_index);

			CREATE TABLE IF NOT EXISTS posts (
				post_id TEXT PRIMARY KEY,
				content TEXT NOT NULL,
				date TEXT NOT NULL,
				slot_index INTEGER NOT NULL,
				posted_at INTEGER NOT NULL
			);
			CREATE INDEX IF NOT EXISTS idx_posts_posted_at ON posts(posted_at);
		`);
	}

	database.prepare("DELETE FROM schema_version").run();
	database.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);

	logger.info({ version: SCHEMA_VERSION }, "migrations complete");
}

/**
 * Get database file path.
 */
export function getDbPath(): string {
	return DB_PATH;
}
