import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export interface DbHandle {
	db: Database.Database;
	close: () => void;
}

const SCHEMA_VERSION = 1;

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

export function openDb(sqlitePath: string): DbHandle {
	const inMemory = sqlitePath === ":memory:";
	if (!inMemory) {
		ensureDir(path.dirname(sqlitePath));
	}

	const db = new Database(sqlitePath);

	// Simulator, dispatcher and request handlers all share this connection
	if (!inMemory) {
		db.pragma("journal_mode = WAL");
	}
	db.pragma("synchronous = NORMAL");
	db.pragma("foreign_keys = ON");
	db.pragma("busy_timeout = 5000");

	return {
		db,
		close: () => db.close()
	};
}

export function initDb(db: Database.Database): void {
	const tx = db.transaction(() => {
		const row = db.prepare<[], { user_version: number }>("PRAGMA user_version").get();
		const ver = row?.user_version ?? 0;

		if (ver >= SCHEMA_VERSION) {
			return;
		}

		db.exec(`
			CREATE TABLE IF NOT EXISTS readings (
				id              INTEGER PRIMARY KEY AUTOINCREMENT,
				probe_id        TEXT    NOT NULL,
				timestamp       TEXT    NOT NULL,
				nitrogen        REAL    NOT NULL,
				phosphorus      REAL    NOT NULL,
				potassium       REAL    NOT NULL,
				ph              REAL    NOT NULL CHECK (ph BETWEEN 0 AND 14),
				humidity        REAL    NOT NULL CHECK (humidity BETWEEN 0 AND 100),
				temperature     REAL    NOT NULL,
				soil_moisture   REAL    NOT NULL CHECK (soil_moisture BETWEEN 0 AND 100),
				fertility_index REAL    NOT NULL CHECK (fertility_index BETWEEN 0 AND 100),
				UNIQUE (probe_id, timestamp)
			);

			CREATE INDEX IF NOT EXISTS idx_readings_probe_ts
			ON readings (probe_id, timestamp);

			CREATE TABLE IF NOT EXISTS commands (
				seq             INTEGER PRIMARY KEY AUTOINCREMENT,
				id              TEXT    NOT NULL UNIQUE,
				command_type    TEXT    NOT NULL,
				zone            TEXT    NOT NULL,
				parameters      TEXT    NOT NULL DEFAULT '{}',
				status          TEXT    NOT NULL DEFAULT 'pending'
				                CHECK (status IN ('pending','in_progress','completed','failed')),
				created_at      TEXT    NOT NULL,
				completed_at    TEXT,
				result          TEXT,
				CHECK ((status IN ('completed','failed')) = (completed_at IS NOT NULL)),
				CHECK ((status IN ('completed','failed')) = (result IS NOT NULL))
			);

			CREATE INDEX IF NOT EXISTS idx_commands_status_created
			ON commands (status, created_at);

			CREATE INDEX IF NOT EXISTS idx_commands_created
			ON commands (created_at);

			CREATE TABLE IF NOT EXISTS rovers (
				id              TEXT    PRIMARY KEY,
				name            TEXT    NOT NULL,
				type            TEXT    NOT NULL,
				status          TEXT    NOT NULL DEFAULT 'idle' CHECK (status IN ('idle','busy')),
				current_zone    TEXT,
				battery_level   REAL    NOT NULL DEFAULT 100 CHECK (battery_level BETWEEN 0 AND 100),
				last_seen       TEXT
			);
		`);

		db.pragma(`user_version = ${SCHEMA_VERSION}`);
	});

	tx();
}
