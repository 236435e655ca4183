import type Database from "better-sqlite3";
import { COMMAND_STATUSES, ROVER_STATUSES } from "@agri-sim/common";
import type {
	Command,
	CommandParameters,
	CommandStatus,
	LatestReadings,
	NewReading,
	Reading,
	Rover,
	RoverStatus
} from "@agri-sim/common";

import { canTransition, isTerminal } from "../rovers/lifecycle";
import type { RoverConfig } from "./config";
import { AppError, notFound, storageError, validationError } from "./errors";

export interface StatusUpdate {
	result?: string;
	completedAt?: string;
}

export interface StatusUpdateOutcome {
	/** false when the requested transition is not legal from the stored status */
	changed: boolean;
	command: Command;
}

/**
 * Single entry point to the datastore. Every call runs as one transaction on
 * the shared connection; storage failures surface as STORAGE_ERROR.
 */
export interface PersistenceGateway {
	insertReading(reading: NewReading): number;
	queryLatestPerProbe(): LatestReadings;
	queryHistory(probeId: string, sinceDurationMs: number): Reading[];
	hasReadings(probeId: string): boolean;
	listProbeIds(): string[];

	insertCommand(command: Command): string;
	getCommand(id: string): Command;
	updateCommandStatus(id: string, status: CommandStatus, update?: StatusUpdate): StatusUpdateOutcome;
	listCommandsByStatus(status: CommandStatus, limit: number): Command[];
	queryCommandHistory(limit: number): Command[];
	countCommandsByStatus(): Record<CommandStatus, number>;

	listRovers(): Rover[];
	seedRovers(rovers: readonly RoverConfig[]): void;

	ping(): void;
}

type CommandRow = {
	id: string;
	command_type: string;
	zone: string;
	parameters: string;
	status: string;
	created_at: string;
	completed_at: string | null;
	result: string | null;
};

type RoverRow = Omit<Rover, "status"> & { status: string };

const READING_COLUMNS =
	"id, probe_id, timestamp, nitrogen, phosphorus, potassium, ph, humidity, temperature, soil_moisture, fertility_index";

const COMMAND_COLUMNS = "id, command_type, zone, parameters, status, created_at, completed_at, result";

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseParameters(raw: string): CommandParameters {
	const parsed: unknown = JSON.parse(raw);
	return isRecord(parsed) ? parsed : {};
}

function parseCommandStatus(raw: string): CommandStatus {
	const status = COMMAND_STATUSES.find(s => s === raw);
	if (!status) {
		throw storageError(`Unexpected command status '${raw}' in storage`);
	}
	return status;
}

function parseRoverStatus(raw: string): RoverStatus {
	const status = ROVER_STATUSES.find(s => s === raw);
	if (!status) {
		throw storageError(`Unexpected rover status '${raw}' in storage`);
	}
	return status;
}

function toCommand(row: CommandRow): Command {
	return {
		id: row.id,
		command_type: row.command_type,
		zone: row.zone,
		parameters: parseParameters(row.parameters),
		status: parseCommandStatus(row.status),
		created_at: row.created_at,
		completed_at: row.completed_at,
		result: row.result
	};
}

function toRover(row: RoverRow): Rover {
	return { ...row, status: parseRoverStatus(row.status) };
}

function guard<T>(op: string, fn: () => T): T {
	try {
		return fn();
	} catch (err) {
		if (err instanceof AppError) {
			throw err;
		}
		throw storageError(`Storage operation failed: ${op}`, { op }, err);
	}
}

export function createGateway(db: Database.Database, opts: { now?: () => Date } = {}): PersistenceGateway {
	const now = opts.now ?? (() => new Date());

	const stmts = guard("prepare", () => ({
		insertReading: db.prepare<NewReading>(`
			INSERT INTO readings (
				probe_id, timestamp, nitrogen, phosphorus, potassium,
				ph, humidity, temperature, soil_moisture, fertility_index
			) VALUES (
				@probe_id, @timestamp, @nitrogen, @phosphorus, @potassium,
				@ph, @humidity, @temperature, @soil_moisture, @fertility_index
			)
		`),
		latestPerProbe: db.prepare<[], Reading>(`
			SELECT ${READING_COLUMNS}
			FROM (
				SELECT *, ROW_NUMBER() OVER (PARTITION BY probe_id ORDER BY timestamp DESC, id DESC) AS rn
				FROM readings
			)
			WHERE rn = 1
			ORDER BY probe_id
		`),
		history: db.prepare<[string, string], Reading>(`
			SELECT ${READING_COLUMNS}
			FROM readings
			WHERE probe_id = ? AND timestamp >= ?
			ORDER BY timestamp ASC, id ASC
		`),
		hasReadings: db.prepare<[string], { found: number }>(
			"SELECT 1 AS found FROM readings WHERE probe_id = ? LIMIT 1"
		),
		probeIds: db.prepare<[], { probe_id: string }>("SELECT DISTINCT probe_id FROM readings ORDER BY probe_id"),

		insertCommand: db.prepare<[string, string, string, string, string, string, string | null, string | null]>(`
			INSERT INTO commands (id, command_type, zone, parameters, status, created_at, completed_at, result)
			VALUES (?, ?, ?, ?, ?, ?, ?, ?)
		`),
		getCommand: db.prepare<[string], CommandRow>(`SELECT ${COMMAND_COLUMNS} FROM commands WHERE id = ?`),
		// Conditional on the status we read: a concurrent claimer loses here
		transition: db.prepare<[string, string | null, string | null, string, string]>(`
			UPDATE commands
			SET status = ?, completed_at = ?, result = ?
			WHERE id = ? AND status = ?
		`),
		byStatus: db.prepare<[string, number], CommandRow>(`
			SELECT ${COMMAND_COLUMNS} FROM commands
			WHERE status = ?
			ORDER BY created_at ASC, seq ASC
			LIMIT ?
		`),
		commandHistory: db.prepare<[number], CommandRow>(`
			SELECT ${COMMAND_COLUMNS} FROM commands
			ORDER BY created_at DESC, seq DESC
			LIMIT ?
		`),
		countByStatus: db.prepare<[], { status: string; n: number }>(
			"SELECT status, COUNT(*) AS n FROM commands GROUP BY status"
		),

		rovers: db.prepare<[], RoverRow>(
			"SELECT id, name, type, status, current_zone, battery_level, last_seen FROM rovers ORDER BY id"
		),
		upsertRover: db.prepare<[string, string, string, string | null, number, string]>(`
			INSERT INTO rovers (id, name, type, status, current_zone, battery_level, last_seen)
			VALUES (?, ?, ?, 'idle', ?, ?, ?)
			ON CONFLICT (id) DO UPDATE SET
				name = excluded.name,
				type = excluded.type,
				current_zone = COALESCE(excluded.current_zone, rovers.current_zone),
				battery_level = excluded.battery_level,
				last_seen = excluded.last_seen
		`),

		ping: db.prepare<[], { ok: number }>("SELECT 1 AS ok")
	}));

	const updateTx = db.transaction((id: string, status: CommandStatus, update: StatusUpdate): StatusUpdateOutcome => {
		const row = stmts.getCommand.get(id);
		if (!row) {
			throw notFound(`Command '${id}' not found`);
		}
		const command = toCommand(row);

		if (!canTransition(command.status, status)) {
			return { changed: false, command };
		}

		let completedAt: string | null = null;
		let result: string | null = null;
		if (isTerminal(status)) {
			if (!update.result?.trim()) {
				throw validationError(`Moving command '${id}' to ${status} requires a result`);
			}
			result = update.result;
			completedAt = update.completedAt ?? now().toISOString();
		}

		const info = stmts.transition.run(status, completedAt, result, id, command.status);
		if (info.changes !== 1) {
			return { changed: false, command };
		}

		return { changed: true, command: { ...command, status, completed_at: completedAt, result } };
	});

	const seedTx = db.transaction((rovers: readonly RoverConfig[], seenAt: string) => {
		for (const r of rovers) {
			stmts.upsertRover.run(r.id, r.name, r.type, r.currentZone ?? null, r.batteryLevel, seenAt);
		}
	});

	return {
		insertReading(reading) {
			return guard("insertReading", () => {
				const info = stmts.insertReading.run({
					probe_id: reading.probe_id,
					timestamp: reading.timestamp,
					nitrogen: reading.nitrogen,
					phosphorus: reading.phosphorus,
					potassium: reading.potassium,
					ph: reading.ph,
					humidity: reading.humidity,
					temperature: reading.temperature,
					soil_moisture: reading.soil_moisture,
					fertility_index: reading.fertility_index
				});
				return Number(info.lastInsertRowid);
			});
		},

		queryLatestPerProbe() {
			return guard("queryLatestPerProbe", () => {
				const latest: LatestReadings = {};
				for (const row of stmts.latestPerProbe.all()) {
					latest[row.probe_id] = row;
				}
				return latest;
			});
		},

		queryHistory(probeId, sinceDurationMs) {
			return guard("queryHistory", () => {
				const since = new Date(now().getTime() - sinceDurationMs).toISOString();
				return stmts.history.all(probeId, since);
			});
		},

		hasReadings(probeId) {
			return guard("hasReadings", () => stmts.hasReadings.get(probeId) !== undefined);
		},

		listProbeIds() {
			return guard("listProbeIds", () => stmts.probeIds.all().map(r => r.probe_id));
		},

		insertCommand(command) {
			return guard("insertCommand", () => {
				stmts.insertCommand.run(
					command.id,
					command.command_type,
					command.zone,
					JSON.stringify(command.parameters),
					command.status,
					command.created_at,
					command.completed_at,
					command.result
				);
				return command.id;
			});
		},

		getCommand(id) {
			return guard("getCommand", () => {
				const row = stmts.getCommand.get(id);
				if (!row) {
					throw notFound(`Command '${id}' not found`);
				}
				return toCommand(row);
			});
		},

		updateCommandStatus(id, status, update = {}) {
			return guard("updateCommandStatus", () => updateTx(id, status, update));
		},

		listCommandsByStatus(status, limit) {
			return guard("listCommandsByStatus", () => stmts.byStatus.all(status, limit).map(toCommand));
		},

		queryCommandHistory(limit) {
			return guard("queryCommandHistory", () => stmts.commandHistory.all(limit).map(toCommand));
		},

		countCommandsByStatus() {
			return guard("countCommandsByStatus", () => {
				const counts: Record<CommandStatus, number> = { pending: 0, in_progress: 0, completed: 0, failed: 0 };
				for (const row of stmts.countByStatus.all()) {
					counts[parseCommandStatus(row.status)] = row.n;
				}
				return counts;
			});
		},

		listRovers() {
			return guard("listRovers", () => stmts.rovers.all().map(toRover));
		},

		seedRovers(rovers) {
			guard("seedRovers", () => seedTx(rovers, now().toISOString()));
		},

		ping() {
			guard("ping", () => stmts.ping.get());
		}
	};
}
