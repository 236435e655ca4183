import { CommandSubmissionSchema, ROVER_STATUSES } from "@agri-sim/common";
import type { Command, CommandStatus, LatestReadings, Reading, Rover, RoverStatus } from "@agri-sim/common";

import { errorMessage, fromZodError, notFound } from "./lib/errors";
import type { PersistenceGateway } from "./lib/gateway";
import type { CommandEngine } from "./rovers/engine";
import { evaluateLatest } from "./sensors/alerts";
import type { ProbeAlert } from "./sensors/alerts";

export const DEFAULT_COMMAND_HISTORY_LIMIT = 50;

const HOUR_MS = 60 * 60 * 1000;

export interface SystemStatus {
	probes: {
		configured: number;
		/** Probes with a reading inside the activity window. */
		active: number;
		last_update: string | null;
	};
	rovers: Record<RoverStatus, number> & { total: number };
	commands: Record<CommandStatus, number> & { total: number };
	system: {
		version: string;
		started_at: string;
		uptime_seconds: number;
	};
}

export interface HealthReport {
	status: "ok" | "degraded";
	database: "ok" | "error";
	timestamp: string;
	error?: string;
}

export interface FacadeOptions {
	gateway: PersistenceGateway;
	commands: Pick<CommandEngine, "submit">;
	probeIds: readonly string[];
	activeWindowMs: number;
	version: string;
	startedAt?: Date;
	now?: () => Date;
}

export interface Facade {
	getLatestReadings(): LatestReadings;
	getProbeHistory(probeId: string, hours: number): Reading[];
	submitCommand(body: unknown): Command;
	getCommandHistory(limit?: number): Command[];
	getCommand(id: string): Command;
	listRovers(): Rover[];
	getStatus(): SystemStatus;
	getAlerts(): ProbeAlert[];
	health(): HealthReport;
}

export function createFacade(opts: FacadeOptions): Facade {
	const { gateway, commands, activeWindowMs, version } = opts;
	const now = opts.now ?? (() => new Date());
	const startedAt = opts.startedAt ?? now();
	const configured = new Set(opts.probeIds);

	return {
		getLatestReadings() {
			return gateway.queryLatestPerProbe();
		},

		getProbeHistory(probeId, hours) {
			if (!configured.has(probeId) && !gateway.hasReadings(probeId)) {
				throw notFound(`Probe '${probeId}' not found`);
			}
			return gateway.queryHistory(probeId, hours * HOUR_MS);
		},

		submitCommand(body) {
			const res = CommandSubmissionSchema.safeParse(body);
			if (!res.success) {
				throw fromZodError("Invalid command", res.error);
			}
			return commands.submit(res.data);
		},

		getCommandHistory(limit = DEFAULT_COMMAND_HISTORY_LIMIT) {
			return gateway.queryCommandHistory(limit);
		},

		getCommand(id) {
			return gateway.getCommand(id);
		},

		listRovers() {
			return gateway.listRovers();
		},

		getStatus() {
			const at = now();
			const latest = Object.values(gateway.queryLatestPerProbe());

			let lastUpdate: string | null = null;
			let active = 0;
			for (const r of latest) {
				if (at.getTime() - Date.parse(r.timestamp) <= activeWindowMs) active++;
				if (lastUpdate === null || r.timestamp > lastUpdate) lastUpdate = r.timestamp;
			}

			const rovers = gateway.listRovers();
			const roverCounts: Record<RoverStatus, number> = { idle: 0, busy: 0 };
			for (const status of ROVER_STATUSES) {
				roverCounts[status] = rovers.filter(r => r.status === status).length;
			}

			const commandCounts = gateway.countCommandsByStatus();
			const commandTotal = Object.values(commandCounts).reduce((sum, n) => sum + n, 0);

			return {
				probes: {
					configured: configured.size,
					active,
					last_update: lastUpdate
				},
				rovers: { ...roverCounts, total: rovers.length },
				commands: { ...commandCounts, total: commandTotal },
				system: {
					version,
					started_at: startedAt.toISOString(),
					uptime_seconds: Math.floor((at.getTime() - startedAt.getTime()) / 1000)
				}
			};
		},

		getAlerts() {
			return evaluateLatest(gateway.queryLatestPerProbe());
		},

		health() {
			const timestamp = now().toISOString();
			try {
				gateway.ping();
				return { status: "ok", database: "ok", timestamp };
			} catch (err) {
				return { status: "degraded", database: "error", timestamp, error: errorMessage(err) };
			}
		}
	};
}
