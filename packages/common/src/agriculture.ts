// Wire shapes shared by the simulation server and its clients.
// Field names are snake_case: they are the JSON the API and the socket emit.

export const METRIC_NAMES = [
	"nitrogen",
	"phosphorus",
	"potassium",
	"ph",
	"humidity",
	"temperature",
	"soil_moisture",
	"fertility_index"
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export type ReadingMetrics = Record<MetricName, number>;

export interface Reading extends ReadingMetrics {
	id: number;
	probe_id: string;
	timestamp: string; // ISO 8601, e.g. 2026-01-23T12:34:56.789Z
}

export type NewReading = Omit<Reading, "id">;

/** Latest reading per probe, keyed by probe_id. */
export type LatestReadings = Record<string, Reading>;

export const COMMAND_STATUSES = ["pending", "in_progress", "completed", "failed"] as const;

export type CommandStatus = (typeof COMMAND_STATUSES)[number];

export type TerminalCommandStatus = Extract<CommandStatus, "completed" | "failed">;

export type CommandParameters = Record<string, unknown>;

export interface Command {
	id: string;
	command_type: string;
	zone: string;
	parameters: CommandParameters;
	status: CommandStatus;
	created_at: string;
	completed_at: string | null;
	result: string | null;
}

export const ROVER_STATUSES = ["idle", "busy"] as const;

export type RoverStatus = (typeof ROVER_STATUSES)[number];

export interface Rover {
	id: string;
	name: string;
	type: string;
	status: RoverStatus;
	current_zone: string | null;
	battery_level: number;
	last_seen: string | null;
}

export interface CommandStartedEvent {
	command_id: string;
	status: "in_progress";
	timestamp: string;
}

export interface CommandCompletedEvent {
	command_id: string;
	status: TerminalCommandStatus;
	result: string;
	completed_at: string;
}

/** Server -> client events pushed over the realtime channel. */
export interface HubEvents {
	connected: { message: string };
	sensor_data: Reading;
	new_command: Command;
	command_started: CommandStartedEvent;
	command_completed: CommandCompletedEvent;
	latest_sensor_data: LatestReadings;
}

export type HubEventName = keyof HubEvents;

export interface HubFrame<K extends HubEventName = HubEventName> {
	event: K;
	data: HubEvents[K];
}

export function encodeFrame<K extends HubEventName>(event: K, data: HubEvents[K]): string {
	const frame: HubFrame<K> = { event, data };
	return JSON.stringify(frame);
}
