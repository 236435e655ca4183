// Wire shapes (used by the server + realtime clients)
export { COMMAND_STATUSES, METRIC_NAMES, ROVER_STATUSES, encodeFrame } from "./agriculture";
export type {
	Command,
	CommandCompletedEvent,
	CommandParameters,
	CommandStartedEvent,
	CommandStatus,
	HubEventName,
	HubEvents,
	HubFrame,
	LatestReadings,
	MetricName,
	NewReading,
	Reading,
	ReadingMetrics,
	Rover,
	RoverStatus,
	TerminalCommandStatus
} from "./agriculture";

// Validation schemas for inbound messages
export { ClientMessageSchema, CommandSubmissionSchema } from "./schema";
export type { CommandSubmission } from "./schema";
