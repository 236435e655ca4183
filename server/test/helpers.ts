import type { HubEventName, HubEvents } from "@agri-sim/common";

import { parseConfig } from "../src/lib/config";
import type { AppConfig } from "../src/lib/config";
import { createGateway } from "../src/lib/gateway";
import type { PersistenceGateway } from "../src/lib/gateway";
import { createLogger } from "../src/lib/log";
import type { Logger } from "../src/lib/log";
import { initDb, openDb } from "../src/lib/sqlite";
import type { DbHandle } from "../src/lib/sqlite";
import type { EventPublisher } from "../src/realtime/hub";

export function silentLogger(): Logger {
	return createLogger({ serviceName: "test", silent: true });
}

export function memoryDb(): DbHandle {
	const handle = openDb(":memory:");
	initDb(handle.db);
	return handle;
}

export function memoryGateway(now?: () => Date): { handle: DbHandle; gateway: PersistenceGateway } {
	const handle = memoryDb();
	return { handle, gateway: createGateway(handle.db, { now }) };
}

export function testConfig(raw: Record<string, unknown> = {}): AppConfig {
	return parseConfig({ paths: { sqlite: ":memory:", logDir: "./logs" }, ...raw });
}

export interface PublishedEvent {
	event: HubEventName;
	payload: unknown;
}

export interface RecordingPublisher extends EventPublisher {
	events: PublishedEvent[];
	payloads(event: HubEventName): unknown[];
}

export function recordingPublisher(): RecordingPublisher {
	const events: PublishedEvent[] = [];
	return {
		events,
		publish<K extends HubEventName>(event: K, payload: HubEvents[K]) {
			events.push({ event, payload });
			return 1;
		},
		payloads(event) {
			return events.filter(e => e.event === event).map(e => e.payload);
		}
	};
}

/** Run fn and return what it threw. */
export function caught(fn: () => unknown): unknown {
	try {
		fn();
	} catch (err) {
		return err;
	}
	throw new Error("Expected function to throw");
}

export function tick(): Promise<void> {
	return new Promise(resolve => setImmediate(resolve));
}
