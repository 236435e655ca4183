import type { Reading } from "@agri-sim/common";

import type { ProbeConfig } from "../lib/config";
import { errorMessage } from "../lib/errors";
import type { PersistenceGateway } from "../lib/gateway";
import type { Logger } from "../lib/log";
import type { EventPublisher } from "../realtime/hub";
import { createProbeState, driftBaseline, nextTimestampMs, sampleMetrics } from "./soil-probe";
import type { ProbeState, RandomSource } from "./soil-probe";

export interface SensorSimulatorOptions {
	gateway: Pick<PersistenceGateway, "insertReading">;
	publisher: EventPublisher;
	logger: Logger;
	probes: readonly ProbeConfig[];
	intervalMs: number;
	random?: RandomSource;
	now?: () => Date;
}

export interface SensorSimulator {
	readonly probeIds: readonly string[];
	/** Generate, persist and publish one reading per probe. */
	tick(): Reading[];
	start(): void;
	stop(): void;
	isRunning(): boolean;
}

export function createSensorSimulator(opts: SensorSimulatorOptions): SensorSimulator {
	const { gateway, publisher, logger, intervalMs } = opts;
	const random = opts.random ?? Math.random;
	const now = opts.now ?? (() => new Date());

	if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
		throw new Error("Sensor interval must be a positive number of milliseconds");
	}

	const states: ProbeState[] = opts.probes.map(createProbeState);
	let timer: NodeJS.Timeout | undefined;

	const readProbe = (state: ProbeState): Reading => {
		driftBaseline(state, random);
		const metrics = sampleMetrics(state.baseline, random);
		const tsMs = nextTimestampMs(state, now());

		const reading: Omit<Reading, "id"> = {
			probe_id: state.probeId,
			timestamp: new Date(tsMs).toISOString(),
			...metrics
		};

		const id = gateway.insertReading(reading);
		state.lastTimestampMs = tsMs;
		return { id, ...reading };
	};

	const tick = (): Reading[] => {
		const out: Reading[] = [];

		for (const state of states) {
			let reading: Reading;
			try {
				reading = readProbe(state);
			} catch (err) {
				// Skip this probe for this tick; the schedule keeps going
				logger.error("Sensor tick failed for probe=%s: %s", state.probeId, errorMessage(err));
				continue;
			}

			publisher.publish("sensor_data", reading);
			out.push(reading);
			logger.debug(
				"Reading stored: probe=%s id=%d ts=%s ph=%d moisture=%d",
				reading.probe_id,
				reading.id,
				reading.timestamp,
				reading.ph,
				reading.soil_moisture
			);
		}

		return out;
	};

	const safeTick = (): void => {
		try {
			tick();
		} catch (err) {
			logger.error("Sensor tick aborted: %s", errorMessage(err));
		}
	};

	return {
		probeIds: states.map(s => s.probeId),
		tick,

		start() {
			if (timer) return;
			logger.info("Sensor simulator starting (probes=%d intervalMs=%d)", states.length, intervalMs);
			safeTick();
			timer = setInterval(safeTick, intervalMs);
		},

		stop() {
			if (!timer) return;
			clearInterval(timer);
			timer = undefined;
			logger.info("Sensor simulator stopped");
		},

		isRunning() {
			return timer !== undefined;
		}
	};
}
