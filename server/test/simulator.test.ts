import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { METRIC_NAMES } from "@agri-sim/common";
import type { NewReading } from "@agri-sim/common";

import { parseConfig } from "../src/lib/config";
import type { PersistenceGateway } from "../src/lib/gateway";
import type { DbHandle } from "../src/lib/sqlite";
import { withinPhysicalBounds } from "../src/sensors/metrics";
import { createSensorSimulator } from "../src/sensors/simulator";
import { nextTimestampMs } from "../src/sensors/soil-probe";
import { memoryGateway, recordingPublisher, silentLogger } from "./helpers";

const probes = parseConfig({}).sensors.probes;
const logger = silentLogger();

describe("SensorSimulator", () => {
	let handle: DbHandle;
	let gateway: PersistenceGateway;

	beforeEach(() => {
		({ handle, gateway } = memoryGateway());
	});

	afterEach(() => {
		vi.useRealTimers();
		handle.close();
	});

	it("ticks immediately and then on every interval", () => {
		vi.useFakeTimers();
		vi.setSystemTime(new Date("2026-03-01T08:00:00.000Z"));
		const publisher = recordingPublisher();
		const sim = createSensorSimulator({ gateway, publisher, logger, probes, intervalMs: 10_000 });

		sim.start();
		const first = gateway.queryLatestPerProbe();
		expect(Object.keys(first)).toEqual(["Probe_1", "Probe_2", "Probe_3", "Probe_4"]);

		vi.advanceTimersByTime(10_000);
		sim.stop();

		const latest = gateway.queryLatestPerProbe();
		expect(Object.keys(latest)).toHaveLength(4);
		for (const probeId of sim.probeIds) {
			expect(latest[probeId].timestamp > first[probeId].timestamp).toBe(true);
			expect(latest[probeId].timestamp).toBe("2026-03-01T08:00:10.000Z");
		}
		expect(publisher.payloads("sensor_data")).toHaveLength(8);

		vi.advanceTimersByTime(30_000);
		expect(publisher.payloads("sensor_data")).toHaveLength(8);
		expect(sim.isRunning()).toBe(false);
	});

	it("starts only once", () => {
		vi.useFakeTimers();
		const publisher = recordingPublisher();
		const sim = createSensorSimulator({ gateway, publisher, logger, probes, intervalMs: 1_000 });

		sim.start();
		sim.start();
		vi.advanceTimersByTime(1_000);
		sim.stop();

		expect(publisher.payloads("sensor_data")).toHaveLength(8);
	});

	it("samples the baseline when noise and drift are zero", () => {
		const sim = createSensorSimulator({
			gateway,
			publisher: recordingPublisher(),
			logger,
			probes: probes.slice(0, 1),
			intervalMs: 1_000,
			random: () => 0.5
		});

		const [r] = sim.tick();

		expect(r.probe_id).toBe("Probe_1");
		expect(r.nitrogen).toBe(45);
		expect(r.ph).toBe(6.5);
		expect(r.soil_moisture).toBe(55);
		expect(r.fertility_index).toBe(80);
	});

	it("keeps every value inside physical bounds and varies over time", () => {
		const sim = createSensorSimulator({ gateway, publisher: recordingPublisher(), logger, probes, intervalMs: 1_000 });

		for (let i = 0; i < 25; i++) sim.tick();

		const history = gateway.queryHistory("Probe_1", 24 * 60 * 60 * 1000);
		expect(history).toHaveLength(25);
		for (const r of history) {
			for (const metric of METRIC_NAMES) {
				expect(withinPhysicalBounds(metric, r[metric])).toBe(true);
			}
		}
		expect(new Set(history.map(r => r.soil_moisture)).size).toBeGreaterThan(1);
	});

	it("keeps timestamps strictly increasing when the clock stalls", () => {
		const frozen = new Date("2026-03-01T08:00:00.000Z");
		const sim = createSensorSimulator({
			gateway,
			publisher: recordingPublisher(),
			logger,
			probes: probes.slice(0, 1),
			intervalMs: 1_000,
			now: () => frozen
		});

		sim.tick();
		sim.tick();

		const history = gateway.queryHistory("Probe_1", 24 * 60 * 60 * 1000);
		expect(history.map(r => r.timestamp)).toEqual(["2026-03-01T08:00:00.000Z", "2026-03-01T08:00:00.001Z"]);
	});

	it("skips a failing probe and keeps the others", () => {
		const publisher = recordingPublisher();
		const flaky: Pick<PersistenceGateway, "insertReading"> = {
			insertReading(reading: NewReading) {
				if (reading.probe_id === "Probe_2") throw new Error("disk full");
				return gateway.insertReading(reading);
			}
		};
		const sim = createSensorSimulator({ gateway: flaky, publisher, logger, probes, intervalMs: 1_000 });

		const readings = sim.tick();

		expect(readings.map(r => r.probe_id)).toEqual(["Probe_1", "Probe_3", "Probe_4"]);
		expect(publisher.payloads("sensor_data")).toHaveLength(3);
	});

	it("rejects a non-positive interval", () => {
		expect(() =>
			createSensorSimulator({ gateway, publisher: recordingPublisher(), logger, probes, intervalMs: 0 })
		).toThrow("Sensor interval must be a positive number of milliseconds");
	});
});

describe("nextTimestampMs", () => {
	it("uses the clock unless it would repeat or go back", () => {
		const state = { probeId: "P", baseline: probes[0].baseline, lastTimestampMs: 5_000 };

		expect(nextTimestampMs(state, new Date(9_000))).toBe(9_000);
		expect(nextTimestampMs(state, new Date(5_000))).toBe(5_001);
		expect(nextTimestampMs(state, new Date(1_000))).toBe(5_001);
	});
});
