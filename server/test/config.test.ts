import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { loadConfig, parseConfig } from "../src/lib/config";
import { AppError, isAppError } from "../src/lib/errors";
import { caught } from "./helpers";

describe("parseConfig", () => {
	it("fills defaults for an empty file", () => {
		const cfg = parseConfig({});

		expect(cfg.server).toEqual({ host: "0.0.0.0", port: 5000, corsOrigins: ["*"] });
		expect(cfg.realtime.path).toBe("/ws");
		expect(cfg.logLevel).toBe("info");
		expect(cfg.sensors.intervalMs).toBe(10_000);
		expect(cfg.sensors.activeWindowMs).toBe(30_000);
		expect(cfg.sensors.probes.map(p => p.probeId)).toEqual(["Probe_1", "Probe_2", "Probe_3", "Probe_4"]);
		expect(cfg.dispatcher.pollIntervalMs).toBe(5_000);
		expect(cfg.dispatcher.failureProbability).toBe(0.05);
		expect(cfg.rovers.map(r => r.id)).toEqual(["rover_1", "rover_2"]);
	});

	it("reuses default baselines round-robin for extra probes", () => {
		const cfg = parseConfig({ sensors: { probeCount: 6 } });

		expect(cfg.sensors.probes).toHaveLength(6);
		expect(cfg.sensors.probes[5].probeId).toBe("Probe_6");
		expect(cfg.sensors.probes[5].baseline).toEqual(cfg.sensors.probes[1].baseline);
	});

	it("merges a partial probe baseline over the default", () => {
		const cfg = parseConfig({ sensors: { probes: [{ probeId: "North", baseline: { ph: 5.9 } }] } });

		expect(cfg.sensors.probes).toHaveLength(1);
		expect(cfg.sensors.probes[0].baseline.ph).toBe(5.9);
		expect(cfg.sensors.probes[0].baseline.nitrogen).toBe(45);
	});

	it("derives the activity window from the interval", () => {
		expect(parseConfig({ sensors: { intervalMs: 2_000 } }).sensors.activeWindowMs).toBe(6_000);
	});

	it("applies environment overrides", () => {
		const cfg = parseConfig(
			{ server: { port: 7000 }, logLevel: "warn" },
			{ PORT: "8080", HOST: "127.0.0.1", LOG_LEVEL: "DEBUG", AGRI_SQLITE_PATH: ":memory:" }
		);

		expect(cfg.server.port).toBe(8080);
		expect(cfg.server.host).toBe("127.0.0.1");
		expect(cfg.logLevel).toBe("debug");
		expect(cfg.paths.sqlite).toBe(":memory:");
	});

	it("rejects a non-numeric PORT", () => {
		const err = caught(() => parseConfig({}, { PORT: "abc" }));
		expect(isAppError(err, "CONFIG_ERROR")).toBe(true);
	});

	it("rejects an unknown LOG_LEVEL", () => {
		expect(() => parseConfig({}, { LOG_LEVEL: "loud" })).toThrow("LOG_LEVEL must be one of");
	});

	it("rejects invalid values with the offending path", () => {
		const err = caught(() => parseConfig({ dispatcher: { failureProbability: 2 } }));

		expect(err).toBeInstanceOf(AppError);
		expect(isAppError(err, "CONFIG_ERROR")).toBe(true);
		if (err instanceof Error) {
			expect(err.message).toMatch(/^Invalid configuration: dispatcher\.failureProbability: /);
		}
	});

	it("rejects duplicate probe ids", () => {
		expect(() => parseConfig({ sensors: { probes: [{ probeId: "A" }, { probeId: "A" }] } })).toThrow(
			"sensors.probes: duplicate probeId 'A'"
		);
	});

	it("rejects a max execution delay below the base delay", () => {
		expect(() => parseConfig({ dispatcher: { execution: { baseDelayMs: 5000, maxDelayMs: 1000 } } })).toThrow(
			"dispatcher.execution.maxDelayMs must be >= baseDelayMs"
		);
	});
});

describe("loadConfig", () => {
	let dir: string | undefined;

	afterEach(() => {
		if (dir) fs.rmSync(dir, { recursive: true, force: true });
		dir = undefined;
	});

	it("reads the file and creates the data and log directories", () => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "agri-config-"));
		const configPath = path.join(dir, "config.json");
		const sqlite = path.join(dir, "data", "db.sqlite");
		const logDir = path.join(dir, "logs");
		fs.writeFileSync(configPath, JSON.stringify({ paths: { sqlite, logDir }, server: { port: 5050 } }));

		const cfg = loadConfig({ configPath, env: {} });

		expect(cfg.server.port).toBe(5050);
		expect(fs.existsSync(path.join(dir, "data"))).toBe(true);
		expect(fs.existsSync(logDir)).toBe(true);
	});

	it("reports an unreadable file as CONFIG_ERROR", () => {
		const err = caught(() => loadConfig({ configPath: "/nonexistent/agri.json", env: {} }));

		expect(isAppError(err, "CONFIG_ERROR")).toBe(true);
		if (err instanceof Error) {
			expect(err.message).toMatch(/^Cannot read config file '\/nonexistent\/agri\.json'/);
		}
	});
});
