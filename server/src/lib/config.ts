import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { ReadingMetrics } from "@agri-sim/common";

import { configError, errorMessage, fromZodError } from "./errors";

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ProbeConfig {
	probeId: string;
	baseline: ReadingMetrics;
}

export interface RoverConfig {
	id: string;
	name: string;
	type: string;
	batteryLevel: number;
	currentZone?: string;
}

export interface ExecutionConfig {
	baseDelayMs: number;
	msPerUnit: number;
	maxDelayMs: number;
	jitterMs: number;
}

export interface AppConfig {
	server: {
		host: string;
		port: number;
		corsOrigins: string[];
	};

	realtime: {
		path: string;
		maxBufferedBytes: number;
		maxQueuePerSubscriber: number;
	};

	paths: {
		sqlite: string;
		logDir: string;
	};

	logLevel: LogLevel;

	sensors: {
		intervalMs: number;
		/** A probe without a reading for this long is reported inactive. */
		activeWindowMs: number;
		probes: ProbeConfig[];
	};

	dispatcher: {
		pollIntervalMs: number;
		failureProbability: number;
		maxInFlight: number;
		execution: ExecutionConfig;
	};

	rovers: RoverConfig[];
}

/* ---------- defaults ---------- */

const DEFAULT_SQLITE = "./data/agri-sim.sqlite";
const DEFAULT_LOG_DIR = "./logs";
const DEFAULT_LOG_LEVEL: LogLevel = "info";
const DEFAULT_PORT = 5000;
const DEFAULT_SENSOR_INTERVAL_MS = 10_000;
const DEFAULT_PROBE_COUNT = 4;

// Field baselines of the four demo probes; further probes reuse them round-robin.
const DEFAULT_BASELINES: readonly ReadingMetrics[] = [
	{ nitrogen: 45, phosphorus: 30, potassium: 35, ph: 6.5, humidity: 65, temperature: 24, soil_moisture: 55, fertility_index: 80 },
	{ nitrogen: 40, phosphorus: 25, potassium: 30, ph: 6.8, humidity: 70, temperature: 23, soil_moisture: 60, fertility_index: 75 },
	{ nitrogen: 50, phosphorus: 35, potassium: 40, ph: 6.3, humidity: 60, temperature: 25, soil_moisture: 50, fertility_index: 85 },
	{ nitrogen: 35, phosphorus: 20, potassium: 25, ph: 7.0, humidity: 75, temperature: 22, soil_moisture: 65, fertility_index: 72 }
];

const DEFAULT_ROVERS: readonly RoverConfig[] = [
	{ id: "rover_1", name: "Irrigation Rover", type: "irrigation", batteryLevel: 100 },
	{ id: "rover_2", name: "Fertilizer Rover", type: "fertilizer", batteryLevel: 95 }
];

/* ---------- file schema ---------- */

const positiveInt = z.number().int().positive();

const BaselineSchema = z
	.object({
		nitrogen: z.number(),
		phosphorus: z.number(),
		potassium: z.number(),
		ph: z.number(),
		humidity: z.number(),
		temperature: z.number(),
		soil_moisture: z.number(),
		fertility_index: z.number()
	})
	.partial();

const ConfigFileSchema = z
	.object({
		server: z
			.object({
				host: z.string().min(1),
				port: z.number().int().min(0).max(65535),
				corsOrigins: z.array(z.string().min(1))
			})
			.partial(),
		realtime: z
			.object({
				path: z.string().startsWith("/"),
				maxBufferedBytes: positiveInt,
				maxQueuePerSubscriber: positiveInt
			})
			.partial(),
		paths: z
			.object({
				sqlite: z.string().min(1),
				logDir: z.string().min(1)
			})
			.partial(),
		logLevel: z.enum(LOG_LEVELS),
		sensors: z
			.object({
				intervalMs: positiveInt,
				activeWindowMs: positiveInt,
				probeCount: positiveInt.max(64),
				probes: z
					.array(z.object({ probeId: z.string().min(1), baseline: BaselineSchema.optional() }))
					.min(1)
			})
			.partial(),
		dispatcher: z
			.object({
				pollIntervalMs: positiveInt,
				failureProbability: z.number().min(0).max(1),
				maxInFlight: positiveInt,
				execution: z
					.object({
						baseDelayMs: z.number().int().nonnegative(),
						msPerUnit: z.number().int().nonnegative(),
						maxDelayMs: z.number().int().nonnegative(),
						jitterMs: z.number().int().nonnegative()
					})
					.partial()
			})
			.partial(),
		rovers: z
			.array(
				z.object({
					id: z.string().min(1),
					name: z.string().min(1),
					type: z.string().min(1),
					batteryLevel: z.number().min(0).max(100).default(100),
					currentZone: z.string().min(1).optional()
				})
			)
			.min(1)
	})
	.partial();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/* ---------- helpers ---------- */

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

function optionalIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
	const raw = env[name]?.trim();
	if (!raw) return undefined;
	if (!/^\d+$/.test(raw)) {
		throw configError(`Environment variable ${name} must be a non-negative integer`);
	}
	return Number.parseInt(raw, 10);
}

function optionalStringEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
	const value = env[name]?.trim();
	return value ? value : undefined;
}

function resolveLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
	if (raw === undefined) return fallback;
	const level = LOG_LEVELS.find(l => l === raw.toLowerCase());
	if (!level) {
		throw configError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`);
	}
	return level;
}

function buildProbes(sensors: ConfigFile["sensors"]): ProbeConfig[] {
	const baselineAt = (i: number): ReadingMetrics => DEFAULT_BASELINES[i % DEFAULT_BASELINES.length];

	if (sensors?.probes) {
		const seen = new Set<string>();
		return sensors.probes.map((p, i) => {
			if (seen.has(p.probeId)) {
				throw configError(`sensors.probes: duplicate probeId '${p.probeId}'`);
			}
			seen.add(p.probeId);
			return { probeId: p.probeId, baseline: { ...baselineAt(i), ...p.baseline } };
		});
	}

	const count = sensors?.probeCount ?? DEFAULT_PROBE_COUNT;
	return Array.from({ length: count }, (_, i) => ({
		probeId: `Probe_${i + 1}`,
		baseline: { ...baselineAt(i) }
	}));
}

/* ---------- public API ---------- */

/**
 * Build the effective configuration from a parsed config file (may be empty)
 * and environment overrides. Throws a CONFIG_ERROR on invalid input.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): AppConfig {
	const res = ConfigFileSchema.safeParse(raw ?? {});
	if (!res.success) {
		const err = fromZodError("Invalid configuration", res.error);
		throw configError(err.message, err.details);
	}
	const file = res.data;

	const execution = file.dispatcher?.execution;
	const cfg: AppConfig = {
		server: {
			host: optionalStringEnv(env, "HOST") ?? file.server?.host ?? "0.0.0.0",
			port: optionalIntEnv(env, "PORT") ?? file.server?.port ?? DEFAULT_PORT,
			corsOrigins: file.server?.corsOrigins ?? ["*"]
		},
		realtime: {
			path: file.realtime?.path ?? "/ws",
			maxBufferedBytes: file.realtime?.maxBufferedBytes ?? 256 * 1024,
			maxQueuePerSubscriber: file.realtime?.maxQueuePerSubscriber ?? 100
		},
		paths: {
			sqlite: optionalStringEnv(env, "AGRI_SQLITE_PATH") ?? file.paths?.sqlite ?? DEFAULT_SQLITE,
			logDir: optionalStringEnv(env, "AGRI_LOG_DIR") ?? file.paths?.logDir ?? DEFAULT_LOG_DIR
		},
		logLevel: resolveLogLevel(optionalStringEnv(env, "LOG_LEVEL"), file.logLevel ?? DEFAULT_LOG_LEVEL),
		sensors: {
			intervalMs: file.sensors?.intervalMs ?? DEFAULT_SENSOR_INTERVAL_MS,
			activeWindowMs: file.sensors?.activeWindowMs ?? 3 * (file.sensors?.intervalMs ?? DEFAULT_SENSOR_INTERVAL_MS),
			probes: buildProbes(file.sensors)
		},
		dispatcher: {
			pollIntervalMs: file.dispatcher?.pollIntervalMs ?? 5_000,
			failureProbability: file.dispatcher?.failureProbability ?? 0.05,
			maxInFlight: file.dispatcher?.maxInFlight ?? 4,
			execution: {
				baseDelayMs: execution?.baseDelayMs ?? 5_000,
				msPerUnit: execution?.msPerUnit ?? 250,
				maxDelayMs: execution?.maxDelayMs ?? 15_000,
				jitterMs: execution?.jitterMs ?? 1_000
			}
		},
		rovers: file.rovers ?? DEFAULT_ROVERS.map(r => ({ ...r }))
	};

	if (cfg.dispatcher.execution.maxDelayMs < cfg.dispatcher.execution.baseDelayMs) {
		throw configError("dispatcher.execution.maxDelayMs must be >= baseDelayMs");
	}

	return cfg;
}

export function loadConfig(opts: { configPath?: string; env?: NodeJS.ProcessEnv } = {}): AppConfig {
	const env = opts.env ?? process.env;

	let raw: unknown = {};
	if (opts.configPath) {
		try {
			raw = JSON.parse(fs.readFileSync(opts.configPath, "utf8"));
		} catch (err) {
			throw configError(`Cannot read config file '${opts.configPath}': ${errorMessage(err)}`);
		}
	}

	const cfg = parseConfig(raw, env);

	if (cfg.paths.sqlite !== ":memory:") {
		ensureDir(path.dirname(cfg.paths.sqlite));
	}
	ensureDir(cfg.paths.logDir);

	return cfg;
}
