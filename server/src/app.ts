import type { FastifyInstance } from "fastify";

import { createFacade } from "./facade";
import type { Facade } from "./facade";
import { buildServer } from "./http/server";
import type { AppConfig } from "./lib/config";
import { errorMessage } from "./lib/errors";
import { createGateway } from "./lib/gateway";
import type { PersistenceGateway } from "./lib/gateway";
import type { Logger } from "./lib/log";
import { initDb, openDb } from "./lib/sqlite";
import { createBroadcastHub } from "./realtime/hub";
import type { BroadcastHub } from "./realtime/hub";
import { createCommandEngine } from "./rovers/engine";
import type { CommandEngine } from "./rovers/engine";
import { createSensorSimulator } from "./sensors/simulator";
import type { SensorSimulator } from "./sensors/simulator";

export const VERSION = "1.0.0";

export interface AppOptions {
	logger: Logger;
	random?: () => number;
	now?: () => Date;
}

export interface App {
	config: AppConfig;
	logger: Logger;
	gateway: PersistenceGateway;
	hub: BroadcastHub;
	simulator: SensorSimulator;
	engine: CommandEngine;
	facade: Facade;
	server: FastifyInstance;
	/** Listen on the configured address, then start both schedulers. */
	start(): Promise<string>;
	/** Graceful stop: schedulers, in-flight commands, HTTP, database. */
	stop(): Promise<void>;
}

export async function createApp(config: AppConfig, opts: AppOptions): Promise<App> {
	const { logger } = opts;
	const now = opts.now ?? (() => new Date());

	const handle = openDb(config.paths.sqlite);

	try {
		initDb(handle.db);

		const gateway = createGateway(handle.db, { now });
		gateway.seedRovers(config.rovers);

		const hub = createBroadcastHub({ logger, maxQueuePerSubscriber: config.realtime.maxQueuePerSubscriber });

		const simulator = createSensorSimulator({
			gateway,
			publisher: hub,
			logger,
			probes: config.sensors.probes,
			intervalMs: config.sensors.intervalMs,
			random: opts.random,
			now
		});

		const engine = createCommandEngine({
			gateway,
			publisher: hub,
			logger,
			pollIntervalMs: config.dispatcher.pollIntervalMs,
			failureProbability: config.dispatcher.failureProbability,
			maxInFlight: config.dispatcher.maxInFlight,
			execution: config.dispatcher.execution,
			random: opts.random,
			now
		});

		const recovered = engine.recoverInterrupted();
		if (recovered > 0) {
			logger.warn("Marked %d interrupted command(s) as failed", recovered);
		}

		const facade = createFacade({
			gateway,
			commands: engine,
			probeIds: simulator.probeIds,
			activeWindowMs: config.sensors.activeWindowMs,
			version: VERSION,
			now
		});

		const server = await buildServer({
			facade,
			hub,
			logger,
			corsOrigins: config.server.corsOrigins,
			realtime: config.realtime
		});

		let stopping: Promise<void> | undefined;

		const shutdown = async (): Promise<void> => {
			simulator.stop();
			await engine.stop();
			await server.close();
			handle.close();
			logger.info("Shutdown complete");
		};

		return {
			config,
			logger,
			gateway,
			hub,
			simulator,
			engine,
			facade,
			server,

			async start() {
				const address = await server.listen({ host: config.server.host, port: config.server.port });
				logger.info("HTTP listening on %s (realtime path %s)", address, config.realtime.path);
				simulator.start();
				engine.start();
				return address;
			},

			stop() {
				stopping ??= shutdown();
				return stopping;
			}
		};
	} catch (err) {
		logger.error("Application setup failed: %s", errorMessage(err));
		handle.close();
		throw err;
	}
}
