import fastify from "fastify";
import type { FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import type { Facade } from "../facade";
import { badRequest, errorMessage, isAppError, notFound, toSafeErrorResponse } from "../lib/errors";
import type { Logger } from "../lib/log";
import type { BroadcastHub } from "../realtime/hub";
import { attachRealtime } from "../realtime/ws";
import { parseHours, parseLimit } from "./query";
import type { QueryParams } from "./query";

export interface ServerOptions {
	facade: Facade;
	hub: BroadcastHub;
	logger: Logger;
	corsOrigins: readonly string[];
	realtime: {
		path: string;
		maxBufferedBytes: number;
	};
}

export async function buildServer(opts: ServerOptions): Promise<FastifyInstance> {
	const { facade, hub, logger } = opts;

	const app = fastify({ logger: false });

	await app.register(cors, {
		origin: opts.corsOrigins.includes("*") ? true : [...opts.corsOrigins]
	});

	app.addHook("onResponse", async (request, reply) => {
		logger.http(
			"%s %s -> %d (%sms)",
			request.method,
			request.url,
			reply.statusCode,
			reply.elapsedTime.toFixed(1)
		);
	});

	app.setErrorHandler((err, request, reply) => {
		// fastify's own 4xx (malformed JSON, unsupported media type) become BAD_REQUEST
		const clientError = !isAppError(err) && err.statusCode !== undefined && err.statusCode < 500;
		const appErr = clientError ? badRequest(err.message) : err;
		const { status, body } = toSafeErrorResponse(appErr);

		if (status >= 500) {
			logger.error("%s %s failed: %s", request.method, request.url, errorMessage(err));
		}
		reply.code(status).send(body);
	});

	app.setNotFoundHandler((request, reply) => {
		const { status, body } = toSafeErrorResponse(notFound(`Route ${request.method} ${request.url} not found`));
		reply.code(status).send(body);
	});

	/* ---------- sensors ---------- */

	app.get("/api/sensors/latest", async () => facade.getLatestReadings());

	app.get<{ Params: { probe_id: string }; Querystring: QueryParams }>(
		"/api/sensors/:probe_id/history",
		async request => facade.getProbeHistory(request.params.probe_id, parseHours(request.query))
	);

	app.get("/api/alerts", async () => facade.getAlerts());

	/* ---------- commands ---------- */

	app.post<{ Body: unknown }>("/api/commands", async (request, reply) => {
		const command = facade.submitCommand(request.body);
		return reply.code(201).send(command);
	});

	app.get<{ Querystring: QueryParams }>("/api/commands/history", async request =>
		facade.getCommandHistory(parseLimit(request.query))
	);

	app.get<{ Params: { id: string } }>("/api/commands/:id", async request => facade.getCommand(request.params.id));

	/* ---------- rovers & status ---------- */

	app.get("/api/rovers", async () => facade.listRovers());

	app.get("/api/status", async () => facade.getStatus());

	app.get("/health", async () => facade.health());

	attachRealtime(app, {
		hub,
		logger,
		path: opts.realtime.path,
		maxBufferedBytes: opts.realtime.maxBufferedBytes,
		latest: () => facade.getLatestReadings()
	});

	return app;
}
