import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import type { FastifyInstance } from "fastify";
import { WebSocket, WebSocketServer } from "ws";
import type { RawData } from "ws";
import { ClientMessageSchema } from "@agri-sim/common";
import type { LatestReadings } from "@agri-sim/common";

import { errorMessage } from "../lib/errors";
import type { Logger } from "../lib/log";
import type { BroadcastHub } from "./hub";

export const GREETING = "Connected to agriculture simulation server";

export interface RealtimeOptions {
	hub: BroadcastHub;
	logger: Logger;
	path: string;
	/** Frames are dropped for a socket holding more than this many unsent bytes. */
	maxBufferedBytes: number;
	latest: () => LatestReadings;
}

function decode(data: RawData): string {
	if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
	if (Buffer.isBuffer(data)) return data.toString("utf8");
	return Buffer.from(data).toString("utf8");
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

/**
 * Serve the hub over WebSocket on `path` of the fastify HTTP server.
 * Each socket becomes one hub subscriber for its lifetime.
 */
export function attachRealtime(app: FastifyInstance, opts: RealtimeOptions): WebSocketServer {
	const { hub, logger, maxBufferedBytes } = opts;
	const wss = new WebSocketServer({ noServer: true });

	const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
		const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
		if (pathname !== opts.path) {
			socket.destroy();
			return;
		}
		wss.handleUpgrade(req, socket, head, ws => {
			wss.emit("connection", ws, req);
		});
	};

	app.server.on("upgrade", onUpgrade);

	wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
		const handle = hub.subscribe({
			send: frame => ws.send(frame),
			isCongested: () => ws.readyState !== WebSocket.OPEN || ws.bufferedAmount > maxBufferedBytes
		});
		logger.info("Realtime client connected id=%s from %s", handle.id, req.socket.remoteAddress ?? "unknown");

		hub.sendTo(handle, "connected", { message: GREETING });

		ws.on("message", (data: RawData) => {
			const res = ClientMessageSchema.safeParse(parseJson(decode(data)));
			if (!res.success) {
				logger.debug("Realtime client id=%s sent an unsupported message", handle.id);
				return;
			}

			switch (res.data.event) {
				case "request_latest_data": {
					try {
						hub.sendTo(handle, "latest_sensor_data", opts.latest());
					} catch (err) {
						logger.error("Latest data request failed for id=%s: %s", handle.id, errorMessage(err));
					}
					break;
				}
			}
		});

		ws.on("error", err => {
			logger.debug("Realtime socket error id=%s: %s", handle.id, err.message);
		});

		ws.on("close", () => {
			hub.unsubscribe(handle);
			logger.info("Realtime client disconnected id=%s", handle.id);
		});
	});

	app.addHook("preClose", async () => {
		app.server.off("upgrade", onUpgrade);
		for (const client of wss.clients) {
			client.terminate();
		}
		await new Promise<void>(resolve => {
			wss.close(() => resolve());
		});
	});

	return wss;
}
