import { afterEach, beforeEach, describe, expect, it } from "vitest";
import WebSocket from "ws";
import type { RawData } from "ws";

import { createApp } from "../src/app";
import type { App } from "../src/app";
import { GREETING } from "../src/realtime/ws";
import { silentLogger, testConfig } from "./helpers";

interface Frame {
	event: string;
	data: unknown;
}

/** Loopback client that buffers incoming frames. */
class TestClient {
	private frames: Frame[] = [];
	private waiters: Array<(f: Frame) => void> = [];

	constructor(readonly socket: WebSocket) {
		socket.on("message", (data: RawData) => {
			const frame: Frame = JSON.parse(data.toString());
			const waiter = this.waiters.shift();
			if (waiter) waiter(frame);
			else this.frames.push(frame);
		});
	}

	static async connect(url: string): Promise<TestClient> {
		const socket = new WebSocket(url);
		const client = new TestClient(socket);
		await new Promise<void>((resolve, reject) => {
			socket.once("open", () => resolve());
			socket.once("error", reject);
		});
		return client;
	}

	next(): Promise<Frame> {
		const frame = this.frames.shift();
		if (frame) return Promise.resolve(frame);
		return new Promise(resolve => this.waiters.push(resolve));
	}

	send(message: unknown): void {
		this.socket.send(JSON.stringify(message));
	}

	close(): Promise<void> {
		if (this.socket.readyState === WebSocket.CLOSED) return Promise.resolve();
		return new Promise(resolve => {
			this.socket.once("close", () => resolve());
			this.socket.close();
		});
	}
}

describe("realtime endpoint", () => {
	let app: App;
	let baseUrl: string;
	const clients: TestClient[] = [];

	const connect = async (path = "/ws") => {
		const client = await TestClient.connect(`${baseUrl}${path}`);
		clients.push(client);
		return client;
	};

	beforeEach(async () => {
		app = await createApp(testConfig(), { logger: silentLogger(), random: () => 0.5 });
		const address = await app.server.listen({ host: "127.0.0.1", port: 0 });
		baseUrl = address.replace(/^http/, "ws");
	});

	afterEach(async () => {
		for (const client of clients.splice(0)) await client.close();
		await app.stop();
	});

	it("greets new clients", async () => {
		const client = await connect();

		expect(await client.next()).toEqual({ event: "connected", data: { message: GREETING } });
	});

	it("answers request_latest_data with the current snapshot", async () => {
		app.simulator.tick();
		const client = await connect();
		await client.next();

		client.send({ event: "request_latest_data" });
		const frame = await client.next();

		expect(frame.event).toBe("latest_sensor_data");
		expect(frame.data).toEqual(app.facade.getLatestReadings());
	});

	it("ignores unsupported messages", async () => {
		const client = await connect();
		await client.next();

		client.send({ event: "reboot_rover" });
		client.socket.send("not json");
		client.send({ event: "request_latest_data" });

		expect((await client.next()).event).toBe("latest_sensor_data");
	});

	it("pushes live events to every client", async () => {
		const a = await connect();
		const b = await connect();
		await a.next();
		await b.next();

		const cmd = app.facade.submitCommand({ command_type: "irrigate", zone: "Field_A" });

		expect(await a.next()).toEqual({ event: "new_command", data: cmd });
		expect(await b.next()).toEqual({ event: "new_command", data: cmd });
	});

	it("unsubscribes closed clients", async () => {
		const client = await connect();
		await client.next();
		expect(app.hub.subscriberCount()).toBe(1);

		await client.close();
		// the server sees the close after the client does
		for (let i = 0; i < 50 && app.hub.subscriberCount() > 0; i++) {
			await new Promise(resolve => setTimeout(resolve, 10));
		}

		expect(app.hub.subscriberCount()).toBe(0);
	});

	it("refuses upgrades on other paths", async () => {
		await expect(TestClient.connect(`${baseUrl}/other`)).rejects.toBeInstanceOf(Error);
	});
});
