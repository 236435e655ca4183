import { describe, expect, it } from "vitest";

import { createBroadcastHub } from "../src/realtime/hub";
import type { SubscriberSink } from "../src/realtime/hub";
import { silentLogger, tick } from "./helpers";

function collectingSink(): SubscriberSink & { frames: string[] } {
	const frames: string[] = [];
	return { frames, send: frame => frames.push(frame) };
}

describe("BroadcastHub", () => {
	const logger = silentLogger();

	it("returns 0 when nobody is subscribed", () => {
		const hub = createBroadcastHub({ logger });
		expect(hub.publish("connected", { message: "hello" })).toBe(0);
		expect(hub.stats()).toEqual({ subscribers: 0, delivered: 0, dropped: 0 });
	});

	it("delivers frames in publish order on a later turn", async () => {
		const hub = createBroadcastHub({ logger });
		const sink = collectingSink();
		hub.subscribe(sink);

		expect(hub.publish("connected", { message: "one" })).toBe(1);
		hub.publish("connected", { message: "two" });
		expect(sink.frames).toEqual([]);

		await tick();

		expect(sink.frames).toEqual([
			'{"event":"connected","data":{"message":"one"}}',
			'{"event":"connected","data":{"message":"two"}}'
		]);
		expect(hub.stats().delivered).toBe(2);
	});

	it("drops frames for a congested subscriber only", async () => {
		const hub = createBroadcastHub({ logger });
		const slow = collectingSink();
		const fast = collectingSink();
		hub.subscribe({ ...slow, isCongested: () => true });
		hub.subscribe(fast);

		hub.publish("connected", { message: "x" });
		await tick();

		expect(slow.frames).toEqual([]);
		expect(fast.frames).toHaveLength(1);
		expect(hub.stats()).toEqual({ subscribers: 2, delivered: 1, dropped: 1 });
	});

	it("keeps delivering to others when a sink throws", async () => {
		const hub = createBroadcastHub({ logger });
		const ok = collectingSink();
		hub.subscribe({
			send: () => {
				throw new Error("socket closed");
			}
		});
		hub.subscribe(ok);

		hub.publish("connected", { message: "x" });
		hub.publish("connected", { message: "y" });
		await tick();

		expect(ok.frames).toHaveLength(2);
		expect(hub.stats().dropped).toBe(2);
	});

	it("bounds the per-subscriber queue", async () => {
		const hub = createBroadcastHub({ logger, maxQueuePerSubscriber: 2 });
		const sink = collectingSink();
		hub.subscribe(sink);

		expect(hub.publish("connected", { message: "1" })).toBe(1);
		expect(hub.publish("connected", { message: "2" })).toBe(1);
		expect(hub.publish("connected", { message: "3" })).toBe(0);
		await tick();

		expect(sink.frames).toHaveLength(2);
		expect(hub.stats().dropped).toBe(1);
	});

	it("stops delivery after unsubscribe, even for queued frames", async () => {
		const hub = createBroadcastHub({ logger });
		const sink = collectingSink();
		const handle = hub.subscribe(sink);

		hub.publish("connected", { message: "queued" });
		expect(hub.unsubscribe(handle)).toBe(true);
		expect(hub.unsubscribe(handle)).toBe(false);
		await tick();

		expect(sink.frames).toEqual([]);
		expect(hub.subscriberCount()).toBe(0);
	});

	it("sends to a single subscriber", async () => {
		const hub = createBroadcastHub({ logger });
		const a = collectingSink();
		const b = collectingSink();
		const handleA = hub.subscribe(a);
		hub.subscribe(b);

		expect(hub.sendTo(handleA, "latest_sensor_data", {})).toBe(true);
		expect(hub.sendTo({ id: "gone" }, "latest_sensor_data", {})).toBe(false);
		await tick();

		expect(a.frames).toEqual(['{"event":"latest_sensor_data","data":{}}']);
		expect(b.frames).toEqual([]);
	});
});
