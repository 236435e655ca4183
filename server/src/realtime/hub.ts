import { randomUUID } from "node:crypto";
import { encodeFrame } from "@agri-sim/common";
import type { HubEventName, HubEvents } from "@agri-sim/common";

import type { Logger } from "../lib/log";
import { errorMessage } from "../lib/errors";

/** What the simulator and the dispatcher need from the hub. */
export interface EventPublisher {
	publish<K extends HubEventName>(event: K, payload: HubEvents[K]): number;
}

/** Delivery channel of one subscriber (a WebSocket in production). */
export interface SubscriberSink {
	send(frame: string): void;
	/** true while the transport cannot take more data; frames are dropped meanwhile */
	isCongested?(): boolean;
}

export interface SubscriptionHandle {
	readonly id: string;
}

export interface HubStats {
	subscribers: number;
	delivered: number;
	dropped: number;
}

export interface BroadcastHub extends EventPublisher {
	subscribe(sink: SubscriberSink): SubscriptionHandle;
	unsubscribe(handle: SubscriptionHandle): boolean;
	sendTo<K extends HubEventName>(handle: SubscriptionHandle, event: K, payload: HubEvents[K]): boolean;
	subscriberCount(): number;
	stats(): HubStats;
}

interface Subscriber {
	id: string;
	sink: SubscriberSink;
	queue: string[];
	flushScheduled: boolean;
}

const DEFAULT_MAX_QUEUE = 100;

/**
 * Fan-out of live events. publish() only enqueues; frames reach the sinks on
 * a later turn of the event loop, so a slow or broken subscriber never holds
 * up the writer or the other subscribers.
 */
export function createBroadcastHub(opts: { logger: Logger; maxQueuePerSubscriber?: number }): BroadcastHub {
	const { logger } = opts;
	const maxQueue = opts.maxQueuePerSubscriber ?? DEFAULT_MAX_QUEUE;

	const subscribers = new Map<string, Subscriber>();
	let delivered = 0;
	let dropped = 0;

	const drop = (sub: Subscriber, reason: string): void => {
		dropped++;
		logger.debug("Hub dropped frame for subscriber=%s (%s)", sub.id, reason);
	};

	const flush = (sub: Subscriber): void => {
		sub.flushScheduled = false;
		// Unsubscribed while the flush was pending
		if (subscribers.get(sub.id) !== sub) return;

		const frames = sub.queue.splice(0, sub.queue.length);
		for (const frame of frames) {
			if (sub.sink.isCongested?.()) {
				drop(sub, "congested");
				continue;
			}
			try {
				sub.sink.send(frame);
				delivered++;
			} catch (err) {
				drop(sub, errorMessage(err));
			}
		}
	};

	const enqueue = (sub: Subscriber, frame: string): boolean => {
		if (sub.queue.length >= maxQueue) {
			drop(sub, "queue full");
			return false;
		}
		sub.queue.push(frame);
		if (!sub.flushScheduled) {
			sub.flushScheduled = true;
			setImmediate(() => flush(sub));
		}
		return true;
	};

	return {
		subscribe(sink) {
			const sub: Subscriber = { id: randomUUID(), sink, queue: [], flushScheduled: false };
			subscribers.set(sub.id, sub);
			logger.debug("Hub subscriber added id=%s (total=%d)", sub.id, subscribers.size);
			return { id: sub.id };
		},

		unsubscribe(handle) {
			const removed = subscribers.delete(handle.id);
			if (removed) {
				logger.debug("Hub subscriber removed id=%s (total=%d)", handle.id, subscribers.size);
			}
			return removed;
		},

		publish(event, payload) {
			if (subscribers.size === 0) return 0;

			const frame = encodeFrame(event, payload);
			let enqueued = 0;
			for (const sub of subscribers.values()) {
				if (enqueue(sub, frame)) enqueued++;
			}
			return enqueued;
		},

		sendTo(handle, event, payload) {
			const sub = subscribers.get(handle.id);
			if (!sub) return false;
			return enqueue(sub, encodeFrame(event, payload));
		},

		subscriberCount() {
			return subscribers.size;
		},

		stats() {
			return { subscribers: subscribers.size, delivered, dropped };
		}
	};
}
