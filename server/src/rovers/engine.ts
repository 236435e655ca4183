import { randomUUID } from "node:crypto";
import type { Command, CommandSubmission, TerminalCommandStatus } from "@agri-sim/common";

import type { ExecutionConfig } from "../lib/config";
import { errorMessage, isAppError, validationError } from "../lib/errors";
import type { PersistenceGateway, StatusUpdateOutcome } from "../lib/gateway";
import type { Logger } from "../lib/log";
import type { EventPublisher } from "../realtime/hub";
import { COMMAND_TYPES, findCommandModule } from "./index";

const COMPLETE_MAX_ATTEMPTS = 5;

export const INTERRUPTED_RESULT = "Interrupted before completion: dispatcher restarted";

export interface CommandEngineOptions {
	gateway: PersistenceGateway;
	publisher: EventPublisher;
	logger: Logger;
	pollIntervalMs: number;
	failureProbability: number;
	/** Upper bound of commands executing at once in this engine. */
	maxInFlight: number;
	execution: ExecutionConfig;
	/** Name used in logs when several engines share one database. */
	workerId?: string;
	random?: () => number;
	now?: () => Date;
}

export interface CommandEngine {
	submit(input: CommandSubmission): Command;
	/** One dispatcher pass: claim pending commands and schedule their execution. */
	dispatchOnce(): number;
	/** Fail commands a previous process left in_progress. */
	recoverInterrupted(): number;
	executionDelayMs(command: Command): number;
	inFlight(): number;
	/** Commands whose completion is still waiting on storage. */
	unfinishedCount(): number;
	/** Resolves once every scheduled execution has terminated. */
	drain(): Promise<void>;
	start(): void;
	stop(): Promise<void>;
	isRunning(): boolean;
}

function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

export function createCommandEngine(opts: CommandEngineOptions): CommandEngine {
	const { gateway, publisher, logger, pollIntervalMs, failureProbability, maxInFlight, execution } = opts;
	const random = opts.random ?? Math.random;
	const now = opts.now ?? (() => new Date());
	const worker = opts.workerId ?? "dispatcher";

	if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
		throw new Error("Dispatcher poll interval must be a positive number of milliseconds");
	}
	if (!(failureProbability >= 0 && failureProbability <= 1)) {
		throw new Error("failureProbability must be within [0, 1]");
	}
	if (!Number.isInteger(maxInFlight) || maxInFlight <= 0) {
		throw new Error("maxInFlight must be a positive integer");
	}

	const running = new Map<string, Promise<void>>();
	let timer: NodeJS.Timeout | undefined;

	const executionDelayMs = (command: Command): number => {
		const mod = findCommandModule(command.command_type);
		const units = mod ? mod.workUnits(command) : 0;
		const scaled = Math.min(execution.maxDelayMs, execution.baseDelayMs + units * execution.msPerUnit);
		return Math.round(scaled + random() * execution.jitterMs);
	};

	// Completions that ran out of retries; every dispatch pass tries them again
	const unfinished = new Map<string, { status: TerminalCommandStatus; result: string }>();

	const finish = (commandId: string, status: TerminalCommandStatus, result: string): void => {
		const completedAt = now().toISOString();
		const outcome = gateway.updateCommandStatus(commandId, status, { result, completedAt });
		if (!outcome.changed) {
			logger.warn("[%s] Command %s is already %s; completion skipped", worker, commandId, outcome.command.status);
			return;
		}

		publisher.publish("command_completed", {
			command_id: commandId,
			status,
			result,
			completed_at: completedAt
		});
		logger.info("[%s] Command %s %s: %s", worker, commandId, status, result);
	};

	const complete = async (commandId: string, status: TerminalCommandStatus, result: string): Promise<void> => {
		for (let attempt = 1; ; attempt++) {
			try {
				finish(commandId, status, result);
				return;
			} catch (err) {
				if (isAppError(err, "NOT_FOUND")) {
					logger.warn("[%s] Command %s vanished before completion", worker, commandId);
					return;
				}
				if (attempt >= COMPLETE_MAX_ATTEMPTS) {
					logger.error(
						"[%s] Completing command %s failed %d times: %s; deferring to later dispatch passes",
						worker,
						commandId,
						attempt,
						errorMessage(err)
					);
					unfinished.set(commandId, { status, result });
					return;
				}
				logger.error(
					"[%s] Completing command %s failed (attempt %d): %s; retrying in %dms",
					worker,
					commandId,
					attempt,
					errorMessage(err),
					pollIntervalMs
				);
				await sleep(pollIntervalMs);
			}
		}
	};

	const retryUnfinished = (): void => {
		for (const [commandId, { status, result }] of unfinished) {
			try {
				finish(commandId, status, result);
				unfinished.delete(commandId);
			} catch (err) {
				if (isAppError(err, "NOT_FOUND")) {
					logger.warn("[%s] Command %s vanished before completion", worker, commandId);
					unfinished.delete(commandId);
					continue;
				}
				logger.error("[%s] Completing command %s still failing: %s", worker, commandId, errorMessage(err));
			}
		}
	};

	const execute = async (command: Command): Promise<void> => {
		let status: TerminalCommandStatus;
		let result: string;

		try {
			const mod = findCommandModule(command.command_type);
			if (!mod) {
				throw new Error(`No command module for '${command.command_type}'`);
			}

			const delayMs = executionDelayMs(command);
			logger.info(
				"[%s] Executing %s in %s (command=%s delayMs=%d)",
				worker,
				command.command_type,
				command.zone,
				command.id,
				delayMs
			);

			// The command stays in_progress while the rover "works"; nothing is locked meanwhile
			await sleep(delayMs);

			const failed = random() < failureProbability;
			status = failed ? "failed" : "completed";
			result = failed ? mod.describeFailure(command) : mod.describeSuccess(command);
		} catch (err) {
			status = "failed";
			result = `Execution error: ${errorMessage(err)}`;
		}

		await complete(command.id, status, result);
	};

	const track = (command: Command): void => {
		const p = execute(command)
			.catch(err => {
				logger.error("[%s] Execution of command %s crashed: %s", worker, command.id, errorMessage(err));
			})
			.finally(() => {
				running.delete(command.id);
			});
		running.set(command.id, p);
	};

	const dispatchOnce = (): number => {
		retryUnfinished();

		const capacity = maxInFlight - running.size;
		if (capacity <= 0) return 0;

		const pending = gateway.listCommandsByStatus("pending", capacity);
		let claimed = 0;

		for (const candidate of pending) {
			let outcome: StatusUpdateOutcome;
			try {
				outcome = gateway.updateCommandStatus(candidate.id, "in_progress");
			} catch (err) {
				if (isAppError(err, "NOT_FOUND")) {
					logger.warn("[%s] Pending command %s vanished before claim", worker, candidate.id);
					continue;
				}
				throw err;
			}

			if (!outcome.changed) {
				// Another pass got there first
				logger.debug("[%s] Command %s already %s; not claimed", worker, candidate.id, outcome.command.status);
				continue;
			}

			claimed++;
			publisher.publish("command_started", {
				command_id: candidate.id,
				status: "in_progress",
				timestamp: now().toISOString()
			});
			track(outcome.command);
		}

		if (claimed > 0) {
			logger.debug("[%s] Dispatch pass claimed %d command(s)", worker, claimed);
		}
		return claimed;
	};

	const drain = async (): Promise<void> => {
		while (running.size > 0) {
			await Promise.all(running.values());
		}
	};

	const safeDispatch = (): void => {
		try {
			dispatchOnce();
		} catch (err) {
			logger.error("[%s] Dispatch pass failed: %s", worker, errorMessage(err));
		}
	};

	return {
		submit(input) {
			const mod = findCommandModule(input.command_type);
			if (!mod) {
				throw validationError(
					`Unknown command_type '${input.command_type}'. Allowed: ${COMMAND_TYPES.join(", ")}`
				);
			}

			const zone = input.zone.trim();
			if (!zone) {
				throw validationError("zone is required");
			}

			const command: Command = {
				id: randomUUID(),
				command_type: mod.type,
				zone,
				parameters: mod.parseParameters(input.parameters),
				status: "pending",
				created_at: now().toISOString(),
				completed_at: null,
				result: null
			};

			gateway.insertCommand(command);
			publisher.publish("new_command", command);
			logger.info("Command submitted: id=%s type=%s zone=%s", command.id, command.command_type, command.zone);
			return command;
		},

		dispatchOnce,

		recoverInterrupted() {
			let recovered = 0;
			for (const command of gateway.listCommandsByStatus("in_progress", Number.MAX_SAFE_INTEGER)) {
				if (running.has(command.id) || unfinished.has(command.id)) continue;

				const outcome = gateway.updateCommandStatus(command.id, "failed", { result: INTERRUPTED_RESULT });
				if (outcome.changed) {
					recovered++;
					logger.warn("[%s] Command %s was left in_progress; marked failed", worker, command.id);
				}
			}
			return recovered;
		},

		executionDelayMs,

		inFlight() {
			return running.size;
		},

		unfinishedCount() {
			return unfinished.size;
		},

		drain,

		start() {
			if (timer) return;
			logger.info(
				"[%s] Command dispatcher starting (pollIntervalMs=%d maxInFlight=%d failureProbability=%d)",
				worker,
				pollIntervalMs,
				maxInFlight,
				failureProbability
			);
			safeDispatch();
			timer = setInterval(safeDispatch, pollIntervalMs);
		},

		async stop() {
			if (timer) {
				clearInterval(timer);
				timer = undefined;
				logger.info("[%s] Command dispatcher stopping (inFlight=%d)", worker, running.size);
			}
			await drain();
		},

		isRunning() {
			return timer !== undefined;
		}
	};
}
