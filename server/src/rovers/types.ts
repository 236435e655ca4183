import type { Command, CommandParameters } from "@agri-sim/common";

/**
 * CommandModule defines the contract every rover command type follows.
 * - type: canonical command_type stored with the command
 * - aliases: alternative names accepted on submission
 * - parseParameters: validates and normalizes submitted parameters (throws VALIDATION_ERROR)
 * - workUnits: size of the job; scales the simulated execution time
 * - describe*: human-readable result stored when the command terminates
 */
export interface CommandModule {
	readonly type: string;
	readonly aliases: readonly string[];

	parseParameters(raw: unknown): CommandParameters;

	workUnits(command: Command): number;

	describeSuccess(command: Command): string;

	describeFailure(command: Command): string;
}
