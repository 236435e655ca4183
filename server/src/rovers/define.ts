import type { Command, CommandParameters } from "@agri-sim/common";
import type { z } from "zod";

import { fromZodError } from "../lib/errors";
import type { CommandModule } from "./types";

interface CommandModuleSpec<P extends CommandParameters> {
	type: string;
	aliases?: readonly string[];
	schema: z.ZodType<P, z.ZodTypeDef, unknown>;
	workUnits(params: P): number;
	success(zone: string, params: P): string;
	failure(zone: string, params: P): string;
}

/**
 * Build a CommandModule from a zod parameter schema. Stored parameters were
 * normalized by the same schema on submission, so re-parsing them is stable.
 */
export function defineCommandModule<P extends CommandParameters>(spec: CommandModuleSpec<P>): CommandModule {
	const parse = (raw: unknown): P => {
		const res = spec.schema.safeParse(raw);
		if (!res.success) {
			throw fromZodError(`Invalid parameters for ${spec.type}`, res.error);
		}
		return res.data;
	};

	const stored = (command: Command): P => parse(command.parameters);

	return {
		type: spec.type,
		aliases: spec.aliases ?? [],
		parseParameters: parse,
		workUnits: command => spec.workUnits(stored(command)),
		describeSuccess: command => spec.success(command.zone, stored(command)),
		describeFailure: command => spec.failure(command.zone, stored(command))
	};
}
