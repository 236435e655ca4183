import { z } from "zod";

export const CommandSubmissionSchema = z.object({
	command_type: z.string().trim().min(1, "command_type is required"),
	zone: z.string().trim().min(1, "zone is required"),
	parameters: z.record(z.unknown()).default({})
});

export type CommandSubmission = z.infer<typeof CommandSubmissionSchema>;

// Client -> server messages on the realtime channel
export const ClientMessageSchema = z.discriminatedUnion("event", [
	z.object({ event: z.literal("request_latest_data") })
]);
