import type { CommandStatus, TerminalCommandStatus } from "@agri-sim/common";

// pending -> in_progress -> completed | failed
const NEXT: Readonly<Record<CommandStatus, readonly CommandStatus[]>> = {
	pending: ["in_progress"],
	in_progress: ["completed", "failed"],
	completed: [],
	failed: []
};

export function isTerminal(status: CommandStatus): status is TerminalCommandStatus {
	return status === "completed" || status === "failed";
}

export function canTransition(from: CommandStatus, to: CommandStatus): boolean {
	return NEXT[from].includes(to);
}
