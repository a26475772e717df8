export {
	type CommandLoop,
	type CommandLoopEndReason,
	type CommandLoopOptions,
	type CommandLoopResult,
	createCommandLoop,
} from "./command-loop";
