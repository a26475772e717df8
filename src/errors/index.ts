export {
	AbortError,
	ChannelClosedError,
	ConfigError,
	normalizeError,
	ResponderClosedError,
	ResponseAlreadySentError,
	StartupError,
	type StartupStage,
	sleep,
	throwIfAborted,
} from "./errors";
