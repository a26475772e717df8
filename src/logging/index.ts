export {
	type ConsoleLoggerOptions,
	createConsoleLogger,
	createNoOpLogger,
	isLogLevel,
	LOG_NAMESPACE,
	type Logger,
	type LogLevel,
	normalizeLogLevel,
} from "./logger";
