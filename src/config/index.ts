export {
	type AppConfig,
	DEFAULT_CONFIG,
	DEFAULT_DEVICE_NAME,
	ENV_KEYS,
	type Environment,
	resolveConfig,
} from "./config";
