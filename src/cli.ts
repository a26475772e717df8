import * as path from "node:path";
import { createInterface } from "node:readline";
import * as dotenv from "dotenv";
import {
	createBlenoPeripheral,
	createMemoryPeripheral,
	type MemoryPeripheral,
} from "./adapter";
import { startApp } from "./app";
import { resolveConfig } from "./config";
import { AbortError } from "./errors";
import { createConsoleLogger } from "./logging";
import { decodeText } from "./utils";

// Load .env.local if it exists
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });

const SIMULATED_CLIENT = "simulator";

const EXIT_OK = 0;
const EXIT_STARTUP_FAILED = 1;
const EXIT_INTERRUPTED = 130;

async function main(argv: readonly string[]): Promise<number> {
	const config = resolveConfig(
		process.env,
		argv.includes("--simulate") ? { simulate: true } : {},
	);
	const createLogger = (scope: string) =>
		createConsoleLogger({ scope, level: config.logLevel });
	const logger = createLogger("cli");

	const controller = new AbortController();
	const rl = createInterface({ input: process.stdin, terminal: false });
	const simulation: { peripheral: MemoryPeripheral | null } = { peripheral: null };

	const onSigint = () => {
		logger.info("Shutting down");
		controller.abort();
		rl.close();
	};
	process.once("SIGINT", onSigint);

	try {
		if (config.simulate) {
			logger.info("Running against the in-memory peripheral");
		}

		const app = await startApp({
			config,
			input: rl,
			signal: controller.signal,
			createLogger,
			createPeripheral: (events) => {
				if (!config.simulate) {
					return createBlenoPeripheral(events, { logger: createLogger("bleno") });
				}
				simulation.peripheral = createMemoryPeripheral(events);
				return simulation.peripheral;
			},
		});

		if (app.status === "failed") {
			logger.error(app.error.message);
			return EXIT_STARTUP_FAILED;
		}

		if (simulation.peripheral) {
			simulation.peripheral.onNotification(({ client, value }) => {
				logger.info(`Notify -> ${client}: ${decodeText(value) ?? "<binary>"}`);
			});
			simulation.peripheral.subscribe(SIMULATED_CLIENT);
		}

		logger.info(`Advertising as "${config.deviceName}"; type on/off`);
		await app.console;
		const handled = await app.stop();
		logger.debug(`Handled ${handled} peripheral events`);

		return controller.signal.aborted ? EXIT_INTERRUPTED : EXIT_OK;
	} catch (e) {
		if (e instanceof AbortError) {
			return EXIT_INTERRUPTED;
		}
		throw e;
	} finally {
		process.off("SIGINT", onSigint);
		rl.close();
	}
}

main(process.argv.slice(2)).then(
	(code) => {
		process.exit(code);
	},
	(error: unknown) => {
		createConsoleLogger({ scope: "cli" }).error("Fatal:", error);
		process.exit(EXIT_STARTUP_FAILED);
	},
);
