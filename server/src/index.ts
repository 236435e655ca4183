import { Command } from "commander";

import { createApp } from "./app";
import { loadConfig } from "./lib/config";
import { createLogger } from "./lib/log";

interface CliOptions {
	config?: string;
	port?: string;
}

function parseCommandLine(): CliOptions {
	const program = new Command();

	program
		.name("agri-sim")
		.description("Agriculture field simulation: soil probes, rover commands, REST and realtime API")
		.option("-c, --config <path>", "Path to JSON configuration file")
		.option("-p, --port <port>", "HTTP port (overrides config and PORT)");

	program.parse(process.argv);

	return program.opts<CliOptions>();
}

async function main(): Promise<void> {
	const cli = parseCommandLine();

	const env: NodeJS.ProcessEnv = { ...process.env };
	if (cli.port !== undefined) {
		env.PORT = cli.port;
	}

	const config = loadConfig({ configPath: cli.config, env });

	const logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: "agri-sim",
		level: config.logLevel
	});

	logger.info(
		"Agri simulation starting (probes=%d sqlite=%s)",
		config.sensors.probes.length,
		config.paths.sqlite
	);

	const app = await createApp(config, { logger });

	const stopImmediate = (signal: string) => {
		logger.info("Immediate stop requested (signal=%s)", signal);
		process.exit(0);
	};

	const stopRequested = new Promise<string>(resolve => {
		process.once("SIGTERM", () => resolve("SIGTERM")); // systemd / docker stop
	});
	process.on("SIGINT", () => stopImmediate("SIGINT")); // Ctrl+C

	try {
		await app.start();
	} catch (err) {
		await app.stop();
		throw err;
	}

	const signal = await stopRequested;
	logger.info("Stopping gracefully (signal=%s)", signal);
	await app.stop();
	logger.info("Agri simulation exiting");
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
