import fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export type Logger = winston.Logger;

export interface LoggerOptions {
	serviceName: string;
	/** Rotated file logs are written only when a directory is given. */
	logDir?: string;
	level?: string;
	/** Drop everything (tests). */
	silent?: boolean;
}

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

function rotatingFile(opts: { dir: string; filename: string; level: string; maxFiles: string }): DailyRotateFile {
	return new DailyRotateFile({
		level: opts.level,
		dirname: opts.dir,
		filename: opts.filename,
		datePattern: "YYYY-MM-DD",
		maxFiles: opts.maxFiles,
		zippedArchive: false
	});
}

export function createLogger(opts: LoggerOptions): Logger {
	const level = getLevel(opts.level);
	const svc = opts.serviceName;

	const format = winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const stack = typeof info.stack === "string" ? `\n${info.stack}` : "";
			return `${String(info.timestamp)} [${svc}] ${info.level}: ${String(info.message)}${stack}`;
		})
	);

	const transports: winston.transport[] = [new winston.transports.Console({ level, silent: opts.silent })];

	if (opts.logDir && !opts.silent) {
		fs.mkdirSync(opts.logDir, { recursive: true });
		// combined log keeps two weeks, errors a month
		transports.push(rotatingFile({ dir: opts.logDir, filename: `${svc}.%DATE%.log`, level, maxFiles: "14d" }));
		transports.push(
			rotatingFile({ dir: opts.logDir, filename: `${svc}.error.%DATE%.log`, level: "error", maxFiles: "30d" })
		);
	}

	return winston.createLogger({ level, format, transports });
}
