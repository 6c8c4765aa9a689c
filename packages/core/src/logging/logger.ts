/**
 * Logging
 *
 * Engines and adapters log through winston loggers labelled by module.
 */

import winston from "winston";

export type Logger = winston.Logger;

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggerOptions {
	/**
	 * @default "warn"
	 */
	level?: LogLevel;

	/**
	 * Drop every log line (tests)
	 */
	silent?: boolean;
}

/**
 * Create a console logger writing `[label] level: message` lines.
 *
 * @example
 * ```typescript
 * const logger = createLogger("orders-test", { level: "debug" });
 * const exchange = new RecordExchange({ factory, cluster, logger });
 * ```
 */
export function createLogger(label: string, options: LoggerOptions = {}): Logger {
	return winston.createLogger({
		level: options.level ?? "warn",
		silent: options.silent ?? false,
		format: winston.format.combine(
			winston.format.splat(),
			winston.format.label({ label }),
			winston.format.printf(({ level, message, label: moduleLabel }) => `[${moduleLabel}] ${level}: ${message}`)
		),
		transports: [new winston.transports.Console()],
	});
}
