/**
 * Routes KafkaJS log entries into a winston logger.
 */

import { type logCreator, logLevel } from "kafkajs";
import type { Logger } from "kafkaprobe";

const LEVELS: Record<logLevel, string> = {
	[logLevel.NOTHING]: "error",
	[logLevel.ERROR]: "error",
	[logLevel.WARN]: "warn",
	[logLevel.INFO]: "info",
	[logLevel.DEBUG]: "debug",
};

export function createKafkaLogCreator(logger: Logger): logCreator {
	return () =>
		({ namespace, level, log }) => {
			logger.log(LEVELS[level], "[%s] %s", namespace, log.message);
		};
}
