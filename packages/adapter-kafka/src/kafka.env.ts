/**
 * Kafka Adapter Environment
 *
 * Builds a {@link KafkaAdapterConfig} from KAFKAPROBE_* variables so CI can
 * point the same test suite at different clusters.
 */

import { logLevel } from "kafkajs";
import { ConfigError } from "kafkaprobe";
import { z } from "zod";
import type { KafkaAdapterConfig } from "./kafka.types";

const LOG_LEVELS = {
	nothing: logLevel.NOTHING,
	error: logLevel.ERROR,
	warn: logLevel.WARN,
	info: logLevel.INFO,
	debug: logLevel.DEBUG,
} as const;

export const KafkaEnvSchema = z.object({
	KAFKAPROBE_BROKERS: z
		.string()
		.transform((value) =>
			value
				.split(",")
				.map((broker) => broker.trim())
				.filter((broker) => broker.length > 0)
		)
		.pipe(z.array(z.string()).min(1, "must list at least one broker")),
	KAFKAPROBE_CLIENT_ID: z.string().min(1).optional(),
	KAFKAPROBE_LOG_LEVEL: z.enum(["nothing", "error", "warn", "info", "debug"]).optional(),
	KAFKAPROBE_TEST_MODE: z.enum(["true", "false", "1", "0"]).optional(),
});

export type KafkaEnv = z.infer<typeof KafkaEnvSchema>;

/**
 * Read the adapter configuration from environment variables.
 *
 * @throws ConfigError listing every invalid or missing variable
 *
 * @example
 * ```typescript
 * // KAFKAPROBE_BROKERS=localhost:9092 KAFKAPROBE_TEST_MODE=true
 * const adapter = new KafkaAdapter(kafkaConfigFromEnv());
 * ```
 */
export function kafkaConfigFromEnv(env: Record<string, string | undefined> = process.env): KafkaAdapterConfig {
	const result = KafkaEnvSchema.safeParse(env);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
		throw new ConfigError(`Invalid Kafka environment: ${issues.join("; ")}`);
	}

	const { KAFKAPROBE_BROKERS, KAFKAPROBE_CLIENT_ID, KAFKAPROBE_LOG_LEVEL, KAFKAPROBE_TEST_MODE } = result.data;
	return {
		brokers: KAFKAPROBE_BROKERS,
		clientId: KAFKAPROBE_CLIENT_ID,
		logLevel: KAFKAPROBE_LOG_LEVEL === undefined ? undefined : LOG_LEVELS[KAFKAPROBE_LOG_LEVEL],
		testMode: KAFKAPROBE_TEST_MODE === "true" || KAFKAPROBE_TEST_MODE === "1",
	};
}
