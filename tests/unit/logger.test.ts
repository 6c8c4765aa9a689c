/**
 * Logger Unit Tests
 */

import { Writable } from "node:stream";
import { createLogger } from "kafkaprobe";
import { describe, expect, it } from "vitest";
import winston from "winston";

describe("createLogger", () => {
	it("should default to warn and not be silent", () => {
		const logger = createLogger("orders-test");

		expect(logger.level).toBe("warn");
		expect(logger.silent).toBe(false);
	});

	it("should honour level and silent options", () => {
		const logger = createLogger("orders-test", { level: "debug", silent: true });

		expect(logger.level).toBe("debug");
		expect(logger.silent).toBe(true);
	});

	it("should write labelled lines with interpolated arguments", async () => {
		const lines: string[] = [];
		const stream = new Writable({
			write(chunk, _encoding, callback) {
				lines.push(String(chunk).trim());
				callback();
			},
		});
		const logger = createLogger("orders-test");
		logger.clear().add(new winston.transports.Stream({ stream }));

		logger.warn("Ignoring %s property %s", "producer", "linger.ms");
		logger.info("not written");
		await new Promise((resolve) => setImmediate(resolve));

		expect(lines).toEqual(["[orders-test] warn: Ignoring producer property linger.ms"]);
	});
});
