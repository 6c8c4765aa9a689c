import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const resolvePath = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	test: {
		watch: false,
		fileParallelism: true,
		include: ["tests/**/*.test.ts"],
		exclude: ["node_modules"],
	},
	resolve: {
		alias: {
			kafkaprobe: resolvePath("./packages/core/src/index.ts"),
			"@kafkaprobe/adapter-kafka": resolvePath("./packages/adapter-kafka/src/index.ts"),
		},
	},
});
