import { z } from "zod";
import { DEFAULT_DISCOVERY_PREFIX } from "./core/types.js";
import { LOG_LEVELS } from "./logger.js";

const ConfigSchema = z.object({
	discoveryPrefix: z
		.string()
		.startsWith("/", "TDS_DISCOVERY_PREFIX must be an absolute path")
		.default(DEFAULT_DISCOVERY_PREFIX),
	transport: z.enum(["lambda", "http"]).default("lambda"),
	httpTimeoutMs: z.coerce.number().int().positive().default(10_000),
	awsRegion: z.string().min(1).optional(),
	logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	return ConfigSchema.parse({
		discoveryPrefix: env.TDS_DISCOVERY_PREFIX,
		transport: env.TDS_TRANSPORT,
		httpTimeoutMs: env.TDS_HTTP_TIMEOUT_MS,
		awsRegion: env.AWS_REGION,
		logLevel: env.LOG_LEVEL,
	});
}
