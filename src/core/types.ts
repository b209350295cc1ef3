import { z } from "zod";

export const CLIENT_ID_PATTERN = /^[a-zA-Z0-9]{3,32}$/;

export const DEFAULT_MINIMUM_ALIVE_SECS = 300;

export const DEFAULT_DISCOVERY_PREFIX = "/service/token-dispenser";

export const TokenRequestSchema = z.object({
	clientId: z
		.string({
			required_error: "client_id is required",
			invalid_type_error: "client_id must be a string",
		})
		.regex(
			CLIENT_ID_PATTERN,
			"client_id must be 3-32 characters matching [a-zA-Z0-9]",
		),
	minimumAliveSecs: z
		.number({ invalid_type_error: "minimum_alive_secs must be an integer" })
		.int("minimum_alive_secs must be an integer")
		.nonnegative("minimum_alive_secs must not be negative")
		.default(DEFAULT_MINIMUM_ALIVE_SECS),
});

export type TokenRequest = Readonly<z.infer<typeof TokenRequestSchema>>;

/** Opaque handle naming the dispenser deployment, e.g. a Lambda ARN. */
export type BackendIdentifier = string;

export interface DirectoryEntry {
	path: string;
	value: string;
}

export interface InvocationResult {
	status: number;
	body: string;
}
