import { ValidationError } from "../core/errors.js";
import { type TokenRequest, TokenRequestSchema } from "../core/types.js";

/**
 * Checks the caller's parameters before anything goes over the network.
 * `minimumAliveSecs` falls back to 300 when omitted.
 */
export function validateTokenRequest(
	clientId: unknown,
	minimumAliveSecs?: unknown,
): TokenRequest {
	const parsed = TokenRequestSchema.safeParse({ clientId, minimumAliveSecs });
	if (!parsed.success) {
		const [issue] = parsed.error.issues;
		const kind = issue?.path[0] === "clientId" ? "InvalidClientId" : "InvalidTTL";
		throw new ValidationError(kind, issue?.message ?? parsed.error.message);
	}
	return Object.freeze(parsed.data);
}
