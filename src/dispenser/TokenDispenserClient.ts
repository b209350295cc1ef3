import { AppError } from "../core/errors.js";
import type { Logger } from "../logger.js";
import type { DiscoveryResolver } from "./DiscoveryResolver.js";
import type { InvocationGateway } from "./InvocationGateway.js";
import { validateTokenRequest } from "./validateTokenRequest.js";

export interface GetTokenOptions {
	/**
	 * Minimum remaining lifetime the caller needs. The dispenser returns its
	 * cached token when it lives at least this long, and mints a new one otherwise.
	 */
	minimumAliveSecs?: number;
	/** Full directory path of the dispenser identifier; skips the prefix search. */
	discoveryKey?: string;
}

export class TokenDispenserClient {
	constructor(
		private readonly resolver: DiscoveryResolver,
		private readonly gateway: InvocationGateway,
		private readonly logger: Logger,
	) {}

	/**
	 * Returns the dispenser's JSON response verbatim: the token plus its
	 * issuance and expiry as UNIX epoch seconds.
	 */
	async getToken(
		clientId: string,
		options: GetTokenOptions = {},
	): Promise<string> {
		const request = validateTokenRequest(clientId, options.minimumAliveSecs);
		try {
			const identifier = await this.resolver.resolve(options.discoveryKey);
			return await this.gateway.invoke(identifier, request);
		} catch (error) {
			if (error instanceof AppError) {
				this.logger.warn(
					{ clientId: request.clientId, code: error.code },
					error.message,
				);
			}
			throw error;
		}
	}
}
