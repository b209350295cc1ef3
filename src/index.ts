import { loadConfig } from "./config.js";
import { createTokenDispenserClient } from "./dispenser/createClient.js";
import type {
	GetTokenOptions,
	TokenDispenserClient,
} from "./dispenser/TokenDispenserClient.js";

export { type Config, loadConfig } from "./config.js";
export {
	AppError,
	BackendError,
	BackendThrottledError,
	DiscoveryError,
	type DiscoveryErrorKind,
	TransportFault,
	ValidationError,
	type ValidationErrorKind,
} from "./core/errors.js";
export type { IDirectory, ListOptions } from "./core/IDirectory.js";
export type { IInvocationTransport } from "./core/IInvocationTransport.js";
export {
	type BackendIdentifier,
	CLIENT_ID_PATTERN,
	DEFAULT_DISCOVERY_PREFIX,
	DEFAULT_MINIMUM_ALIVE_SECS,
	type DirectoryEntry,
	type InvocationResult,
	type TokenRequest,
} from "./core/types.js";
export {
	type ClientOverrides,
	createTokenDispenserClient,
} from "./dispenser/createClient.js";
export {
	type CandidateSelection,
	DiscoveryResolver,
	selectSoleCandidate,
} from "./dispenser/DiscoveryResolver.js";
export { InvocationGateway } from "./dispenser/InvocationGateway.js";
export {
	type GetTokenOptions,
	TokenDispenserClient,
} from "./dispenser/TokenDispenserClient.js";
export { validateTokenRequest } from "./dispenser/validateTokenRequest.js";
export { HttpTransport, type HttpTransportOptions } from "./infra/HttpTransport.js";
export { LambdaTransport } from "./infra/LambdaTransport.js";
export { SsmDirectory } from "./infra/SsmDirectory.js";
export { createLogger, type Logger } from "./logger.js";

let defaultClient: TokenDispenserClient | undefined;

/**
 * Fetches a token with a client configured from the environment.
 *
 * @example
 * const token = await getToken("billing", { minimumAliveSecs: 120 });
 */
export async function getToken(
	clientId: string,
	options?: GetTokenOptions,
): Promise<string> {
	defaultClient ??= createTokenDispenserClient(loadConfig());
	return defaultClient.getToken(clientId, options);
}
