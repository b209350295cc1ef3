import type { BackendIdentifier, InvocationResult } from "./types.js";

export interface IInvocationTransport {
	/**
	 * Sends `payload` to the backend named by `identifier` and waits for its answer.
	 * Non-success statuses are returned, not thrown; only transport failures throw.
	 */
	call(identifier: BackendIdentifier, payload: string): Promise<InvocationResult>;
}
