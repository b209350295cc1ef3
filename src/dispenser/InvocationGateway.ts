import {
	AppError,
	BackendError,
	BackendThrottledError,
	describeError,
	TransportFault,
} from "../core/errors.js";
import type { IInvocationTransport } from "../core/IInvocationTransport.js";
import type {
	BackendIdentifier,
	InvocationResult,
	TokenRequest,
} from "../core/types.js";
import type { Logger } from "../logger.js";

export class InvocationGateway {
	constructor(
		private readonly transport: IInvocationTransport,
		private readonly logger: Logger,
	) {}

	/** Calls the dispenser once and returns its body untouched on success. */
	async invoke(
		identifier: BackendIdentifier,
		request: TokenRequest,
	): Promise<string> {
		const payload = JSON.stringify({
			client_id: request.clientId,
			minimum_alive_secs: request.minimumAliveSecs,
		});

		const result = await this.dispatch(identifier, payload);
		if (result.status < 200 || result.status >= 300) {
			this.logger.warn(
				{ identifier, status: result.status },
				"token dispenser rejected the request",
			);
			throw toBackendError(result);
		}
		return result.body;
	}

	private async dispatch(
		identifier: BackendIdentifier,
		payload: string,
	): Promise<InvocationResult> {
		try {
			return await this.transport.call(identifier, payload);
		} catch (error) {
			if (error instanceof AppError) throw error;
			throw new TransportFault(
				`Token dispenser invocation failed: ${describeError(error)}`,
				{ cause: error },
			);
		}
	}
}

function toBackendError({ status, body }: InvocationResult): BackendError {
	if (status === 429) {
		return new BackendThrottledError(body);
	}
	return new BackendError(status, body);
}
