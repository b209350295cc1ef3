export class AppError extends Error {
	constructor(
		public code: string,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = this.constructor.name;
	}
}

export type ValidationErrorKind = "InvalidClientId" | "InvalidTTL";

export class ValidationError extends AppError {
	constructor(
		public readonly kind: ValidationErrorKind,
		message: string,
		options?: ErrorOptions,
	) {
		super("VALIDATION_ERROR", message, options);
	}
}

export type DiscoveryErrorKind = "NotFound" | "Ambiguous";

export class DiscoveryError extends AppError {
	constructor(
		public readonly kind: DiscoveryErrorKind,
		public readonly discoveryKey: string,
		message: string,
		options?: ErrorOptions,
	) {
		super("DISCOVERY_ERROR", message, options);
	}
}

/** The dispenser answered, but with a non-success status. */
export class BackendError extends AppError {
	constructor(
		public readonly status: number,
		public readonly body: string,
		options?: ErrorOptions,
	) {
		super(
			"BACKEND_ERROR",
			`Token dispenser responded with status ${status}: ${body}`,
			options,
		);
	}
}

export class BackendThrottledError extends BackendError {
	constructor(body: string, options?: ErrorOptions) {
		super(429, body, options);
		this.code = "BACKEND_THROTTLED";
	}
}

/** The request never produced a dispenser response (network, SDK, permissions). */
export class TransportFault extends AppError {
	constructor(message: string, options?: ErrorOptions) {
		super("TRANSPORT_FAULT", message, options);
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : "Unknown error";
}
