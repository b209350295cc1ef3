import axios, { type AxiosInstance } from "axios";
import { describeError, TransportFault } from "../core/errors.js";
import type { IInvocationTransport } from "../core/IInvocationTransport.js";
import type { BackendIdentifier, InvocationResult } from "../core/types.js";

export interface HttpTransportOptions {
	timeoutMs?: number;
	headers?: Record<string, string>;
}

/** Invokes a dispenser exposed over HTTPS; the backend identifier is its URL. */
export class HttpTransport implements IInvocationTransport {
	private readonly client: AxiosInstance;

	constructor(options: HttpTransportOptions = {}) {
		this.client = axios.create({
			timeout: options.timeoutMs ?? 10_000,
			headers: { "Content-Type": "application/json", ...options.headers },
			responseType: "text",
			// status mapping happens in the gateway
			validateStatus: () => true,
		});
	}

	async call(
		identifier: BackendIdentifier,
		payload: string,
	): Promise<InvocationResult> {
		try {
			const response = await this.client.request<unknown>({
				method: "POST",
				url: identifier,
				data: payload,
			});
			return { status: response.status, body: toBodyText(response.data) };
		} catch (error) {
			throw new TransportFault(
				`HTTP invocation of ${identifier} failed: ${describeError(error)}`,
				{ cause: error },
			);
		}
	}
}

function toBodyText(data: unknown): string {
	if (data === undefined || data === null) return "";
	return typeof data === "string" ? data : JSON.stringify(data);
}
