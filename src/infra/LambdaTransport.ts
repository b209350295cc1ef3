import { InvokeCommand, type LambdaClient } from "@aws-sdk/client-lambda";
import { z } from "zod";
import { describeError, TransportFault } from "../core/errors.js";
import type { IInvocationTransport } from "../core/IInvocationTransport.js";
import type { BackendIdentifier, InvocationResult } from "../core/types.js";
import type { Logger } from "../logger.js";

// The dispenser reports its own outcome as { statusCode, body }
const ResponseEnvelopeSchema = z.object({ statusCode: z.number().int() });

const FUNCTION_ERROR_STATUS = 500;

export class LambdaTransport implements IInvocationTransport {
	private readonly encoder = new TextEncoder();
	private readonly decoder = new TextDecoder();

	constructor(
		private readonly client: LambdaClient,
		private readonly logger: Logger,
	) {}

	async call(
		identifier: BackendIdentifier,
		payload: string,
	): Promise<InvocationResult> {
		const response = await this.invoke(identifier, payload);
		const body = response.Payload ? this.decoder.decode(response.Payload) : "";

		if (response.FunctionError) {
			this.logger.warn(
				{ identifier, functionError: response.FunctionError },
				"lambda function error",
			);
			return { status: FUNCTION_ERROR_STATUS, body };
		}

		const status = envelopeStatus(body) ?? response.StatusCode ?? 200;
		this.logger.debug({ identifier, status }, "lambda invoked");
		return { status, body };
	}

	private async invoke(identifier: BackendIdentifier, payload: string) {
		try {
			return await this.client.send(
				new InvokeCommand({
					FunctionName: identifier,
					InvocationType: "RequestResponse",
					Payload: this.encoder.encode(payload),
				}),
			);
		} catch (error) {
			throw new TransportFault(
				`Lambda invocation of ${identifier} failed: ${describeError(error)}`,
				{ cause: error },
			);
		}
	}
}

function envelopeStatus(body: string): number | undefined {
	let json: unknown;
	try {
		json = JSON.parse(body);
	} catch {
		return undefined;
	}
	const parsed = ResponseEnvelopeSchema.safeParse(json);
	return parsed.success ? parsed.data.statusCode : undefined;
}
