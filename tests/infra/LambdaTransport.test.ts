import { beforeEach, describe, expect, it, jest } from "@jest/globals";
import { InvokeCommand, LambdaClient } from "@aws-sdk/client-lambda";
import { TransportFault } from "../../src/core/errors.js";
import { LambdaTransport } from "../../src/infra/LambdaTransport.js";
import { createLogger } from "../../src/logger.js";

const FUNCTION_ARN = "arn:aws:lambda:us-west-2:123456789012:function:tds-sndbx";
const PAYLOAD = '{"client_id":"client123","minimum_alive_secs":300}';

const client = new LambdaClient({ region: "us-west-2" });
const send = jest.spyOn(client, "send");
const transport = new LambdaTransport(client, createLogger("silent"));

function invokeOutput(body: string, extra: Record<string, unknown> = {}) {
	return {
		StatusCode: 200,
		Payload: new TextEncoder().encode(body),
		...extra,
	} as never;
}

beforeEach(() => {
	send.mockReset();
});

describe("LambdaTransport", () => {
	it("invokes the function synchronously with the payload bytes", async () => {
		send.mockResolvedValueOnce(invokeOutput('{"session_token": "test-token"}'));

		await transport.call(FUNCTION_ARN, PAYLOAD);

		expect(send.mock.calls[0]?.[0]).toBeInstanceOf(InvokeCommand);
		expect(send).toHaveBeenCalledWith(
			expect.objectContaining({
				input: {
					FunctionName: FUNCTION_ARN,
					InvocationType: "RequestResponse",
					Payload: new TextEncoder().encode(PAYLOAD),
				},
			}),
		);
	});

	it("returns the decoded payload with the lambda status", async () => {
		const body = '{"session_token": "test-token", "expired_at": 1718003600}';
		send.mockResolvedValueOnce(invokeOutput(body));

		await expect(transport.call(FUNCTION_ARN, PAYLOAD)).resolves.toEqual({
			status: 200,
			body,
		});
	});

	it("takes the status from the dispenser's statusCode envelope", async () => {
		const body =
			'{"statusCode": 422, "body": "Found more than one tds arn for: /service/token-dispenser"}';
		send.mockResolvedValueOnce(invokeOutput(body));

		await expect(transport.call(FUNCTION_ARN, PAYLOAD)).resolves.toEqual({
			status: 422,
			body,
		});
	});

	it("ignores a non-numeric statusCode", async () => {
		const body = '{"statusCode": "oops"}';
		send.mockResolvedValueOnce(invokeOutput(body));

		await expect(transport.call(FUNCTION_ARN, PAYLOAD)).resolves.toEqual({
			status: 200,
			body,
		});
	});

	it("reports a function error as status 500", async () => {
		const body = '{"errorMessage": "boom", "errorType": "Error"}';
		send.mockResolvedValueOnce(invokeOutput(body, { FunctionError: "Unhandled" }));

		await expect(transport.call(FUNCTION_ARN, PAYLOAD)).resolves.toEqual({
			status: 500,
			body,
		});
	});

	it("returns an empty body when the function sends no payload", async () => {
		send.mockResolvedValueOnce({ StatusCode: 200 } as never);

		await expect(transport.call(FUNCTION_ARN, PAYLOAD)).resolves.toEqual({
			status: 200,
			body: "",
		});
	});

	it("wraps SDK failures in TransportFault", async () => {
		send.mockRejectedValueOnce(new Error("ResourceNotFoundException") as never);

		const rejection = transport.call(FUNCTION_ARN, PAYLOAD);
		await expect(rejection).rejects.toThrow(TransportFault);
		await expect(rejection).rejects.toMatchObject({
			message: `Lambda invocation of ${FUNCTION_ARN} failed: ResourceNotFoundException`,
		});
	});
});
