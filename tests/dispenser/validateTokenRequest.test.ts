import { describe, expect, it } from "@jest/globals";
import { ValidationError } from "../../src/core/errors.js";
import { validateTokenRequest } from "../../src/dispenser/validateTokenRequest.js";

function validationErrorOf(fn: () => unknown): ValidationError {
	try {
		fn();
	} catch (error) {
		if (error instanceof ValidationError) return error;
		throw error;
	}
	throw new Error("Expected ValidationError");
}

describe("validateTokenRequest", () => {
	it.each(["abc", "client123", "A1b2C3", "x".repeat(32)])(
		"accepts client id %s",
		(clientId) => {
			expect(validateTokenRequest(clientId, 60).clientId).toBe(clientId);
		},
	);

	it.each([
		["too short", "ab"],
		["too long", "x".repeat(33)],
		["underscore", "client_id"],
		["punctuation", "invalid_client_id!"],
		["whitespace", " abc"],
		["empty", ""],
	])("rejects a client id that is %s", (_label, clientId) => {
		const error = validationErrorOf(() => validateTokenRequest(clientId));
		expect(error.kind).toBe("InvalidClientId");
		expect(error.message).toBe(
			"client_id must be 3-32 characters matching [a-zA-Z0-9]",
		);
	});

	it("rejects a missing or non-string client id", () => {
		expect(validationErrorOf(() => validateTokenRequest(undefined)).message).toBe(
			"client_id is required",
		);
		const error = validationErrorOf(() => validateTokenRequest(42));
		expect(error.kind).toBe("InvalidClientId");
		expect(error.message).toBe("client_id must be a string");
	});

	it("defaults minimumAliveSecs to 300", () => {
		expect(validateTokenRequest("client123")).toEqual({
			clientId: "client123",
			minimumAliveSecs: 300,
		});
	});

	it("keeps an explicit zero", () => {
		expect(validateTokenRequest("client123", 0).minimumAliveSecs).toBe(0);
	});

	it.each([-1, -300])("rejects negative minimumAliveSecs %d", (secs) => {
		const error = validationErrorOf(() => validateTokenRequest("client123", secs));
		expect(error.kind).toBe("InvalidTTL");
		expect(error.message).toBe("minimum_alive_secs must not be negative");
	});

	it.each([Number.NaN, Number.POSITIVE_INFINITY])(
		"rejects non-finite minimumAliveSecs %p",
		(secs) => {
			expect(
				validationErrorOf(() => validateTokenRequest("client123", secs)),
			).toMatchObject({
				kind: "InvalidTTL",
				message: "minimum_alive_secs must be an integer",
			});
		},
	);

	it("rejects non-integer minimumAliveSecs", () => {
		expect(validationErrorOf(() => validateTokenRequest("client123", 1.5))).toMatchObject({
			kind: "InvalidTTL",
			message: "minimum_alive_secs must be an integer",
		});
		expect(
			validationErrorOf(() => validateTokenRequest("client123", "300")).kind,
		).toBe("InvalidTTL");
	});

	it("reports the client id first when both fields are invalid", () => {
		expect(validationErrorOf(() => validateTokenRequest("!", -1)).kind).toBe(
			"InvalidClientId",
		);
	});

	it("returns a frozen request", () => {
		expect(Object.isFrozen(validateTokenRequest("client123", 120))).toBe(true);
	});

	it("is idempotent on an already valid request", () => {
		const first = validateTokenRequest("client123", 120);
		const second = validateTokenRequest(first.clientId, first.minimumAliveSecs);
		expect(second).toEqual(first);
	});
});
