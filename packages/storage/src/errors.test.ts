import { DependencyUnavailableError, NotFoundError } from "@shiftlog/domain";
import { describe, expect, it } from "vitest";
import { guard, toStorageError } from "./errors.js";

describe("toStorageError", () => {
	it("passes domain errors through", () => {
		const error = new NotFoundError("record", 4);
		expect(toStorageError("records.close", error)).toBe(error);
	});

	it("wraps driver errors as an unavailable dependency", () => {
		const cause = new Error("connect ECONNREFUSED 127.0.0.1:5432");
		const error = toStorageError("users.listAll", cause);

		expect(error).toBeInstanceOf(DependencyUnavailableError);
		expect(error.message).toBe("users.listAll failed: connect ECONNREFUSED 127.0.0.1:5432");
		expect(error.cause).toBe(cause);
	});
});

describe("guard", () => {
	it("returns the result", async () => {
		await expect(guard("ping", async () => 1)).resolves.toBe(1);
	});

	it("maps thrown errors", async () => {
		await expect(
			guard("ping", async () => {
				throw new Error("timeout exceeded when trying to connect");
			}),
		).rejects.toThrow("ping failed: timeout exceeded when trying to connect");
	});
});
