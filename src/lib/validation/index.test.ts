import { describe, expect, it } from "vitest";
import { RelayError } from "../../shared/errors.js";
import { ValidationError, validate, z } from "./index.js";

describe("validate", () => {
	it("returns ok(data) for valid input", () => {
		const result = validate(z.string(), "EURUSD");
		expect(result).toEqual({ ok: true, value: "EURUSD" });
	});

	it("returns the transformed output of the schema", () => {
		const schema = z.string().transform((s) => s.toUpperCase());
		const result = validate(schema, "buy");
		expect(result.ok && result.value).toBe("BUY");
	});

	it("returns err(ValidationError) with path and message for each issue", () => {
		const schema = z.object({
			symbol: z.string({ required_error: "symbol is required" }),
			price: z.number().positive("price must be positive"),
		});
		const result = validate(schema, { price: -1 });

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ValidationError);
			expect(result.error).toBeInstanceOf(RelayError);
			expect(result.error.isRetryable).toBe(false);
			expect(result.error.issues).toEqual([
				{ path: ["symbol"], message: "symbol is required" },
				{ path: ["price"], message: "price must be positive" },
			]);
			expect(result.error.firstMessage()).toBe("symbol is required");
		}
	});

	it("serializes issues in toJSON", () => {
		const error = new ValidationError("Validation failed", [{ path: ["a"], message: "bad" }]);
		expect(error.toJSON()).toMatchObject({
			code: "VALIDATION_FAILED",
			issues: [{ path: ["a"], message: "bad" }],
		});
	});
});
