import { describe, expect, it } from "vitest";
import { LibDecimal } from "./index.js";

describe("LibDecimal", () => {
	it("adds without binary float noise", () => {
		expect(LibDecimal.from(0.1).add(LibDecimal.from(0.2)).toString()).toBe("0.3");
	});

	it("subtracts open from close prices exactly", () => {
		const pnl = LibDecimal.from(1.1015).sub(LibDecimal.from(1.1));
		expect(pnl.toString()).toBe("0.0015");
		expect(pnl.toNumber()).toBe(0.0015);
	});

	it("negates and classifies sign", () => {
		const loss = LibDecimal.from("0.25").neg();
		expect(loss.isNegative()).toBe(true);
		expect(loss.isPositive()).toBe(false);
		expect(LibDecimal.zero().isZero()).toBe(true);
	});

	it("formats fixed and signed-fixed strings", () => {
		expect(LibDecimal.from("1.5").toFixed(5)).toBe("1.50000");
		expect(LibDecimal.from("0.0015").toSignedFixed(5)).toBe("+0.00150");
		expect(LibDecimal.from("-0.0015").toSignedFixed(5)).toBe("-0.00150");
		expect(LibDecimal.zero().toSignedFixed(2)).toBe("+0.00");
	});

	it("strips trailing zeros in toString", () => {
		expect(LibDecimal.from("2.500").toString()).toBe("2.5");
		expect(LibDecimal.from("3.000").toString()).toBe("3");
	});

	it("rejects non-finite numbers and empty strings", () => {
		expect(() => LibDecimal.from(Number.NaN)).toThrow("invalid number");
		expect(() => LibDecimal.from("  ")).toThrow("empty string");
	});
});
