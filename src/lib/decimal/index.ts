/**
 * LibDecimal — thin wrapper around decimal.js-light.
 *
 * Open/close prices arrive as JSON numbers; P&L and daily totals are summed
 * here so binary float noise (0.1 + 0.2) never reaches a notification or
 * a stored result. Callers never import decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers) or empty (for strings)
	 * @example LibDecimal.from(1.0855)
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	neg(): LibDecimal {
		return new LibDecimal(this.raw.negated());
	}

	// ── Comparison ─────────────────────────────────────────────────

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Converts to a string, removing unnecessary trailing zeros and decimal point.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/**
	 * Fixed-point string with `places` decimals.
	 * @example LibDecimal.from("1.23456").toFixed(2) // "1.23"
	 */
	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Fixed-point string with an explicit `+` on non-negative values, e.g. `+0.00150`. */
	toSignedFixed(places: number): string {
		const fixed = this.raw.toFixed(places);
		return this.isNegative() ? fixed : `+${fixed}`;
	}

	/** May lose precision; for the wire format only. */
	toNumber(): number {
		return this.raw.toNumber();
	}
}
