/**
 * Decimal — immutable financial math over decimal.js-light.
 *
 * All prices, sizes, positions and P&L go through this type. Raw `number`
 * only appears at the persistence boundary (FLOAT columns) and in logs.
 */

import { Decimal as DecimalLight } from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class Decimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * @throws Error if the number is not finite or the string is empty
	 * @example Decimal.from("99.5")
	 */
	static from(value: string | number): Decimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			return new Decimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}
		return new Decimal(new DecimalLight(trimmed));
	}

	static zero(): Decimal {
		return new Decimal(new DecimalLight(0));
	}

	static one(): Decimal {
		return new Decimal(new DecimalLight(1));
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.raw.plus(other.raw));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.raw.minus(other.raw));
	}

	mul(other: Decimal): Decimal {
		return new Decimal(this.raw.times(other.raw));
	}

	div(other: Decimal): Decimal {
		if (other.raw.isZero()) {
			throw new Error("Decimal.div: division by zero");
		}
		return new Decimal(this.raw.dividedBy(other.raw));
	}

	neg(): Decimal {
		return new Decimal(this.raw.negated());
	}

	abs(): Decimal {
		return new Decimal(this.raw.absoluteValue());
	}

	// ── Quantization ───────────────────────────────────────────────

	/**
	 * Rounds down to a multiple of `step` (towards negative infinity).
	 * @example Decimal.from("98.97").floorTo(Decimal.from("0.5")) // 98.5
	 */
	floorTo(step: Decimal): Decimal {
		if (!step.isPositive()) {
			throw new Error("Decimal.floorTo: step must be positive");
		}
		const units = this.raw.dividedBy(step.raw).toDecimalPlaces(0, DecimalLight.ROUND_FLOOR);
		return new Decimal(units.times(step.raw));
	}

	/**
	 * Rounds up to a multiple of `step` (towards positive infinity).
	 * @example Decimal.from("101.01").ceilTo(Decimal.from("0.5")) // 101.5
	 */
	ceilTo(step: Decimal): Decimal {
		if (!step.isPositive()) {
			throw new Error("Decimal.ceilTo: step must be positive");
		}
		const units = this.raw.dividedBy(step.raw).toDecimalPlaces(0, DecimalLight.ROUND_CEIL);
		return new Decimal(units.times(step.raw));
	}

	// ── Comparison ─────────────────────────────────────────────────

	/** @returns -1 if this < other, 0 if equal, 1 if this > other */
	cmp(other: Decimal): -1 | 0 | 1 {
		const c = this.raw.comparedTo(other.raw);
		if (c < 0) return -1;
		if (c > 0) return 1;
		return 0;
	}

	eq(other: Decimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: Decimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: Decimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: Decimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: Decimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Min / Max ──────────────────────────────────────────────────

	static min(a: Decimal, b: Decimal): Decimal {
		return a.lte(b) ? a : b;
	}

	static max(a: Decimal, b: Decimal): Decimal {
		return a.gte(b) ? a : b;
	}

	// ── Conversion ─────────────────────────────────────────────────

	/** Precision may be lost; use only for FLOAT columns and metrics. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	/** Plain notation without trailing zeros, e.g. "1.5" for 1.500. */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	toJSON(): string {
		return this.toString();
	}
}
