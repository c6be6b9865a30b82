// src/fixedpoint/format.ts

/**
 * The Format describes one fixed-point representation:
 * how many bits sit left and right of the binary point.
 *
 * A scaled integer `n` in a Format with `fractionBits = f` represents `n / 2^f`.
 * When `integerBits` is a number, the scaled integer must also fit the
 * two's complement range of `integerBits + fractionBits` bits.
 * When it is `null`, the integer part may grow without bound and only the
 * fractional resolution is fixed.
 *
 * Every Format owns a cache of the constants π, ln 2 and e. Entries are
 * computed lazily, once per increase in the precision that was asked of them,
 * and are never evicted.
 */

import * as z from 'zod';

import bimath from './bimath.js';
import fxmath from './fxmath.js';
import fxstring from './fxstring.js';
import { FixedNum } from './fixednum.js';
import { DivisionByZeroError, OverflowError, ValueError } from './errors.js';
import { getConfig } from '../config/config.js';
import { logZodError } from '../util/zodlogger.js';

import type { ConstantName, ConstantSource } from './fxmath.js';

// Types ========================================================

/** The options accepted by the {@link Format} constructor. */
type FormatOptions = z.input<typeof formatOptionsSchema>;

/** A cached constant together with the fraction bits it was computed to. */
interface CachedConstant {
	precisionBits: number;
	value: bigint;
}

// Constants ========================================================

/** The largest bit count a Format will accept on either side of the binary point. */
const MAX_FORMAT_BITS = 100_000;

/** Bits computed beyond the request whenever a constant is (re)computed, so the rounded value is correct. */
const CONSTANT_GUARD_BITS = 10;

const formatOptionsSchema = z.strictObject({
	/** Bits left of the binary point. `null` leaves the integer part unbounded. */
	integerBits: z.number().int().min(0).max(MAX_FORMAT_BITS).nullable(),
	/** Bits right of the binary point. */
	fractionBits: z.number().int().min(0).max(MAX_FORMAT_BITS),
	/** Overrides the configured guard bits for transcendental functions. */
	guardBits: z.number().int().min(0).max(256).optional(),
});

// Format ===========================================================

class Format implements ConstantSource {
	/** Bits left of the binary point, or `null` when unbounded. */
	readonly integerBits: number | null;
	/** Bits right of the binary point. */
	readonly fractionBits: number;
	/** integerBits + fractionBits, or `null` when unbounded. */
	readonly totalBits: number | null;
	/** 2^fractionBits. The scaled integer of the value 1. */
	readonly scale: bigint;
	/** The smallest scaled integer this Format can hold, or `null` when unbounded. */
	readonly minScaled: bigint | null;
	/** The largest scaled integer this Format can hold, or `null` when unbounded. */
	readonly maxScaled: bigint | null;

	private readonly guardBitsOverride: number | undefined;
	private readonly constantCache = new Map<ConstantName, CachedConstant>();

	/**
	 * @throws {ValueError} If either bit count is not a non-negative integer.
	 */
	constructor(options: FormatOptions) {
		const result = formatOptionsSchema.safeParse(options);
		if (!result.success) {
			logZodError(options, result.error, 'Invalid Format options.');
			throw new ValueError(`Invalid Format options: ${z.prettifyError(result.error)}`);
		}
		const { integerBits, fractionBits, guardBits } = result.data;

		this.integerBits = integerBits;
		this.fractionBits = fractionBits;
		this.totalBits = integerBits === null ? null : integerBits + fractionBits;
		this.scale = 1n << BigInt(fractionBits);
		if (this.totalBits === null) {
			this.minScaled = null;
			this.maxScaled = null;
		} else if (this.totalBits === 0) {
			// A zero-width Format can only hold zero.
			this.minScaled = 0n;
			this.maxScaled = 0n;
		} else {
			const half = 1n << BigInt(this.totalBits - 1);
			this.minScaled = -half;
			this.maxScaled = half - 1n;
		}
		this.guardBitsOverride = guardBits;
		Object.freeze(this);
	}

	/** Whether the integer part has a bit budget. */
	get isBounded(): boolean {
		return this.totalBits !== null;
	}

	/** Extra working bits used by transcendental functions on values of this Format. */
	get guardBits(): number {
		return this.guardBitsOverride ?? getConfig().guardBits;
	}

	// Range ====================================================

	/** Tests whether a scaled integer fits this Format. */
	fits(scaled: bigint): boolean {
		if (this.minScaled === null || this.maxScaled === null) return true;
		return scaled >= this.minScaled && scaled <= this.maxScaled;
	}

	/**
	 * Returns the scaled integer if it fits this Format.
	 * @throws {OverflowError} If it does not.
	 */
	checkRange(scaled: bigint): bigint {
		if (this.fits(scaled)) return scaled;
		throw new OverflowError(`Scaled value ${scaled} is outside the range of ${this.toString()}.`);
	}

	// Comparison ===============================================

	/** Tests if two Formats describe the same representation. */
	equals(other: Format): boolean {
		return this.integerBits === other.integerBits && this.fractionBits === other.fractionBits;
	}

	/**
	 * The common Format two operands are resolved to before they are combined:
	 * the finer resolution and the larger integer range of the two.
	 * Returns this Format itself when both describe the same representation.
	 */
	widen(other: Format): Format {
		if (this === other || this.equals(other)) return this;
		const integerBits = this.integerBits === null || other.integerBits === null
			? null
			: Math.max(this.integerBits, other.integerBits);
		const fractionBits = Math.max(this.fractionBits, other.fractionBits);
		if (integerBits === this.integerBits && fractionBits === this.fractionBits) return this;
		if (integerBits === other.integerBits && fractionBits === other.fractionBits) return other;
		const overrides = [this.guardBitsOverride, other.guardBitsOverride].filter((bits): bits is number => bits !== undefined);
		const guardBits = overrides.length > 0 ? Math.max(...overrides) : undefined;
		return new Format({ integerBits, fractionBits, guardBits });
	}

	toString(): string {
		return `Format(${this.integerBits ?? '*'}, ${this.fractionBits})`;
	}

	// Constants ================================================

	/**
	 * Returns a mathematical constant scaled by 2^precisionBits.
	 * A cached value computed to at least that precision is reused,
	 * otherwise the constant is computed afresh and replaces the cached entry.
	 * @param name - 'pi', 'ln2' or 'e'
	 * @param precisionBits - The fraction bits of the returned scaled integer
	 */
	constant(name: ConstantName, precisionBits: number): bigint {
		if (!Number.isInteger(precisionBits) || precisionBits < 0) throw new ValueError(`Constant precision must be a non-negative integer. Received: ${precisionBits}`);

		const cached = this.constantCache.get(name);
		if (cached !== undefined && cached.precisionBits >= precisionBits) {
			return bimath.roundShift(cached.value, cached.precisionBits - precisionBits);
		}

		const computedBits = precisionBits + CONSTANT_GUARD_BITS;
		const value = fxmath.computeConstant(name, computedBits);
		this.constantCache.set(name, { precisionBits: computedBits, value });
		return bimath.roundShift(value, CONSTANT_GUARD_BITS);
	}

	/** The precision a constant is currently cached at, or `undefined` if it never was requested. */
	cachedPrecision(name: ConstantName): number | undefined {
		return this.constantCache.get(name)?.precisionBits;
	}

	/** π in this Format. */
	getPi(): FixedNum {
		return this.fromRaw(this.constant('pi', this.fractionBits));
	}

	/** ln(2) in this Format. */
	getLn2(): FixedNum {
		return this.fromRaw(this.constant('ln2', this.fractionBits));
	}

	/** Euler's number in this Format. */
	getE(): FixedNum {
		return this.fromRaw(this.constant('e', this.fractionBits));
	}

	// Construction =============================================

	/**
	 * Wraps an already scaled integer.
	 * @throws {OverflowError} If it does not fit this Format.
	 */
	fromRaw(scaled: bigint): FixedNum {
		return new FixedNum(scaled, this);
	}

	/**
	 * Creates an exact FixedNum from an integer.
	 * @throws {ValueError} If a number argument is not an integer.
	 * @throws {OverflowError} If the value does not fit this Format.
	 */
	fromInt(value: bigint | number): FixedNum {
		if (typeof value === 'number' && !Number.isSafeInteger(value)) throw new ValueError(`fromInt() requires a safe integer. Received: ${value}`);
		return this.fromRaw(BigInt(value) << BigInt(this.fractionBits));
	}

	/**
	 * Creates the FixedNum nearest to numerator / denominator,
	 * rounding half away from zero.
	 * @throws {DivisionByZeroError} If the denominator is zero.
	 * @throws {OverflowError} If the value does not fit this Format.
	 */
	fromRational(numerator: bigint | number, denominator: bigint | number = 1n): FixedNum {
		const num = toIntegerArgument(numerator, 'numerator');
		const den = toIntegerArgument(denominator, 'denominator');
		if (den === 0n) throw new DivisionByZeroError(`Cannot create a FixedNum from ${num}/0.`);
		return this.fromRaw(bimath.roundDivide(num << BigInt(this.fractionBits), den));
	}

	/**
	 * Parses a decimal string such as "-12.375", "1e-3" or "+.5".
	 * @throws {ValueError} If the text is malformed.
	 * @throws {OverflowError} If the value does not fit this Format.
	 */
	fromString(text: string): FixedNum {
		const { numerator, denominator } = fxstring.parseDecimal(text);
		return this.fromRational(numerator, denominator);
	}

	/**
	 * Creates the FixedNum nearest to a javascript number by reading its
	 * IEEE 754 binary representation directly, so no decimal rounding sneaks in.
	 * @throws {ValueError} If the number is not finite.
	 * @throws {OverflowError} If the value does not fit this Format.
	 */
	fromNumber(num: number): FixedNum {
		if (!Number.isFinite(num)) throw new ValueError(`Cannot create a FixedNum from a non-finite number. Received: ${num}`);
		if (num === 0) return this.fromRaw(0n);

		// Extract the raw 64 bits of the float into a BigInt.
		const buffer = new ArrayBuffer(8);
		const floatView = new Float64Array(buffer);
		const intView = new BigInt64Array(buffer);
		floatView[0] = num;
		const bits = intView[0]!;

		const negative = bits < 0n;
		const exponent = Number((bits >> 52n) & 0x7FFn);
		const mantissa = bits & 0xFFFFFFFFFFFFFn;

		// num = significand * 2^(-divex)
		let significand: bigint;
		let divex: number;
		if (exponent === 0) {
			// Subnormal number. The implicit leading bit is 0.
			significand = mantissa;
			divex = 1022 + 52;
		} else {
			significand = (1n << 52n) | mantissa;
			divex = 1023 - exponent + 52;
		}

		const magnitude = bimath.roundShift(significand, divex - this.fractionBits);
		return this.fromRaw(negative ? -magnitude : magnitude);
	}

	/** Rebuilds a FixedNum from the text of {@link FixedNum.toRepr}. */
	static parseRepr(text: string): FixedNum {
		const { scaledValue, integerBits, fractionBits } = fxstring.parseRepr(text);
		return new Format({ integerBits, fractionBits }).fromRaw(scaledValue);
	}
}

// Helpers ==========================================================

function toIntegerArgument(value: bigint | number, name: string): bigint {
	if (typeof value === 'bigint') return value;
	if (!Number.isSafeInteger(value)) throw new ValueError(`The ${name} must be a safe integer. Received: ${value}`);
	return BigInt(value);
}

/**
 * Creates a Format.
 * @param integerBits - Bits left of the binary point, or `null` for an unbounded integer part
 * @param fractionBits - Bits right of the binary point
 * @param options - Optional per-Format guard bits
 */
function makeFormat(integerBits: number | null, fractionBits: number, options: { guardBits?: number } = {}): Format {
	return new Format({ integerBits, fractionBits, ...options });
}

export { Format, makeFormat, MAX_FORMAT_BITS };

export type { FormatOptions };
