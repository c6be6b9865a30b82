// src/fixedpoint/fixednum.ts

/**
 * An immutable fixed-point number: a scaled bigint bound to one {@link Format}.
 *
 * The real value is `scaledValue / 2^format.fractionBits`.
 * Every operation returns a new FixedNum. Every narrowing step rounds
 * half away from zero, and every result destined for a bounded Format
 * is range checked, throwing an OverflowError rather than wrapping.
 *
 * Binary operations accept another FixedNum, a bigint, a javascript number,
 * or a decimal string. Anything other than a FixedNum is first converted
 * into the Format of the left operand. The two operands are then resolved
 * to their widened Format, which is also the Format of the result unless
 * the caller passes an explicit `resultFormat`.
 */

import bimath from './bimath.js';
import fxmath from './fxmath.js';
import fxstring from './fxstring.js';
import { DivisionByZeroError, DomainError, OverflowError, ValueError } from './errors.js';

import type { Format } from './format.js';

// Types ========================================================

/** Anything a binary operation accepts as its right operand. */
type Operand = FixedNum | bigint | number | string;

// Constants ========================================================

const ZERO: bigint = 0n;
const ONE: bigint = 1n;

// FixedNum ==========================================================

class FixedNum {
	/** The representation this value lives in. */
	readonly format: Format;
	/** The value multiplied by 2^format.fractionBits. */
	readonly scaledValue: bigint;

	/**
	 * Prefer the factories on {@link Format}, such as `fromInt()` or `fromString()`.
	 * @throws {OverflowError} If the scaled value does not fit the Format.
	 */
	constructor(scaledValue: bigint, format: Format) {
		this.scaledValue = format.checkRange(scaledValue);
		this.format = format;
		Object.freeze(this);
	}

	// Conversion ===============================================

	/** Converts an operand into this value's Format, unless it already is a FixedNum. */
	private coerce(other: Operand): FixedNum {
		if (other instanceof FixedNum) return other;
		if (typeof other === 'bigint') return this.format.fromInt(other);
		if (typeof other === 'number') return this.format.fromNumber(other);
		return this.format.fromString(other);
	}

	/**
	 * Brings both operands to the finer of their two resolutions, where they can be
	 * combined exactly, and picks the Format of the result.
	 */
	private resolve(other: Operand, resultFormat?: Format): { a: bigint; b: bigint; fractionBits: number; target: Format } {
		const operand = this.coerce(other);
		const fractionBits = Math.max(this.format.fractionBits, operand.format.fractionBits);
		return {
			a: toWorking(this, fractionBits),
			b: toWorking(operand, fractionBits),
			fractionBits,
			target: resultFormat ?? this.format.widen(operand.format),
		};
	}

	/**
	 * Rescales this value into another Format.
	 * Widening the fraction is exact, narrowing it rounds half away from zero.
	 * @throws {OverflowError} If the value does not fit the new Format.
	 */
	convert(format: Format): FixedNum {
		if (format === this.format) return this;
		return format.fromRaw(rescale(this.scaledValue, this.format.fractionBits, format.fractionBits));
	}

	/** Converts this value to the nearest javascript number. */
	toNumber(): number {
		if (this.scaledValue === ZERO) return 0;
		const magnitude = bimath.abs(this.scaledValue);
		// Keep just enough bits to fill a double's significand.
		const dropped = Math.max(0, bimath.bitLength(magnitude) - 53);
		const significand = Number(bimath.roundShift(magnitude, dropped));
		const result = scaleByPowerOfTwo(significand, dropped - this.format.fractionBits);
		return this.scaledValue < ZERO ? -result : result;
	}

	/** The integer part of this value, truncated toward zero. */
	toBigInt(): bigint {
		return this.scaledValue / this.format.scale;
	}

	// Arithmetic ===============================================

	/** Returns the sum of this value and another. */
	add(other: Operand, resultFormat?: Format): FixedNum {
		const { a, b, fractionBits, target } = this.resolve(other, resultFormat);
		return target.fromRaw(rescale(a + b, fractionBits, target.fractionBits));
	}

	/** Returns the difference of this value and another. */
	sub(other: Operand, resultFormat?: Format): FixedNum {
		const { a, b, fractionBits, target } = this.resolve(other, resultFormat);
		return target.fromRaw(rescale(a - b, fractionBits, target.fractionBits));
	}

	/** Returns the product of this value and another. The exact product is rounded once. */
	mul(other: Operand, resultFormat?: Format): FixedNum {
		const operand = this.coerce(other);
		const target = resultFormat ?? this.format.widen(operand.format);
		const productBits = this.format.fractionBits + operand.format.fractionBits;
		return target.fromRaw(rescale(this.scaledValue * operand.scaledValue, productBits, target.fractionBits));
	}

	/**
	 * Returns the quotient of this value and another, rounded half away from zero.
	 * @throws {DivisionByZeroError} If the divisor is zero.
	 */
	div(other: Operand, resultFormat?: Format): FixedNum {
		const operand = this.coerce(other);
		if (operand.scaledValue === ZERO) throw new DivisionByZeroError(`Cannot divide ${this.toString()} by zero.`);
		const target = resultFormat ?? this.format.widen(operand.format);

		// a/2^fa ÷ b/2^fb = (a · 2^(ft + fb - fa) / b) / 2^ft
		const shift = target.fractionBits + operand.format.fractionBits - this.format.fractionBits;
		const quotient = shift >= 0
			? bimath.roundDivide(this.scaledValue << BigInt(shift), operand.scaledValue)
			: bimath.roundDivide(this.scaledValue, operand.scaledValue << BigInt(-shift));
		return target.fromRaw(quotient);
	}

	/**
	 * Returns the floored remainder of this value divided by another.
	 * The result carries the sign of the divisor, or is zero.
	 * @throws {DivisionByZeroError} If the divisor is zero.
	 */
	mod(other: Operand, resultFormat?: Format): FixedNum {
		const { a, b, fractionBits, target } = this.resolve(other, resultFormat);
		if (b === ZERO) throw new DivisionByZeroError(`Cannot take ${this.toString()} modulo zero.`);
		return target.fromRaw(rescale(bimath.floorMod(a, b), fractionBits, target.fractionBits));
	}

	/**
	 * Returns the negation of this value.
	 * @throws {OverflowError} When negating the minimum of a bounded Format.
	 */
	neg(): FixedNum {
		return this.format.fromRaw(-this.scaledValue);
	}

	/**
	 * Returns the absolute value of this value.
	 * @throws {OverflowError} For the minimum of a bounded Format.
	 */
	abs(): FixedNum {
		return this.scaledValue < ZERO ? this.neg() : this;
	}

	/** Unary plus. Returns this value unchanged. */
	pos(): FixedNum {
		return this;
	}

	/** Multiplies this value by 2^bits. */
	shiftLeft(bits: number): FixedNum {
		return this.format.fromRaw(bimath.roundShift(this.scaledValue, -validateShift(bits)));
	}

	/** Divides this value by 2^bits, rounding half away from zero. */
	shiftRight(bits: number): FixedNum {
		return this.format.fromRaw(bimath.roundShift(this.scaledValue, validateShift(bits)));
	}

	// Comparison ===============================================

	/** Returns -1, 0 or 1 as this value is less than, equal to, or greater than the other. */
	compare(other: Operand): -1 | 0 | 1 {
		const operand = this.coerce(other);
		const fractionBits = Math.max(this.format.fractionBits, operand.format.fractionBits);
		return bimath.compare(toWorking(this, fractionBits), toWorking(operand, fractionBits));
	}

	/** Tests value equality. Values in different Formats can be equal. */
	equals(other: Operand): boolean {
		return this.compare(other) === 0;
	}

	lt(other: Operand): boolean {
		return this.compare(other) < 0;
	}

	le(other: Operand): boolean {
		return this.compare(other) <= 0;
	}

	gt(other: Operand): boolean {
		return this.compare(other) > 0;
	}

	ge(other: Operand): boolean {
		return this.compare(other) >= 0;
	}

	isZero(): boolean {
		return this.scaledValue === ZERO;
	}

	sign(): -1 | 0 | 1 {
		return bimath.sign(this.scaledValue);
	}

	/** Returns the smaller of the two values, or this one on a tie. */
	min(other: Operand): FixedNum {
		const operand = this.coerce(other);
		return operand.lt(this) ? operand : this;
	}

	/** Returns the larger of the two values, or this one on a tie. */
	max(other: Operand): FixedNum {
		const operand = this.coerce(other);
		return operand.gt(this) ? operand : this;
	}

	// Integer Rounding =========================================

	/** Rounds toward negative infinity. */
	floor(): FixedNum {
		const f = BigInt(this.format.fractionBits);
		return this.format.fromRaw((this.scaledValue >> f) << f);
	}

	/** Rounds toward positive infinity. */
	ceil(): FixedNum {
		const f = BigInt(this.format.fractionBits);
		return this.format.fromRaw(-((-this.scaledValue >> f) << f));
	}

	/** Rounds toward zero. */
	trunc(): FixedNum {
		return this.format.fromRaw(this.toBigInt() << BigInt(this.format.fractionBits));
	}

	/** Rounds to the nearest integer, half away from zero. */
	round(): FixedNum {
		const f = this.format.fractionBits;
		return this.format.fromRaw(bimath.roundShift(this.scaledValue, f) << BigInt(f));
	}

	isInteger(): boolean {
		return this.scaledValue % this.format.scale === ZERO;
	}

	// Powers ===================================================

	/**
	 * Raises this value to an integer power.
	 * Small powers are computed exactly and rounded once. When the exact power
	 * would be far wider than the result needs, the repeated squaring is
	 * rounded to the working precision instead.
	 * @throws {DomainError} For 0^0 and for zero raised to a negative power.
	 * @throws {OverflowError} If the result does not fit a bounded result Format.
	 */
	intPower(exponent: bigint | number, resultFormat?: Format): FixedNum {
		if (typeof exponent === 'number' && !Number.isSafeInteger(exponent)) throw new ValueError(`intPower() requires an integer exponent. Received: ${exponent}`);
		const n = BigInt(exponent);
		const target = resultFormat ?? this.format;
		const s = this.scaledValue;

		if (s === ZERO) {
			if (n <= ZERO) throw new DomainError(`0 raised to the power ${n} is undefined.`);
			return target.fromRaw(ZERO);
		}
		if (n === ZERO) return target.fromInt(ONE);

		// 2^(L-1-f) <= |x| < 2^(L-f), so |x|^n is bracketed before it is ever computed.
		const L = BigInt(bimath.bitLength(s));
		const f = BigInt(this.format.fractionBits);
		const ft = BigInt(target.fractionBits);
		const m = bimath.abs(n);
		const lowerLog2 = n > ZERO ? n * (L - ONE - f) : m * (f - L);
		const upperLog2 = n > ZERO ? n * (L - f) : m * (f + ONE - L);
		if (target.integerBits !== null && lowerLog2 >= BigInt(target.integerBits)) throw this.powerOverflow(n, target);
		// Less than a quarter of the last place rounds to zero.
		if (upperLog2 <= -(ft + 2n)) return target.fromRaw(ZERO);

		const negate = s < ZERO && (m & ONE) === ONE;
		const exactBits = m * L;
		let precisionBits = target.fractionBits + target.guardBits + bimath.bitLength(m) + 4;
		if (exactBits > BigInt(2 * precisionBits)) {
			// The bracket is loose by a factor of 2^m, so narrow it with a cheap estimate.
			const estimate = bimath.roundedPower(bimath.abs(s), m, precisionBits);
			// 2^(magnitude-1) <= estimate < 2^magnitude, and the estimate is within a quarter of |x|^m.
			const magnitude = BigInt(bimath.bitLength(estimate.mantissa)) + estimate.exponent - f * m;
			const resultLower = n > ZERO ? magnitude - 2n : -magnitude - ONE;
			const resultUpper = n > ZERO ? magnitude + ONE : 2n - magnitude;
			if (target.integerBits !== null && resultLower >= BigInt(target.integerBits - 1)) throw this.powerOverflow(n, target);
			if (resultUpper <= -(ft + 2n)) return target.fromRaw(ZERO);
			if (resultUpper > ZERO) precisionBits += Number(resultUpper);
		}
		if (exactBits <= BigInt(2 * precisionBits)) {
			const power = bimath.intPower(s, m);
			if (n > ZERO) return target.fromRaw(bimath.roundShift(power, Number(f * n - ft)));
			return target.fromRaw(bimath.roundDivide(ONE << (f * m + ft), power));
		}

		const power = bimath.roundedPower(bimath.abs(s), m, precisionBits);
		// |x|^m = mantissa · 2^shift
		const shift = power.exponent - f * m;
		let magnitude: bigint;
		if (n > ZERO) {
			magnitude = bimath.roundShift(power.mantissa, Number(-(shift + ft)));
		} else {
			// 2^ft / |x|^m = 2^(ft - shift) / mantissa. A negative numerator exponent leaves less than half the last place.
			const numeratorBits = ft - shift;
			magnitude = numeratorBits >= ZERO ? bimath.roundDivide(ONE << numeratorBits, power.mantissa) : ZERO;
		}
		return target.fromRaw(negate ? -magnitude : magnitude);
	}

	private powerOverflow(exponent: bigint | FixedNum, target: Format): OverflowError {
		return new OverflowError(`${this.toString()} raised to the power ${exponent.toString()} is outside the range of ${target.toString()}.`);
	}

	/**
	 * Raises this value to a power.
	 * Integer exponents go through {@link intPower}, others evaluate exp(exponent · ln(this)).
	 * Either way the result lands in the widened Format of base and exponent unless `resultFormat` is given.
	 * @throws {DomainError} For 0^0, zero raised to a negative power, and a negative base with a fractional exponent.
	 */
	pow(exponent: Operand, resultFormat?: Format): FixedNum {
		const y = this.coerce(exponent);
		const target = resultFormat ?? this.format.widen(y.format);
		if (y.isInteger()) return this.intPower(y.toBigInt(), target);

		if (this.scaledValue < ZERO) throw new DomainError(`A negative base ${this.toString()} cannot be raised to the fractional power ${y.toString()}.`);
		if (this.scaledValue === ZERO) {
			if (y.scaledValue < ZERO) throw new DomainError(`0 raised to the negative power ${y.toString()} is undefined.`);
			return target.fromRaw(ZERO);
		}

		const baseBits = Math.max(target.fractionBits, this.format.fractionBits, y.format.fractionBits) + target.guardBits;
		const estimate = this.powExponent(y, baseBits, target);
		const estimateInt = estimate >> BigInt(baseBits);
		if (target.integerBits !== null && estimateInt > BigInt(target.integerBits)) throw this.powerOverflow(y, target);
		if (estimateInt < -BigInt(target.fractionBits + 3)) return target.fromRaw(ZERO);

		// The error in y · ln(x) grows with |y|, and exp() magnifies it by about 1.44 bits per unit of the product.
		const magnification = estimateInt > ZERO ? Math.floor(Number(estimateInt) * 3 / 2) + 2 : 0;
		const w = baseBits + bimath.bitLength(y.toBigInt()) + magnification + 2;
		return expToFormat(this.powExponent(y, w, target), w, target);
	}

	/** y · ln(this) at w fraction bits. */
	private powExponent(y: FixedNum, w: number, constants: Format): bigint {
		const lnX = fxmath.ln(toWorking(this, w), w, constants);
		return fxmath.mul(toWorking(y, w), lnX, w);
	}

	// Transcendental Functions =================================

	/**
	 * Evaluates a working-precision algorithm on this value
	 * and rounds the result into the result Format.
	 */
	private evaluate(algorithm: (x: bigint, w: number, constants: Format) => bigint, resultFormat?: Format): FixedNum {
		const target = resultFormat ?? this.format;
		const w = Math.max(target.fractionBits, this.format.fractionBits) + target.guardBits;
		const result = algorithm(toWorking(this, w), w, target);
		return target.fromRaw(bimath.roundShift(result, w - target.fractionBits));
	}

	/**
	 * Square root, rounded half away from zero.
	 * @throws {DomainError} If this value is negative.
	 */
	sqrt(resultFormat?: Format): FixedNum {
		if (this.scaledValue < ZERO) throw new DomainError(`Cannot take the square root of the negative value ${this.toString()}.`);
		const target = resultFormat ?? this.format;
		// sqrt(s / 2^f) · 2^ft = sqrt(s · 2^(2ft - f)), a single integer root when the shift is not negative.
		const shift = 2 * target.fractionBits - this.format.fractionBits;
		if (shift >= 0) return target.fromRaw(bimath.roundedSqrt(this.scaledValue << BigInt(shift)));
		return this.evaluate((x, w) => fxmath.sqrt(x, w), target);
	}

	/**
	 * Natural logarithm.
	 * @throws {DomainError} If this value is not positive.
	 */
	ln(resultFormat?: Format): FixedNum {
		this.requirePositive('ln');
		return this.evaluate(fxmath.ln, resultFormat);
	}

	/**
	 * Base-2 logarithm. Exact for powers of two.
	 * @throws {DomainError} If this value is not positive.
	 */
	log2(resultFormat?: Format): FixedNum {
		this.requirePositive('log2');
		return this.evaluate(fxmath.log2, resultFormat);
	}

	/**
	 * e raised to this value.
	 * @throws {OverflowError} If the result does not fit a bounded result Format.
	 */
	exp(resultFormat?: Format): FixedNum {
		const target = resultFormat ?? this.format;
		return expToFormat(this.scaledValue, this.format.fractionBits, target);
	}

	/** Sine of this angle in radians. */
	sin(resultFormat?: Format): FixedNum {
		return this.evaluate(fxmath.sin, resultFormat);
	}

	/** Cosine of this angle in radians. */
	cos(resultFormat?: Format): FixedNum {
		return this.evaluate(fxmath.cos, resultFormat);
	}

	/** Sine and cosine of this angle in radians, sharing one range reduction. */
	sincos(resultFormat?: Format): [FixedNum, FixedNum] {
		const target = resultFormat ?? this.format;
		const w = Math.max(target.fractionBits, this.format.fractionBits) + target.guardBits;
		const [s, c] = fxmath.sincos(toWorking(this, w), w, target);
		const shift = w - target.fractionBits;
		return [target.fromRaw(bimath.roundShift(s, shift)), target.fromRaw(bimath.roundShift(c, shift))];
	}

	/** Tangent of this angle in radians. */
	tan(resultFormat?: Format): FixedNum {
		const target = resultFormat ?? this.format;
		let w = Math.max(target.fractionBits, this.format.fractionBits) + target.guardBits;
		let [s, c] = fxmath.sincos(toWorking(this, w), w, target);
		// No rational angle has a zero cosine, so a zero here only means too few working bits.
		while (c === ZERO) {
			w = 2 * w + 8;
			[s, c] = fxmath.sincos(toWorking(this, w), w, target);
		}
		// Near odd multiples of π/2 the cosine is small and its relative error large.
		const lostBits = w - bimath.bitLength(c);
		if (lostBits > 0) {
			w += 2 * lostBits;
			[s, c] = fxmath.sincos(toWorking(this, w), w, target);
		}
		return target.fromRaw(bimath.roundShift(fxmath.div(s, c, w), w - target.fractionBits));
	}

	/**
	 * Arcsine, in [-π/2, π/2].
	 * @throws {DomainError} If this value is outside [-1, 1].
	 */
	asin(resultFormat?: Format): FixedNum {
		this.requireUnitInterval('asin');
		return this.evaluate(fxmath.asin, resultFormat);
	}

	/**
	 * Arccosine, in [0, π].
	 * @throws {DomainError} If this value is outside [-1, 1].
	 */
	acos(resultFormat?: Format): FixedNum {
		this.requireUnitInterval('acos');
		return this.evaluate(fxmath.acos, resultFormat);
	}

	/** Arctangent, in (-π/2, π/2). */
	atan(resultFormat?: Format): FixedNum {
		return this.evaluate(fxmath.atan, resultFormat);
	}

	/**
	 * The angle of the point (x, this) from the positive x axis, in (-π, π].
	 * @param x - The horizontal coordinate. This value is the vertical one.
	 * @throws {DomainError} If both coordinates are zero.
	 */
	atan2(x: Operand, resultFormat?: Format): FixedNum {
		const other = this.coerce(x);
		if (this.scaledValue === ZERO && other.scaledValue === ZERO) throw new DomainError('atan2(0, 0) is undefined.');
		const target = resultFormat ?? this.format.widen(other.format);
		const w = Math.max(target.fractionBits, this.format.fractionBits, other.format.fractionBits) + target.guardBits;
		const angle = fxmath.atan2(toWorking(this, w), toWorking(other, w), w, target);
		return target.fromRaw(bimath.roundShift(angle, w - target.fractionBits));
	}

	private requirePositive(operation: string): void {
		if (this.scaledValue <= ZERO) throw new DomainError(`${operation}() requires a positive argument. Received: ${this.toString()}`);
	}

	private requireUnitInterval(operation: string): void {
		if (bimath.abs(this.scaledValue) > this.format.scale) throw new DomainError(`${operation}() requires an argument within [-1, 1]. Received: ${this.toString()}`);
	}

	// Text =====================================================

	/**
	 * Renders this value in decimal.
	 * @param precision - Digits after the decimal point. Defaults to
	 * as many as the Format's fraction bits can justify.
	 */
	toDecimalString(precision?: number): string {
		return fxstring.toDecimalString(this.scaledValue, this.format.fractionBits, precision);
	}

	/** Renders the exact decimal expansion of this value. */
	toExactString(): string {
		return fxstring.toExactString(this.scaledValue, this.format.fractionBits);
	}

	/**
	 * Renders this value in base 2.
	 * @param signed - When false, renders the two's complement bit pattern. Bounded Formats only.
	 */
	toBinaryString(signed = true): string {
		return this.toRadixString(2, signed);
	}

	/** Renders this value in base 8. */
	toOctalString(signed = true): string {
		return this.toRadixString(8, signed);
	}

	/** Renders this value in base 16. */
	toHexString(signed = true): string {
		return this.toRadixString(16, signed);
	}

	private toRadixString(radix: 2 | 8 | 16, signed: boolean): string {
		return fxstring.toRadixString(this.scaledValue, this.format.fractionBits, this.format.totalBits, radix, signed);
	}

	/** The canonical text `FixedNum([<scaled>], Format(<i|*>, <f>))`, accepted by `Format.parseRepr()`. */
	toRepr(): string {
		return fxstring.toRepr(this.scaledValue, this.format.integerBits, this.format.fractionBits);
	}

	toString(): string {
		return this.toDecimalString();
	}

	toJSON(): string {
		return this.toRepr();
	}
}

// Helpers ==========================================================

/** Rescales a scaled integer from one count of fraction bits to another. */
function rescale(scaled: bigint, fromBits: number, toBits: number): bigint {
	return bimath.roundShift(scaled, fromBits - toBits);
}

/** The scaled value of a FixedNum at `w` fraction bits, which must be at least its own. */
function toWorking(value: FixedNum, w: number): bigint {
	return value.scaledValue << BigInt(w - value.format.fractionBits);
}

/** Shift amounts must be non-negative integers. */
function validateShift(bits: number): number {
	if (!Number.isSafeInteger(bits) || bits < 0) throw new ValueError(`Shift amount must be a non-negative integer. Received: ${bits}`);
	return bits;
}

/** Multiplies a double by 2^exponent in steps that never overflow an intermediate. */
function scaleByPowerOfTwo(value: number, exponent: number): number {
	while (exponent > 1000) {
		value *= 2 ** 1000;
		exponent -= 1000;
		if (!Number.isFinite(value)) return value;
	}
	while (exponent < -1000) {
		value *= 2 ** -1000;
		exponent += 1000;
		if (value === 0) return value;
	}
	return value * 2 ** exponent;
}

/**
 * e^(x / 2^fx), rounded into the target Format.
 * e^x carries about 1.44 bits of integer part per unit of x, and every one
 * of them costs a bit of absolute precision, so the working precision grows with x.
 */
function expToFormat(x: bigint, fx: number, target: Format): FixedNum {
	const ft = target.fractionBits;
	const intPart = x >> BigInt(fx);

	if (target.integerBits !== null && intPart >= BigInt(Math.max(target.integerBits - 1, 0))) {
		// e^x >= e^intPart >= 2^(integerBits - 1), beyond every value the Format holds.
		throw new OverflowError(`exp(${fxstring.toDecimalString(x, fx)}) is outside the range of ${target.toString()}.`);
	}
	// e^x < 2^-(ft + 2), less than half the last place.
	if (intPart < -BigInt(ft + 2)) return target.fromRaw(ZERO);

	const intBits = intPart > ZERO ? Number(intPart) : 0;
	const extraBits = intBits > 0 ? Math.floor(intBits * 3 / 2) + 2 : 0;
	const w = Math.max(ft, fx) + target.guardBits + extraBits;
	const result = fxmath.exp(x << BigInt(w - fx), w, target);
	return target.fromRaw(bimath.roundShift(result, w - ft));
}

export { FixedNum };

export type { Operand };
