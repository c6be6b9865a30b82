// src/fixedpoint/bimath.ts

/**
 * Integer helpers for working with the scaled bigints
 * that back every fixed-point number.
 *
 * All rounding in here is "round half away from zero",
 * which matches the rounding of a conventional numeric cast.
 */

// Types =============================================================

/** A bigint mantissa with a binary exponent, representing mantissa · 2^exponent. */
interface BinaryFloat {
	mantissa: bigint;
	exponent: bigint;
}

// Constants =========================================================

const ZERO: bigint = 0n;
const ONE: bigint = 1n;
const TWO: bigint = 2n;

// Mathematical Operations ===========================================

/**
 * Calculates the absolute value of a bigint
 * @param bigint - The BigInt
 * @returns The absolute value
 */
function abs(bigint: bigint): bigint {
	return bigint < ZERO ? -bigint : bigint;
}

/** Returns -1, 0 or 1 depending on the sign of the bigint. */
function sign(bigint: bigint): -1 | 0 | 1 {
	return bigint < ZERO ? -1 : bigint > ZERO ? 1 : 0;
}

/**
 * Compares two BigInts.
 * @param a The first BigInt.
 * @param b The second BigInt.
 * @returns -1 if a < b, 0 if a === b, and 1 if a > b.
 */
function compare(a: bigint, b: bigint): -1 | 0 | 1 {
	return a < b ? -1 : a > b ? 1 : 0;
}

/** Finds the smaller of two BigInts. */
function min(a: bigint, b: bigint): bigint {
	return a < b ? a : b;
}

/** Finds the larger of two BigInts. */
function max(a: bigint, b: bigint): bigint {
	return a > b ? a : b;
}

// Big Length Algorithms =============================================================

// Global state for the bisection algorithm so it's not re-computed every call
const testersCoeff: number[] = [];
const testersBigCoeff: bigint[] = [];
const testers: bigint[] = [];
let testersN = 0;

/**
 * Calculates the bit length of the magnitude of a bigint using a dynamic bisection algorithm.
 * Complexity O(log n), where n is the number of bits.
 * Algorithm pulled from https://stackoverflow.com/a/76616288
 */
function bitLength(x: bigint): number {
	if (x === ZERO) return 0;
	if (x < ZERO) x = -x;

	let k = 0;
	while (true) {
		if (testersN === k) {
			testersCoeff.push(32 << testersN);
			testersBigCoeff.push(BigInt(testersCoeff[testersN]!));
			testers.push(ONE << testersBigCoeff[testersN]!);
			testersN++;
		}
		if (x < testers[k]!) break;
		k++;
	}

	if (!k) return 32 - Math.clz32(Number(x));

	// Determine length by bisection
	k--;
	let i = testersCoeff[k]!;
	let a = x >> testersBigCoeff[k]!;
	while (k--) {
		const b = a >> testersBigCoeff[k]!;
		if (b) {
			i += testersCoeff[k]!;
			a = b;
		}
	}

	return i + 32 - Math.clz32(Number(a));
}

// Rounding =========================================================================

/**
 * Divides a bigint by 2^shift, rounding half away from zero.
 * A negative shift is an exact left shift.
 * @param x - The bigint to shift
 * @param shift - How many bits to discard
 */
function roundShift(x: bigint, shift: number): bigint {
	if (shift <= 0) return x << BigInt(-shift);
	const shiftBigInt = BigInt(shift);
	const half = ONE << (shiftBigInt - ONE);
	// Shift the magnitude so that -0.5 rounds to -1, mirroring 0.5 to 1.
	if (x >= ZERO) return (x + half) >> shiftBigInt;
	return -((-x + half) >> shiftBigInt);
}

/**
 * Divides two bigints, rounding the quotient half away from zero.
 * The divisor must not be zero.
 */
function roundDivide(numerator: bigint, denominator: bigint): bigint {
	if (denominator < ZERO) {
		numerator = -numerator;
		denominator = -denominator;
	}
	const magnitude = (TWO * abs(numerator) + denominator) / (TWO * denominator);
	return numerator < ZERO ? -magnitude : magnitude;
}

/**
 * Computes the floored modulus of two bigints.
 * The result carries the sign of the divisor, or is zero.
 */
function floorMod(a: bigint, b: bigint): bigint {
	const remainder = a % b;
	if (remainder !== ZERO && (remainder < ZERO) !== (b < ZERO)) return remainder + b;
	return remainder;
}

// Roots and Powers ==================================================================

/**
 * Calculates floor(sqrt(n)) using Newton's method.
 * The first guess is a power of two derived from the bit length, which is always
 * at or above the true root, so the iterates decrease until they settle.
 */
function isqrt(n: bigint): bigint {
	if (n < ZERO) throw new RangeError('Cannot take the integer square root of a negative bigint.');
	if (n < TWO) return n;

	let x = ONE << BigInt(Math.ceil(bitLength(n) / 2));
	while (true) {
		const next = (x + n / x) >> ONE;
		if (next >= x) return x;
		x = next;
	}
}

/** Calculates sqrt(n), rounded to the nearest integer. */
function roundedSqrt(n: bigint): bigint {
	const root = isqrt(n);
	// (root + 0.5)^2 = root^2 + root + 0.25, and n is an integer.
	return n - root * root > root ? root + ONE : root;
}

/**
 * Calculates base^exponent for a non-negative exponent
 * by repeated squaring.
 */
function intPower(base: bigint, exponent: bigint): bigint {
	if (exponent < ZERO) throw new RangeError('intPower() requires a non-negative exponent.');

	let result = ONE;
	let currentPower = base;
	while (exponent > ZERO) {
		if (exponent & ONE) result *= currentPower;
		exponent >>= ONE;
		if (exponent > ZERO) currentPower *= currentPower;
	}
	return result;
}

/**
 * Approximates base^exponent to about `precisionBits` significant bits.
 * Every product is rounded back to that width, so the work depends on the
 * precision and the bit length of the exponent, never on the size of the power.
 * The relative error stays below exponent · 2^(2 - precisionBits).
 * @param base - Must be positive
 * @param exponent - Must be non-negative
 */
function roundedPower(base: bigint, exponent: bigint, precisionBits: number): BinaryFloat {
	if (base <= ZERO) throw new RangeError('roundedPower() requires a positive base.');
	if (exponent < ZERO) throw new RangeError('roundedPower() requires a non-negative exponent.');

	let result: BinaryFloat = { mantissa: ONE, exponent: ZERO };
	let currentPower = roundFloat(base, ZERO, precisionBits);
	while (exponent > ZERO) {
		if (exponent & ONE) result = roundFloat(result.mantissa * currentPower.mantissa, result.exponent + currentPower.exponent, precisionBits);
		exponent >>= ONE;
		if (exponent > ZERO) currentPower = roundFloat(currentPower.mantissa * currentPower.mantissa, TWO * currentPower.exponent, precisionBits);
	}
	return result;
}

/** Rounds mantissa · 2^exponent to at most `precisionBits` bits of mantissa, plus a possible carry. */
function roundFloat(mantissa: bigint, exponent: bigint, precisionBits: number): BinaryFloat {
	const excess = bitLength(mantissa) - precisionBits;
	if (excess <= 0) return { mantissa, exponent };
	return { mantissa: roundShift(mantissa, excess), exponent: exponent + BigInt(excess) };
}

// Exports ============================================================

export default {
	// Mathematical Operations
	abs,
	sign,
	compare,
	min,
	max,
	// Big Length Algorithms
	bitLength,
	// Rounding
	roundShift,
	roundDivide,
	floorMod,
	// Roots and Powers
	isqrt,
	roundedSqrt,
	intPower,
	roundedPower,
};

export type { BinaryFloat };
