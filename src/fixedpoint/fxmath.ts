// src/fixedpoint/fxmath.ts

/**
 * Series and iterative algorithms behind the transcendental functions.
 *
 * Every function here works on raw scaled bigints that share one working
 * precision `w`, meaning a bigint `x` represents the real value `x / 2^w`.
 * Callers pick `w` with enough guard bits beyond the precision they need,
 * check the mathematical domain, and round the result down afterwards.
 *
 * Series are summed until the next term rounds to zero at the working precision.
 */

import bimath from './bimath.js';
import { ConvergenceError } from './errors.js';
import { getConfig } from '../config/config.js';
import { logEventsAndPrint } from '../util/logEvents.js';

// Types ========================================================

/** The mathematical constants a Format caches. */
type ConstantName = 'pi' | 'ln2' | 'e';

/** Anything that can hand out a constant at a requested precision. */
interface ConstantSource {
	/**
	 * Returns the constant scaled by 2^precisionBits.
	 * @param name - Which constant
	 * @param precisionBits - Fraction bits of the returned scaled integer
	 */
	constant(name: ConstantName, precisionBits: number): bigint;
}

// Constants ========================================================

const ZERO: bigint = 0n;
const ONE: bigint = 1n;
const FOUR: bigint = 4n;

// Helpers ==========================================================

/** The scaled representation of 1 at the working precision. */
function one(w: number): bigint {
	return ONE << BigInt(w);
}

/** Multiplies two working-precision values, rounding the product back to the working precision. */
function mul(a: bigint, b: bigint, w: number): bigint {
	return bimath.roundShift(a * b, w);
}

/** Divides two working-precision values. The divisor must not be zero. */
function div(a: bigint, b: bigint, w: number): bigint {
	return bimath.roundDivide(a << BigInt(w), b);
}

/**
 * Throws once a loop has run for more iterations than the configuration allows.
 * In practice every series settles in a number of steps proportional to `w`,
 * so reaching the cap means something is broken.
 */
function guardIterations(iteration: number, algorithm: string, w: number): void {
	const maxIterations = getConfig().maxIterations;
	if (iteration <= maxIterations) return;
	const message = `${algorithm} failed to converge after ${maxIterations} iterations at ${w} working bits.`;
	logEventsAndPrint(message, 'errLog.txt');
	throw new ConvergenceError(message);
}

// Square Root ======================================================

/**
 * Square root of a non-negative working-precision value.
 * sqrt(x / 2^w) * 2^w = sqrt(x * 2^w), so a single integer root does it.
 */
function sqrt(x: bigint, w: number): bigint {
	return bimath.roundedSqrt(x << BigInt(w));
}

// Logarithms =======================================================

/**
 * The natural logarithm of a value close to 1, using
 * ln(m) = 2 * atanh(z) = 2 * (z + z^3/3 + z^5/5 + ...), with z = (m - 1) / (m + 1).
 * For m in [√½, √2), |z| < 0.172, so every term gains more than 2.5 bits.
 */
function lnSeries(m: bigint, w: number): bigint {
	const unit = one(w);
	const z = div(m - unit, m + unit, w);
	const z2 = mul(z, z, w);

	let sum = ZERO;
	let power = z; // z^(2n+1)
	for (let n = 0; ; n++) {
		guardIterations(n, 'ln series', w);
		const term = bimath.roundDivide(power, BigInt(2 * n + 1));
		if (term === ZERO) break;
		sum += term;
		power = mul(power, z2, w);
	}
	return sum << ONE;
}

/**
 * Splits a positive working-precision value into x = m * 2^k,
 * with m in [√½, √2) so the log series converges as fast as it can.
 */
function reduceByPowersOfTwo(x: bigint, w: number): { m: bigint; k: number } {
	const unit = one(w);
	// First place m in [1, 2)
	let k = bimath.bitLength(x) - 1 - w;
	let m = bimath.roundShift(x, k);
	// Then fold the upper half of that range down, onto [√½, 1).
	if (m * m > (unit * unit) << ONE) {
		k++;
		m = bimath.roundShift(x, k);
	}
	return { m, k };
}

/** Natural logarithm of a positive working-precision value. */
function ln(x: bigint, w: number, constants: ConstantSource): bigint {
	const { m, k } = reduceByPowersOfTwo(x, w);
	const lnM = lnSeries(m, w);
	if (k === 0) return lnM;

	// k * ln2 magnifies the error in ln2, so ask for ln2 with bits to spare.
	const kBigInt = BigInt(k);
	const extra = bimath.bitLength(kBigInt);
	const ln2 = constants.constant('ln2', w + extra);
	return lnM + bimath.roundShift(kBigInt * ln2, extra);
}

/** Base-2 logarithm of a positive working-precision value. Exact for powers of two. */
function log2(x: bigint, w: number, constants: ConstantSource): bigint {
	const { m, k } = reduceByPowersOfTwo(x, w);
	const whole = BigInt(k) << BigInt(w);
	const lnM = lnSeries(m, w);
	if (lnM === ZERO) return whole;
	return whole + div(lnM, constants.constant('ln2', w), w);
}

/** ln(2) computed from scratch, with no help from the constant cache. */
function computeLn2(w: number): bigint {
	return lnSeries(one(w) << ONE, w);
}

// Exponential ======================================================

/** e^r by its Taylor series. Intended for |r| <= ln(2) / 2, but correct for any small r. */
function expSeries(r: bigint, w: number): bigint {
	const unit = one(w);
	let sum = unit;
	let term = unit;
	for (let n = 1; ; n++) {
		guardIterations(n, 'exp series', w);
		term = bimath.roundDivide(mul(term, r, w), BigInt(n));
		if (term === ZERO) break;
		sum += term;
	}
	return sum;
}

/**
 * e^x of a working-precision value.
 * x = k * ln2 + r, with k the nearest integer to x / ln2, so e^x = 2^k * e^r.
 * The result carries the same number of fraction bits, so callers that
 * need e^x to a fixed absolute precision must widen `w` by about k bits first.
 */
function exp(x: bigint, w: number, constants: ConstantSource): bigint {
	if (x === ZERO) return one(w);

	const k = bimath.roundDivide(x, constants.constant('ln2', w));
	let r = x;
	if (k !== ZERO) {
		const extra = bimath.bitLength(k) + 1;
		const ln2 = constants.constant('ln2', w + extra);
		r = x - bimath.roundShift(k * ln2, extra);
	}
	return bimath.roundShift(expSeries(r, w), -Number(k));
}

/** Euler's number computed from scratch. */
function computeE(w: number): bigint {
	return expSeries(one(w), w);
}

// Trigonometry =====================================================

/** sin(a) by its Taylor series. Intended for |a| <= π/4. */
function sinSeries(a: bigint, w: number): bigint {
	const a2 = mul(a, a, w);
	let sum = a;
	let term = a;
	for (let i = 1; ; i++) {
		guardIterations(i, 'sine series', w);
		term = -bimath.roundDivide(mul(term, a2, w), BigInt(2 * i * (2 * i + 1)));
		if (term === ZERO) break;
		sum += term;
	}
	return sum;
}

/** cos(a) by its Taylor series. Intended for |a| <= π/4. */
function cosSeries(a: bigint, w: number): bigint {
	const a2 = mul(a, a, w);
	let sum = one(w);
	let term = sum;
	for (let i = 1; ; i++) {
		guardIterations(i, 'cosine series', w);
		term = -bimath.roundDivide(mul(term, a2, w), BigInt((2 * i - 1) * 2 * i));
		if (term === ZERO) break;
		sum += term;
	}
	return sum;
}

/**
 * Reduces an angle to x = n * (π/2) + a, with a in [-π/4, π/4].
 * The returned quadrant is n mod 4.
 */
function reduceAngle(x: bigint, w: number, constants: ConstantSource): { a: bigint; quadrant: number } {
	const n = bimath.roundDivide(x << ONE, constants.constant('pi', w));
	if (n === ZERO) return { a: x, quadrant: 0 };

	// n * π/2 magnifies the error in π, so ask for π with bits to spare.
	const extra = bimath.bitLength(n) + 1;
	const pi = constants.constant('pi', w + extra);
	const a = x - bimath.roundShift(n * pi, extra + 1);
	return { a, quadrant: Number(bimath.floorMod(n, FOUR)) };
}

/** Sine of a working-precision angle in radians. */
function sin(x: bigint, w: number, constants: ConstantSource): bigint {
	const { a, quadrant } = reduceAngle(x, w, constants);
	switch (quadrant) {
		case 0: return sinSeries(a, w);
		case 1: return cosSeries(a, w);
		case 2: return -sinSeries(a, w);
		default: return -cosSeries(a, w);
	}
}

/** Cosine of a working-precision angle in radians. */
function cos(x: bigint, w: number, constants: ConstantSource): bigint {
	const { a, quadrant } = reduceAngle(x, w, constants);
	switch (quadrant) {
		case 0: return cosSeries(a, w);
		case 1: return -sinSeries(a, w);
		case 2: return -cosSeries(a, w);
		default: return sinSeries(a, w);
	}
}

/** Sine and cosine of a working-precision angle, sharing one range reduction. */
function sincos(x: bigint, w: number, constants: ConstantSource): [bigint, bigint] {
	const { a, quadrant } = reduceAngle(x, w, constants);
	const s = sinSeries(a, w);
	const c = cosSeries(a, w);
	switch (quadrant) {
		case 0: return [s, c];
		case 1: return [c, -s];
		case 2: return [-s, -c];
		default: return [-c, s];
	}
}

// Inverse Trigonometry =============================================

/** atan(t) by its alternating series. Intended for |t| <= tan(π/8). */
function atanSeries(t: bigint, w: number): bigint {
	const t2 = mul(t, t, w);
	let sum = t;
	let power = t; // ±t^(2i+1)
	for (let i = 1; ; i++) {
		guardIterations(i, 'arctangent series', w);
		power = -mul(power, t2, w);
		const term = bimath.roundDivide(power, BigInt(2 * i + 1));
		if (term === ZERO) break;
		sum += term;
	}
	return sum;
}

/** tan(π/8) = √2 - 1 at the working precision. */
function tanPiOver8(w: number): bigint {
	return sqrt(one(w) << ONE, w) - one(w);
}

/**
 * Arctangent of a working-precision value, in (-π/2, π/2).
 * The argument is kept small before the series runs:
 * atan(-t) = -atan(t), atan(t) = π/2 - atan(1/t), and atan(t) = 2 * atan(t / (1 + √(1 + t²))).
 */
function atan(x: bigint, w: number, constants: ConstantSource): bigint {
	if (x === ZERO) return ZERO;
	const unit = one(w);

	const negative = x < ZERO;
	let t = bimath.abs(x);
	const reciprocal = t > unit;
	if (reciprocal) t = div(unit, t, w);
	const halved = t > tanPiOver8(w);
	if (halved) t = div(t, unit + sqrt(unit + mul(t, t, w), w), w);

	let angle = atanSeries(t, w);
	if (halved) angle <<= ONE;
	if (reciprocal) angle = bimath.roundShift(constants.constant('pi', w), 1) - angle;
	return negative ? -angle : angle;
}

/**
 * The angle of the point (x, y) from the positive x axis, in (-π, π].
 * Both coordinates share the working precision. They must not both be zero.
 */
function atan2(y: bigint, x: bigint, w: number, constants: ConstantSource): bigint {
	const halfPi = bimath.roundShift(constants.constant('pi', w), 1);
	if (x === ZERO) return y < ZERO ? -halfPi : halfPi;

	const ay = bimath.abs(y);
	const ax = bimath.abs(x);
	let angle = ay <= ax ? atan(div(ay, ax, w), w, constants) : halfPi - atan(div(ax, ay, w), w, constants);
	if (x < ZERO) angle = constants.constant('pi', w) - angle;
	return y < ZERO ? -angle : angle;
}

/**
 * √(1 - x²) for |x| <= 1, formed exactly before the root is taken.
 * This keeps full precision near ±1, where 1 - x² is tiny.
 */
function complement(x: bigint, w: number): bigint {
	return bimath.roundedSqrt((one(w) << BigInt(w)) - x * x);
}

/** Arcsine of a working-precision value in [-1, 1], in [-π/2, π/2]. */
function asin(x: bigint, w: number, constants: ConstantSource): bigint {
	return atan2(x, complement(x, w), w, constants);
}

/** Arccosine of a working-precision value in [-1, 1], in [0, π]. */
function acos(x: bigint, w: number, constants: ConstantSource): bigint {
	return atan2(complement(x, w), x, w, constants);
}

/** π = 8 * atan(√2 - 1), computed from scratch. */
function computePi(w: number): bigint {
	return atanSeries(tanPiOver8(w), w) << BigInt(3);
}

/** Computes a constant from scratch at the requested precision. */
function computeConstant(name: ConstantName, w: number): bigint {
	switch (name) {
		case 'pi': return computePi(w);
		case 'ln2': return computeLn2(w);
		case 'e': return computeE(w);
	}
}

// Exports ====================================================================

export default {
	// Helpers
	one,
	mul,
	div,
	// Square Root
	sqrt,
	// Logarithms
	ln,
	log2,
	// Exponential
	exp,
	// Trigonometry
	sin,
	cos,
	sincos,
	// Inverse Trigonometry
	atan,
	atan2,
	asin,
	acos,
	// Constants
	computeConstant,
};

export type { ConstantName, ConstantSource };
