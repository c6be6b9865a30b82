// src/fixedpoint/fxstring.ts

/**
 * Text conversions of scaled integers: decimal parsing and printing,
 * base 2, 8 and 16 renderings, and the canonical repr format.
 *
 * Works on raw scaled bigints plus their fraction bit count,
 * so it has no knowledge of Formats or FixedNums.
 */

import bimath from './bimath.js';
import { ValueError } from './errors.js';

// Types ========================================================

/** A decimal string as an exact fraction. The denominator is always positive. */
interface Rational {
	numerator: bigint;
	denominator: bigint;
}

/** The pieces recovered from a repr string. */
interface ReprParts {
	scaledValue: bigint;
	integerBits: number | null;
	fractionBits: number;
}

// Constants ========================================================

const ZERO: bigint = 0n;
const ONE: bigint = 1n;
const TEN: bigint = 10n;

/** The base 10 logarithm of 2. */
const LOG10_2: number = Math.log10(2);

/** Decimal exponents beyond this are rejected rather than expanded into enormous bigints. */
const MAX_DECIMAL_EXPONENT = 100_000;

/** Sign, integer digits, optional fraction, optional exponent. */
const DECIMAL_REGEX = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

const REPR_REGEX = /^FixedNum\(\[(-?\d+)\],\s*Format\((\*|\d+),\s*(\d+)\)\)$/;

/** Bits represented by one digit of each supported radix. */
const BITS_PER_DIGIT: Record<2 | 8 | 16, number> = { 2: 1, 8: 3, 16: 4 };

// Parsing ============================================================

/**
 * Parses a decimal string into an exact fraction.
 * Accepts an optional sign, digits with an optional decimal point,
 * and an optional exponent. Surrounding whitespace is ignored.
 * @throws {ValueError} If the text is not a decimal number.
 */
function parseDecimal(text: string): Rational {
	const match = DECIMAL_REGEX.exec(text.trim());
	const intDigits = match?.[2] ?? '';
	const fracDigits = match?.[3] ?? '';
	if (match === null || intDigits.length + fracDigits.length === 0) throw new ValueError(`Cannot parse "${text}" as a decimal number.`);

	const exponent = match[4] === undefined ? 0 : Number(match[4]);
	if (Math.abs(exponent) > MAX_DECIMAL_EXPONENT) throw new ValueError(`The exponent of "${text}" exceeds the limit of ${MAX_DECIMAL_EXPONENT}.`);

	let numerator = BigInt(intDigits + fracDigits);
	if (match[1] === '-') numerator = -numerator;
	let denominator = TEN ** BigInt(fracDigits.length);

	if (exponent > 0) numerator *= TEN ** BigInt(exponent);
	else if (exponent < 0) denominator *= TEN ** BigInt(-exponent);

	return { numerator, denominator };
}

// Decimal ============================================================

/**
 * How many decimal places it takes for the last printed digit to be
 * no coarser than the last fraction bit, so printed values parse back unchanged.
 * Each bit is worth about 0.301 decimal digits.
 */
function defaultDecimalDigits(fractionBits: number): number {
	return Math.ceil(fractionBits * LOG10_2);
}

/**
 * Renders a scaled integer in decimal, rounded half away from zero
 * to a fixed number of decimal places. Trailing zeros are kept.
 * @param precision - Decimal places. Defaults to {@link defaultDecimalDigits}.
 */
function toDecimalString(scaled: bigint, fractionBits: number, precision?: number): string {
	const digits = precision ?? defaultDecimalDigits(fractionBits);
	if (!Number.isSafeInteger(digits) || digits < 0) throw new ValueError(`Decimal precision must be a non-negative integer. Received: ${digits}`);

	const power = TEN ** BigInt(digits);
	const rounded = bimath.roundShift(bimath.abs(scaled) * power, fractionBits);
	// A value that rounds to zero prints without a sign.
	const sign = scaled < ZERO && rounded !== ZERO ? '-' : '';
	const integerPart = (rounded / power).toString();
	if (digits === 0) return sign + integerPart;
	const fractionPart = (rounded % power).toString().padStart(digits, '0');
	return `${sign}${integerPart}.${fractionPart}`;
}

/**
 * Renders the exact decimal expansion of a scaled integer.
 * Dividing by 2^f terminates after at most f decimal places,
 * since s / 2^f = s · 5^f / 10^f.
 */
function toExactString(scaled: bigint, fractionBits: number): string {
	const sign = scaled < ZERO ? '-' : '';
	const expanded = bimath.abs(scaled) * 5n ** BigInt(fractionBits);
	const power = TEN ** BigInt(fractionBits);
	const integerPart = (expanded / power).toString();
	const fractionPart = (expanded % power).toString().padStart(fractionBits, '0').replace(/0+$/, '');
	if (fractionPart === '') return sign + integerPart;
	return `${sign}${integerPart}.${fractionPart}`;
}

// Radix ==============================================================

/**
 * Renders a scaled integer in base 2, 8 or 16 with a radix point.
 * Fraction digits are padded on the right to whole digits.
 * @param totalBits - The Format's total width, or `null` when unbounded.
 * @param signed - When true, a minus sign and the magnitude. When false,
 * the two's complement pattern of the full width, which requires a bounded Format.
 * @throws {ValueError} For an unsigned rendering of an unbounded Format.
 */
function toRadixString(scaled: bigint, fractionBits: number, totalBits: number | null, radix: 2 | 8 | 16, signed: boolean): string {
	const bitsPerDigit = BITS_PER_DIGIT[radix];
	const fractionDigits = Math.ceil(fractionBits / bitsPerDigit);
	const padBits = BigInt(fractionDigits * bitsPerDigit - fractionBits);

	let sign = '';
	let pattern: bigint;
	let integerDigits = 1;
	if (signed) {
		if (scaled < ZERO) sign = '-';
		pattern = bimath.abs(scaled);
	} else {
		if (totalBits === null) throw new ValueError('An unsigned rendering needs a bounded Format.');
		pattern = scaled < ZERO ? scaled + (ONE << BigInt(totalBits)) : scaled;
		integerDigits = Math.max(1, Math.ceil((totalBits - fractionBits) / bitsPerDigit));
	}

	const digits = (pattern << padBits).toString(radix).padStart(integerDigits + fractionDigits, '0');
	const split = digits.length - fractionDigits;
	if (fractionDigits === 0) return sign + digits;
	return `${sign}${digits.slice(0, split)}.${digits.slice(split)}`;
}

// Repr ===============================================================

/** The canonical machine-readable text of a fixed-point value. */
function toRepr(scaled: bigint, integerBits: number | null, fractionBits: number): string {
	return `FixedNum([${scaled}], Format(${integerBits ?? '*'}, ${fractionBits}))`;
}

/**
 * Recovers the pieces of a value from the text of {@link toRepr}.
 * @throws {ValueError} If the text is not in the repr format.
 */
function parseRepr(text: string): ReprParts {
	const match = REPR_REGEX.exec(text.trim());
	if (match === null) throw new ValueError(`Cannot parse "${text}" as a FixedNum repr.`);
	const [, scaled = '', integerBits = '', fractionBits = ''] = match;
	return {
		scaledValue: BigInt(scaled),
		integerBits: integerBits === '*' ? null : Number(integerBits),
		fractionBits: Number(fractionBits),
	};
}

// Exports ============================================================

export default {
	// Parsing
	parseDecimal,
	// Decimal
	defaultDecimalDigits,
	toDecimalString,
	toExactString,
	// Radix
	toRadixString,
	// Repr
	toRepr,
	parseRepr,
};

export type { Rational, ReprParts };
