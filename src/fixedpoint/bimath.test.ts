// src/fixedpoint/bimath.test.ts

import { describe, it, expect } from 'vitest';

import bimath from './bimath.js';

describe('bimath', () => {
	describe('bitLength', () => {
		it('should measure the magnitude in bits', () => {
			expect(bimath.bitLength(0n)).toBe(0);
			expect(bimath.bitLength(1n)).toBe(1);
			expect(bimath.bitLength(255n)).toBe(8);
			expect(bimath.bitLength(256n)).toBe(9);
			expect(bimath.bitLength(-256n)).toBe(9);
			expect(bimath.bitLength(1n << 100n)).toBe(101);
		});
	});

	describe('roundShift', () => {
		it('should round halves away from zero', () => {
			expect(bimath.roundShift(1n, 1)).toBe(1n); // 0.5
			expect(bimath.roundShift(-1n, 1)).toBe(-1n); // -0.5
			expect(bimath.roundShift(3n, 1)).toBe(2n); // 1.5
			expect(bimath.roundShift(5n, 1)).toBe(3n); // 2.5
			expect(bimath.roundShift(-5n, 1)).toBe(-3n); // -2.5
		});

		it('should round below half toward zero', () => {
			expect(bimath.roundShift(5n, 2)).toBe(1n); // 1.25
			expect(bimath.roundShift(-5n, 2)).toBe(-1n);
		});

		it('should shift left exactly for a non-positive shift', () => {
			expect(bimath.roundShift(3n, -2)).toBe(12n);
			expect(bimath.roundShift(-3n, 0)).toBe(-3n);
		});
	});

	describe('roundDivide', () => {
		it('should round the quotient half away from zero', () => {
			expect(bimath.roundDivide(7n, 2n)).toBe(4n);
			expect(bimath.roundDivide(-7n, 2n)).toBe(-4n);
			expect(bimath.roundDivide(7n, -2n)).toBe(-4n);
			expect(bimath.roundDivide(5n, 3n)).toBe(2n);
			expect(bimath.roundDivide(4n, 3n)).toBe(1n);
		});
	});

	describe('floorMod', () => {
		it('should give the remainder the sign of the divisor', () => {
			expect(bimath.floorMod(-7n, 3n)).toBe(2n);
			expect(bimath.floorMod(7n, -3n)).toBe(-2n);
			expect(bimath.floorMod(7n, 3n)).toBe(1n);
			expect(bimath.floorMod(6n, -3n)).toBe(0n);
		});
	});

	describe('isqrt', () => {
		it('should return the floor of the square root', () => {
			expect(bimath.isqrt(0n)).toBe(0n);
			expect(bimath.isqrt(1n)).toBe(1n);
			expect(bimath.isqrt(15n)).toBe(3n);
			expect(bimath.isqrt(16n)).toBe(4n);
			expect(bimath.isqrt(10n ** 40n)).toBe(10n ** 20n);
			expect(bimath.isqrt(10n ** 40n - 1n)).toBe(10n ** 20n - 1n);
		});

		it('should reject negative input', () => {
			expect(() => bimath.isqrt(-1n)).toThrow(RangeError);
		});
	});

	describe('roundedSqrt', () => {
		it('should round the square root to the nearest integer', () => {
			expect(bimath.roundedSqrt(2n)).toBe(1n);
			expect(bimath.roundedSqrt(3n)).toBe(2n);
			expect(bimath.roundedSqrt(6n)).toBe(2n);
			expect(bimath.roundedSqrt(7n)).toBe(3n);
		});
	});

	describe('intPower', () => {
		it('should raise to non-negative powers', () => {
			expect(bimath.intPower(3n, 4n)).toBe(81n);
			expect(bimath.intPower(-2n, 3n)).toBe(-8n);
			expect(bimath.intPower(5n, 0n)).toBe(1n);
			expect(bimath.intPower(2n, 100n)).toBe(1n << 100n);
		});

		it('should reject negative exponents', () => {
			expect(() => bimath.intPower(2n, -1n)).toThrow(RangeError);
		});
	});

	describe('roundedPower', () => {
		it('should be exact while the power fits the precision', () => {
			expect(bimath.roundedPower(3n, 4n, 64)).toEqual({ mantissa: 81n, exponent: 0n });
			expect(bimath.roundedPower(7n, 0n, 8)).toEqual({ mantissa: 1n, exponent: 0n });
		});

		it('should keep only the leading bits of larger powers', () => {
			expect(bimath.roundedPower(2n, 100n, 8)).toEqual({ mantissa: 128n, exponent: 93n });
			// 3^100 = 46220.65... · 2^143
			expect(bimath.roundedPower(3n, 100n, 16)).toEqual({ mantissa: 46221n, exponent: 143n });
		});

		it('should reject non-positive bases and negative exponents', () => {
			expect(() => bimath.roundedPower(0n, 2n, 16)).toThrow(RangeError);
			expect(() => bimath.roundedPower(2n, -1n, 16)).toThrow(RangeError);
		});
	});

	describe('comparisons', () => {
		it('should order bigints', () => {
			expect(bimath.compare(1n, 2n)).toBe(-1);
			expect(bimath.compare(2n, 2n)).toBe(0);
			expect(bimath.sign(-9n)).toBe(-1);
			expect(bimath.min(-3n, 2n)).toBe(-3n);
			expect(bimath.max(-3n, 2n)).toBe(2n);
			expect(bimath.abs(-3n)).toBe(3n);
		});
	});
});
