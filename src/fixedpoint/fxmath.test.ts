// src/fixedpoint/fxmath.test.ts

import { describe, it, expect, afterEach } from 'vitest';

import fxmath from './fxmath.js';
import { makeFormat } from './format.js';
import { ConvergenceError, DomainError, OverflowError } from './errors.js';
import { resetConfig, setConfig } from '../config/config.js';

import type { FixedNum } from './fixednum.js';

const q8 = makeFormat(8, 8);
const q16 = makeFormat(null, 16);
const ONE_16 = 1n << 16n;

/** Distance between two values in units of the last place of q16. */
function ulps(value: FixedNum, scaled: bigint): number {
	return Math.abs(Number(value.scaledValue - scaled));
}

describe('fxmath', () => {
	afterEach(() => {
		resetConfig();
	});

	describe('sqrt', () => {
		it('should be exact for perfect squares', () => {
			expect(q8.fromInt(4).sqrt().scaledValue).toBe(512n);
			expect(q8.fromNumber(0.25).sqrt().scaledValue).toBe(128n);
			expect(q8.fromInt(0).sqrt().scaledValue).toBe(0n);
		});

		it('should round to the nearest representable root', () => {
			expect(q16.fromInt(2).sqrt().scaledValue).toBe(92682n);
			expect(q16.fromInt(2).sqrt(makeFormat(null, 4)).scaledValue).toBe(23n);
		});

		it('should reject negative input', () => {
			expect(() => q16.fromInt(-1).sqrt()).toThrow(DomainError);
		});
	});

	describe('ln and log2', () => {
		it('should be exact for powers of two in base 2', () => {
			expect(q16.fromInt(8).log2().scaledValue).toBe(3n * ONE_16);
			expect(q16.fromNumber(0.5).log2().scaledValue).toBe(-ONE_16);
			expect(q16.fromInt(1).log2().scaledValue).toBe(0n);
		});

		it('should compute logarithms to the resolution of the format', () => {
			expect(q16.fromInt(3).log2().scaledValue).toBe(103872n);
			expect(q16.fromInt(10).ln().scaledValue).toBe(150902n);
			expect(q16.fromNumber(0.5).ln().scaledValue).toBe(-45426n);
			expect(q16.fromInt(1).ln().scaledValue).toBe(0n);
		});

		it('should reject non-positive input', () => {
			expect(() => q16.fromInt(0).ln()).toThrow(DomainError);
			expect(() => q16.fromInt(-2).log2()).toThrow(DomainError);
		});
	});

	describe('exp', () => {
		it('should compute exponentials to the resolution of the format', () => {
			expect(q16.fromInt(0).exp().scaledValue).toBe(ONE_16);
			expect(q16.fromInt(1).exp().scaledValue).toBe(178145n);
			expect(q16.fromNumber(1.5).exp().scaledValue).toBe(293712n);
			expect(q16.fromInt(-1).exp().scaledValue).toBe(24109n);
		});

		it('should overflow bounded formats rather than wrap', () => {
			const q4 = makeFormat(4, 8);
			expect(q4.fromInt(2).exp().scaledValue).toBe(1892n);
			expect(() => q4.fromNumber(2.1).exp()).toThrow(OverflowError);
			expect(() => q8.fromInt(100).exp()).toThrow(OverflowError);
		});

		it('should underflow to zero', () => {
			expect(q8.fromInt(-30).exp().scaledValue).toBe(0n);
		});

		it('should invert ln', () => {
			const x = q16.fromNumber(3.25);
			expect(ulps(x.ln().exp(), x.scaledValue)).toBeLessThanOrEqual(4);
		});
	});

	describe('sin, cos and tan', () => {
		it('should compute the trigonometric functions', () => {
			expect(q16.fromInt(0).sin().scaledValue).toBe(0n);
			expect(q16.fromInt(0).cos().scaledValue).toBe(ONE_16);
			expect(q16.fromNumber(0.5).sin().scaledValue).toBe(31420n);
			expect(q16.fromInt(1).cos().scaledValue).toBe(35409n);
			expect(q16.fromInt(-10).sin().scaledValue).toBe(35653n);
			expect(q16.fromInt(100).cos().scaledValue).toBe(56513n);
			expect(q16.fromInt(1).tan().scaledValue).toBe(102066n);
		});

		it('should agree between sincos and the separate functions', () => {
			for (const angle of [0.3, 2, 3, -4, 10]) {
				const x = q16.fromNumber(angle);
				const [s, c] = x.sincos();
				expect(s.scaledValue).toBe(x.sin().scaledValue);
				expect(c.scaledValue).toBe(x.cos().scaledValue);
			}
		});

		it('should keep sin² + cos² within a few places of 1', () => {
			for (const angle of [0.3, 1, 2, 3, -4, 10, 100]) {
				const [s, c] = q16.fromNumber(angle).sincos();
				const sum = s.scaledValue * s.scaledValue + c.scaledValue * c.scaledValue;
				expect(Math.abs(Number(sum - ONE_16 * ONE_16))).toBeLessThanOrEqual(3 * 65536);
			}
		});

		it('should vanish at π', () => {
			expect(q16.getPi().sin().scaledValue).toBe(0n);
		});

		it('should add working bits until the cosine is nonzero', () => {
			expect(makeFormat(null, 0).fromInt(0).tan().scaledValue).toBe(0n);
			expect(makeFormat(null, 0, { guardBits: 0 }).fromInt(2).tan().scaledValue).toBe(-2n);
			expect(q16.fromInt(2).tan().scaledValue).toBe(-143199n);
		});
	});

	describe('inverse trigonometry', () => {
		it('should compute asin and acos', () => {
			expect(q16.fromInt(1).asin().scaledValue).toBe(102944n);
			expect(q16.fromNumber(0.5).asin().scaledValue).toBe(34315n);
			expect(q16.fromInt(-1).acos().scaledValue).toBe(205887n);
			expect(q16.fromInt(1).acos().scaledValue).toBe(0n);
			expect(q16.fromNumber(0.5).acos().scaledValue).toBe(68629n);
		});

		it('should reject arguments outside [-1, 1]', () => {
			expect(() => q16.fromNumber(1.5).asin()).toThrow(DomainError);
			expect(() => q16.fromNumber(-1.01).acos()).toThrow(DomainError);
		});

		it('should compute atan', () => {
			expect(q16.fromInt(1).atan().scaledValue).toBe(51472n);
			expect(q16.fromInt(-1).atan().scaledValue).toBe(-51472n);
			expect(q16.fromNumber(0.25).atan().scaledValue).toBe(16055n);
			expect(q16.fromInt(1000).atan().scaledValue).toBe(102878n);
		});

		it('should place atan2 in the right quadrant', () => {
			expect(q16.fromInt(1).atan2(-1).scaledValue).toBe(154416n);
			expect(q16.fromInt(-1).atan2(-1).scaledValue).toBe(-154416n);
			expect(q16.fromInt(0).atan2(-1).scaledValue).toBe(205887n);
			expect(q16.fromInt(-1).atan2(0).scaledValue).toBe(-102944n);
		});

		it('should reject atan2 at the origin', () => {
			expect(() => q16.fromInt(0).atan2(0)).toThrow(DomainError);
		});

		it('should overflow when the angle does not fit', () => {
			expect(() => makeFormat(1, 8).fromInt(-1).acos()).toThrow(OverflowError);
		});
	});

	describe('computeConstant', () => {
		it('should agree with the cached constants', () => {
			const format = makeFormat(null, 16);
			expect(fxmath.computeConstant('pi', 26)).toBe(210828720n);
			expect(format.constant('ln2', 16)).toBe(45426n);
		});
	});

	describe('iteration cap', () => {
		it('should throw once a series exceeds the configured iterations', () => {
			setConfig({ maxIterations: 1 });
			expect(() => makeFormat(null, 16).fromInt(1).exp()).toThrow(ConvergenceError);
		});
	});
});
