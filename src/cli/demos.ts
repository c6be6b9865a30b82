// src/cli/demos.ts

/**
 * Demonstrations of the fixed-point engine.
 * Each returns the lines it would print, so the CLI and the tests share them.
 */

import { makeFormat, OverflowError } from '../fixedpoint/index.js';

import type { FixedNum } from '../fixedpoint/index.js';

/** Roots and exponentials at several resolutions. */
function basicDemo(resolutions: readonly number[] = [8, 32, 80, 274]): string[] {
	const lines: string[] = [];
	for (const resolution of resolutions) {
		const format = makeFormat(null, resolution);
		const root = format.fromInt(2).sqrt();
		lines.push(
			`=== ${resolution} bits ===`,
			`sqrt(2) ~ ${root.toString()}`,
			`sqrt(2)^2 ~ ${root.mul(root).toString()}`,
			`exp(1) ~ ${format.fromInt(1).exp().toString()}`,
			'',
		);
	}
	return lines;
}

/** How the width of the integer part limits the exponential. */
function overflowDemo(fractionBits = 20, integerSizes: readonly number[] = [4, 8, 16, 32, 64]): string[] {
	const lines = [`=== ${fractionBits}-bit fractional part ===`];
	for (const integerBits of integerSizes) {
		const format = makeFormat(integerBits, fractionBits);
		const step = format.fromNumber(0.1);
		let x = format.fromInt(0);
		while (true) {
			try {
				x.exp();
			} catch (e) {
				if (!(e instanceof OverflowError)) throw e;
				lines.push(`${String(integerBits).padStart(2)}-bit integer part: exp(x) overflows at x=${x.toDecimalString(1)}`);
				break;
			}
			x = x.add(step);
		}
	}
	lines.push('');
	return lines;
}

/** π as 4·atan(1) at every resolution up to `maxBits`, and how many of its bits are correct. */
function accuracyDemo(minBits = 4, maxBits = 200): string[] {
	// The reference needs comfortably more bits than anything it is compared against.
	const reference = makeFormat(null, maxBits + Math.floor(maxBits / 4) + 20);
	const truePi = reference.fromInt(4).mul(reference.fromInt(1).atan());

	const lines: string[] = [];
	for (let bits = minBits; bits <= maxBits; bits++) {
		const format = makeFormat(null, bits);
		const pi: FixedNum = format.fromInt(4).mul(format.fromInt(1).atan());
		const delta = pi.convert(reference).sub(truePi).abs();
		const accuracy = delta.isZero() ? 'exact' : delta.log2().neg().toDecimalString(2);
		lines.push(`${bits} ${accuracy}`);
	}
	return lines;
}

/**
 * The logistic map x <- λ·x·(1 - x), three operations per step,
 * timed at several resolutions.
 * @param now - Millisecond clock. Defaults to `performance.now()`.
 */
function speedDemo(resolutions: readonly number[] = [16, 32, 64, 128, 256, 512], count = 10_000, now: () => number = () => performance.now()): string[] {
	const lines = ['=== speed test ==='];
	for (const resolution of resolutions) {
		const format = makeFormat(null, resolution);
		const lambda = format.fromNumber(3.6);
		const one = format.fromInt(1);
		let x = format.fromNumber(0.5);

		const start = now();
		for (let i = 0; i < count; i++) {
			// Chaotic region of the logistic map
			x = lambda.mul(x).mul(one.sub(x));
		}
		const seconds = (now() - start) / 1000;

		const ops = count * 3;
		const rate = seconds > 0 ? (ops / seconds).toPrecision(2) : 'n/a';
		lines.push(`${ops} ${resolution}-bit operations in ${seconds.toFixed(2)}s ~ ${rate} ops/s`);
	}
	return lines;
}

export { basicDemo, overflowDemo, accuracyDemo, speedDemo };
