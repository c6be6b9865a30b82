// src/fixedpoint/index.ts

/**
 * The public surface of the fixed-point engine.
 */

export { Format, makeFormat, MAX_FORMAT_BITS } from './format.js';
export { FixedNum } from './fixednum.js';
export {
	FixedPointError,
	OverflowError,
	DomainError,
	DivisionByZeroError,
	ValueError,
	ConvergenceError,
} from './errors.js';
export { default as fxstring } from './fxstring.js';

export type { FormatOptions } from './format.js';
export type { Operand } from './fixednum.js';
export type { ConstantName } from './fxmath.js';
