// src/fixedpoint/errors.ts

/**
 * The error taxonomy of the fixed-point engine.
 * Every error is raised by the operation that detects it,
 * and all of them share the {@link FixedPointError} base class.
 */

/** Base class of every error thrown by fixed-point operations. */
class FixedPointError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/** A result or constructed value does not fit the target Format's range. */
class OverflowError extends FixedPointError {}

/** An operand lies outside a function's mathematical domain. */
class DomainError extends FixedPointError {}

/** The divisor's scaled value is zero. */
class DivisionByZeroError extends FixedPointError {}

/** Malformed text, or an argument that is not a valid value of its kind. */
class ValueError extends FixedPointError {}

/** An iterative algorithm did not settle within the configured iteration cap. */
class ConvergenceError extends FixedPointError {}

export {
	FixedPointError,
	OverflowError,
	DomainError,
	DivisionByZeroError,
	ValueError,
	ConvergenceError,
};
