// src/config/config.ts

/**
 * Engine-wide settings read from the environment.
 *
 * FIXEDPOINT_GUARD_BITS      Extra fractional bits used while evaluating transcendental functions.
 * FIXEDPOINT_MAX_ITERATIONS  Cap on the iterations of any series or Newton loop.
 * FIXEDPOINT_LOG_DIR         Directory for log files. File logging is off when unset.
 */

import * as z from 'zod';

import { ValueError } from '../fixedpoint/errors.js';
import { setLogDirectory } from '../util/logEvents.js';
import { logZodError } from '../util/zodlogger.js';

// Types -------------------------------------------------------------------------------

export type Config = z.infer<typeof configSchema>;

// Variables -----------------------------------------------------------------------------

const DEFAULT_GUARD_BITS = 16;
const DEFAULT_MAX_ITERATIONS = 100_000;

/** Zod schema of the environment variables we care about. Everything else is ignored. */
const envSchema = z.object({
	FIXEDPOINT_GUARD_BITS: z.coerce.number().int().min(0).max(256).default(DEFAULT_GUARD_BITS),
	FIXEDPOINT_MAX_ITERATIONS: z.coerce.number().int().min(1).default(DEFAULT_MAX_ITERATIONS),
	FIXEDPOINT_LOG_DIR: z.string().min(1).optional(),
});

const configSchema = z.strictObject({
	guardBits: z.number().int().min(0).max(256),
	maxIterations: z.number().int().min(1),
	logDir: z.string().min(1).optional(),
});

let currentConfig: Config | undefined;

// Functions -----------------------------------------------------------------------------

/**
 * Parses the engine configuration out of a set of environment variables.
 * @param env - Defaults to `process.env`.
 * @throws {ValueError} If any variable is present but invalid.
 */
function loadConfig(env: Record<string, string | undefined> = process.env): Config {
	const relevant = {
		FIXEDPOINT_GUARD_BITS: env['FIXEDPOINT_GUARD_BITS'],
		FIXEDPOINT_MAX_ITERATIONS: env['FIXEDPOINT_MAX_ITERATIONS'],
		FIXEDPOINT_LOG_DIR: env['FIXEDPOINT_LOG_DIR'],
	};
	const result = envSchema.safeParse(relevant);
	if (!result.success) {
		logZodError(relevant, result.error, 'Invalid fixed-point environment configuration.');
		throw new ValueError(`Invalid fixed-point configuration: ${z.prettifyError(result.error)}`);
	}
	return {
		guardBits: result.data.FIXEDPOINT_GUARD_BITS,
		maxIterations: result.data.FIXEDPOINT_MAX_ITERATIONS,
		logDir: result.data.FIXEDPOINT_LOG_DIR,
	};
}

/** Returns the active configuration, loading it from `process.env` on first use. */
function getConfig(): Config {
	return currentConfig ?? setConfig(loadConfig());
}

/**
 * Replaces the active configuration. Unspecified keys keep their current value.
 * @throws {ValueError} If the merged configuration is invalid.
 */
function setConfig(overrides: Partial<Config>): Config {
	const base: Config = currentConfig ?? {
		guardBits: DEFAULT_GUARD_BITS,
		maxIterations: DEFAULT_MAX_ITERATIONS,
	};
	const merged = { ...base, ...overrides };
	const result = configSchema.safeParse(merged);
	if (!result.success) {
		logZodError(merged, result.error, 'Invalid fixed-point configuration override.');
		throw new ValueError(`Invalid fixed-point configuration: ${z.prettifyError(result.error)}`);
	}
	currentConfig = result.data;
	setLogDirectory(currentConfig.logDir);
	return currentConfig;
}

/** Forgets the active configuration, so the next {@link getConfig} re-reads the environment. */
function resetConfig(): void {
	currentConfig = undefined;
	setLogDirectory(undefined);
}

export { loadConfig, getConfig, setConfig, resetConfig, DEFAULT_GUARD_BITS, DEFAULT_MAX_ITERATIONS };
