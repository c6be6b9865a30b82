// src/config/config.test.ts

import { describe, it, expect, afterEach, vi } from 'vitest';

import { DEFAULT_GUARD_BITS, DEFAULT_MAX_ITERATIONS, getConfig, loadConfig, resetConfig, setConfig } from './config.js';
import { makeFormat } from '../fixedpoint/format.js';
import { ValueError } from '../fixedpoint/errors.js';
import { logEvents, setLogDirectory } from '../util/logEvents.js';

describe('config', () => {
	afterEach(() => {
		resetConfig();
		vi.unstubAllEnvs();
	});

	describe('loadConfig', () => {
		it('should fall back to the defaults', () => {
			expect(loadConfig({})).toEqual({
				guardBits: DEFAULT_GUARD_BITS,
				maxIterations: DEFAULT_MAX_ITERATIONS,
			});
		});

		it('should read and coerce the environment', () => {
			expect(loadConfig({
				FIXEDPOINT_GUARD_BITS: '24',
				FIXEDPOINT_MAX_ITERATIONS: '500',
				FIXEDPOINT_LOG_DIR: 'logs',
			})).toEqual({ guardBits: 24, maxIterations: 500, logDir: 'logs' });
		});

		it('should reject invalid values and log them', () => {
			expect(() => loadConfig({ FIXEDPOINT_GUARD_BITS: 'abc' })).toThrow(ValueError);
			expect(() => loadConfig({ FIXEDPOINT_MAX_ITERATIONS: '0' })).toThrow(ValueError);
			expect(vi.mocked(logEvents)).toHaveBeenCalledWith(expect.stringContaining('Invalid fixed-point environment configuration.'), 'zodLog.txt');
		});
	});

	describe('getConfig', () => {
		it('should load the process environment on first use', () => {
			vi.stubEnv('FIXEDPOINT_GUARD_BITS', '20');
			expect(getConfig().guardBits).toBe(20);
		});
	});

	describe('setConfig', () => {
		it('should merge overrides into the active configuration', () => {
			setConfig({ guardBits: 8 });
			setConfig({ logDir: 'fx-logs' });
			expect(getConfig()).toEqual({ guardBits: 8, maxIterations: DEFAULT_MAX_ITERATIONS, logDir: 'fx-logs' });
			expect(vi.mocked(setLogDirectory)).toHaveBeenLastCalledWith('fx-logs');
		});

		it('should reject invalid overrides', () => {
			expect(() => setConfig({ maxIterations: 0 })).toThrow(ValueError);
			expect(() => setConfig({ guardBits: 1000 })).toThrow(ValueError);
		});

		it('should supply the guard bits of formats without an override', () => {
			setConfig({ guardBits: 5 });
			expect(makeFormat(8, 8).guardBits).toBe(5);
			expect(makeFormat(8, 8, { guardBits: 2 }).guardBits).toBe(2);
		});
	});
});
