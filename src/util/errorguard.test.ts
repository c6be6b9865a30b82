// src/util/errorguard.test.ts

import { describe, it, expect, vi } from 'vitest';

import { executeSafely } from './errorguard.js';
import { logEventsAndPrint } from './logEvents.js';
import { OverflowError } from '../fixedpoint/errors.js';

describe('executeSafely', () => {
	it('should report success', () => {
		const command = vi.fn();
		expect(executeSafely(command, 'unused')).toBe(true);
		expect(command).toHaveBeenCalledOnce();
	});

	it('should log the stack of an unexpected error and report failure', () => {
		const result = executeSafely(() => {
			throw new Error('nope');
		}, 'boom failed.');
		expect(result).toBe(false);
		expect(vi.mocked(logEventsAndPrint)).toHaveBeenCalledWith(expect.stringContaining('boom failed.\nError: nope\n    at '), 'errLog.txt');
	});

	it('should log only the message of an engine error', () => {
		const result = executeSafely(() => {
			throw new OverflowError('too big');
		}, 'fxdemo overflow failed.');
		expect(result).toBe(false);
		expect(vi.mocked(logEventsAndPrint)).toHaveBeenCalledWith('fxdemo overflow failed.\nOverflowError: too big', 'errLog.txt');
	});

	it('should log values that are not errors', () => {
		executeSafely(() => {
			throw 'text';
		}, 'odd failure.');
		expect(vi.mocked(logEventsAndPrint)).toHaveBeenCalledWith('odd failure.\nThrown value is not an Error: text', 'errLog.txt');
	});
});
