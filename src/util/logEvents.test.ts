// src/util/logEvents.test.ts

import { mkdtempSync, readFileSync, rmSync, existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

// The shared setup mocks this module everywhere else.
const { logEvents, logEventsAndPrint, setLogDirectory, getLogDirectory } = await vi.importActual<typeof import('./logEvents.js')>('./logEvents.js');

describe('logEvents', () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(path.join(os.tmpdir(), 'fx-log-'));
		vi.useFakeTimers();
		vi.setSystemTime(new Date(2024, 0, 2, 3, 4, 5));
	});

	afterEach(() => {
		vi.useRealTimers();
		setLogDirectory(undefined);
		rmSync(dir, { recursive: true, force: true });
	});

	it('should append timestamped lines to the named log', () => {
		setLogDirectory(dir);
		logEvents('first', 'errLog.txt');
		logEvents('second', 'errLog.txt');
		expect(readFileSync(path.join(dir, 'errLog.txt'), 'utf8')).toBe('2024/01/02  03:04:05   first\n2024/01/02  03:04:05   second\n');
	});

	it('should create the log directory when missing', () => {
		const nested = path.join(dir, 'nested');
		setLogDirectory(nested);
		expect(getLogDirectory()).toBe(nested);
		logEvents('hello', 'zodLog.txt');
		expect(existsSync(path.join(nested, 'zodLog.txt'))).toBe(true);
	});

	it('should write nothing without a log directory', () => {
		logEvents('ignored', 'errLog.txt');
		expect(getLogDirectory()).toBeUndefined();
		expect(existsSync(path.join(dir, 'errLog.txt'))).toBe(false);
	});

	it('should print and log', () => {
		setLogDirectory(dir);
		logEventsAndPrint('printed', 'errLog.txt');
		expect(vi.mocked(console.error)).toHaveBeenCalledWith('printed');
		expect(readFileSync(path.join(dir, 'errLog.txt'), 'utf8')).toBe('2024/01/02  03:04:05   printed\n');
	});
});
