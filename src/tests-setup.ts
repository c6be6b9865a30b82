// src/tests-setup.ts

import { vi, afterAll } from 'vitest';

// Stop Console Bloat
// Store the original functions so we can restore them after
const originalLog = console.log;
const originalError = console.error;
const originalWarn = console.warn;
// Redirect console functions to empty functions
console.log = vi.fn();
console.error = vi.fn();
console.warn = vi.fn();

// Mock Logger to prevent file writes
// Whenever any file imports logEvents.js, give it these empty functions instead.
vi.mock('./util/logEvents.js', () => ({
	logEvents: vi.fn(), // Do nothing
	logEventsAndPrint: vi.fn(), // Do nothing
	setLogDirectory: vi.fn(), // Do nothing
	getLogDirectory: vi.fn(() => undefined),
}));

// Restore console functions after tests finish so Vitest can print the summary
afterAll(() => {
	console.log = originalLog;
	console.error = originalError;
	console.warn = originalWarn;
});
