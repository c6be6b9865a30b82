// src/util/zodlogger.test.ts

import { describe, it, expect, vi } from 'vitest';
import * as z from 'zod';

import { logZodError } from './zodlogger.js';
import { logEvents, logEventsAndPrint } from './logEvents.js';

describe('logZodError', () => {
	it('should log the details and a one-line notice', () => {
		const result = z.strictObject({ bits: z.number() }).safeParse({ bits: 'eight' });
		expect(result.success).toBe(false);
		if (result.success) return;

		logZodError({ bits: 'eight' }, result.error, 'Bad bits.');
		expect(vi.mocked(logEvents)).toHaveBeenCalledWith(expect.stringContaining('Bad bits. - Input:'), 'zodLog.txt');
		expect(vi.mocked(logEventsAndPrint)).toHaveBeenCalledWith('Bad bits. Check zodLog.txt for more details.', 'errLog.txt');
	});
});
