// src/util/zodlogger.ts

import * as z from 'zod';
import { logEvents, logEventsAndPrint } from './logEvents.js';

/**
 * A consistent way of logging every input that failed schema validation,
 * whether environment configuration or Format options.
 * Puts all details in `zodLog.txt`, and a one-liner notifier in `errLog.txt` and in the console.
 * @param input - The raw input that was malformed.
 * @param zodError - The ZodError from the zod result during validation.
 * @param contextMessage - Brief description of where this error occurred. e.g. "Invalid environment configuration."
 */
export function logZodError(input: unknown, zodError: z.ZodError, contextMessage: string): void {
	const treeifiedErrors = JSON.stringify(z.treeifyError(zodError), null, 2);
	const logText = `${contextMessage} - Input:
${JSON.stringify(input, null, 2)}

Zod treeified errors:
${treeifiedErrors}

===================================================================

	`;

	logEvents(logText, 'zodLog.txt');
	logEventsAndPrint(`${contextMessage} Check zodLog.txt for more details.`, 'errLog.txt');
}
