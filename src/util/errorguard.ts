// src/util/errorguard.ts

/**
 * Guards the commands of the CLI so a failure is logged
 * to the error log and turned into an exit status.
 */

import { FixedPointError } from '../fixedpoint/errors.js';
import { logEventsAndPrint } from './logEvents.js';

/**
 * Runs a command and logs whatever it throws.
 * @param errorMessage - The first line of the log entry on failure.
 * @returns true if the command finished.
 */
function executeSafely(command: () => void, errorMessage: string): boolean {
	try {
		command();
		return true;
	} catch (e) {
		logEventsAndPrint(`${errorMessage}\n${describeError(e)}`, 'errLog.txt');
		return false;
	}
}

/**
 * Engine errors are outcomes of the input, such as an overflow, so their message is enough.
 * Anything else is logged with its stack.
 */
function describeError(e: unknown): string {
	if (e instanceof FixedPointError) return `${e.name}: ${e.message}`;
	if (e instanceof Error) return e.stack ?? `${e.name}: ${e.message}`;
	return `Thrown value is not an Error: ${String(e)}`;
}

export { executeSafely };
