// src/util/logEvents.ts

/**
 * Appends timestamped lines to log files inside the configured log directory.
 *
 * The engine never suspends, so writes are synchronous.
 * When no log directory has been configured, only the console variants print.
 */

import { format } from 'date-fns';
import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';

/** Where log files are written. `undefined` disables file logging. */
let logDirectory: string | undefined;

/** Sets (or clears) the directory log files are appended into. */
function setLogDirectory(dir: string | undefined): void {
	logDirectory = dir === undefined ? undefined : path.resolve(dir);
}

function getLogDirectory(): string | undefined {
	return logDirectory;
}

/**
 * Logs the provided message by appending a line to the end of the specified log file.
 * @param message - The message to log.
 * @param logName - The name of the log file.
 */
function logEvents(message: string, logName: string): void {
	if (!logName) return console.trace('Log name MUST be provided when logging an event!');
	if (logDirectory === undefined) return;

	const dateTime = format(new Date(), 'yyyy/MM/dd  HH:mm:ss');
	const logItem = `${dateTime}   ${message}\n`;

	try {
		mkdirSync(logDirectory, { recursive: true });
		appendFileSync(path.join(logDirectory, logName), logItem);
	} catch (err: unknown) {
		if (err instanceof Error) console.error(`Error logging event: ${err.message}`);
		else console.error('Error logging event:', err);
	}
}

/**
 * Logs the provided message by appending a line to the end of the specified log file,
 * and prints it to the console as an error.
 * @param message - The message to log.
 * @param logName - The name of the log file.
 */
function logEventsAndPrint(message: string, logName: string): void {
	console.error(message);
	logEvents(message, logName);
}

export { logEvents, logEventsAndPrint, setLogDirectory, getLogDirectory };
