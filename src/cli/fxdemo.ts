#!/usr/bin/env node
// src/cli/fxdemo.ts

/**
 * Command-line entry point of the demonstrations.
 *
 * Usage: fxdemo <basic|overflow|accuracy|speed> [options]
 */

import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { accuracyDemo, basicDemo, overflowDemo, speedDemo } from './demos.js';
import { getConfig } from '../config/config.js';
import { executeSafely } from '../util/errorguard.js';

/** Prints the lines of one demo. A failure is logged and sets a nonzero exit code. */
function run(name: string, demo: () => string[]): void {
	const success = executeSafely(() => {
		getConfig(); // Validate the environment before doing any work
		for (const line of demo()) console.log(line);
	}, `fxdemo ${name} failed.`);
	if (!success) process.exitCode = 1;
}

yargs(hideBin(process.argv))
	.scriptName('fxdemo')
	.command(
		'basic',
		'Square root of 2 and exp(1) at several resolutions',
		(y) => y.option('bits', { type: 'number', array: true, default: [8, 32, 80, 274], describe: 'Fraction bits to try' }),
		(argv) => run('basic', () => basicDemo(argv.bits)),
	)
	.command(
		'overflow',
		'Where exp(x) overflows for several integer widths',
		(y) => y.options({
			fraction: { type: 'number', default: 20, describe: 'Fraction bits' },
			integers: { type: 'number', array: true, default: [4, 8, 16, 32, 64], describe: 'Integer bits to try' },
		}),
		(argv) => run('overflow', () => overflowDemo(argv.fraction, argv.integers)),
	)
	.command(
		'accuracy',
		'Correct bits of 4·atan(1) against a high precision π',
		(y) => y.options({
			min: { type: 'number', default: 4, describe: 'Smallest fraction bits' },
			max: { type: 'number', default: 200, describe: 'Largest fraction bits' },
		}),
		(argv) => run('accuracy', () => accuracyDemo(argv.min, argv.max)),
	)
	.command(
		'speed',
		'Operations per second of the logistic map at several resolutions',
		(y) => y.options({
			bits: { type: 'number', array: true, default: [16, 32, 64, 128, 256, 512], describe: 'Fraction bits to try' },
			count: { type: 'number', default: 10_000, describe: 'Iterations per resolution' },
		}),
		(argv) => run('speed', () => speedDemo(argv.bits, argv.count)),
	)
	.demandCommand(1, 'Choose a demo to run.')
	.strict()
	.help()
	.parseSync();
