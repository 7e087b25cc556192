#!/usr/bin/env node
import { initializeLogger, type LogLevel } from '@epss/runtime';
import { run } from './program.js';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal', 'silent'];
const level = LEVELS.find((candidate) => candidate === process.env.EPSS_LOG_LEVEL) ?? 'warn';

initializeLogger({ level, destination: 'stderr' });

run(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
		process.exitCode = 1;
	}
);
