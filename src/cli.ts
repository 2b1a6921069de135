#!/usr/bin/env node
import { createProgram } from './program.js';
import Logger from './misc/logger.js';

const logger = new Logger('localegen', 'green');

try {
	await createProgram({ logger }).parseAsync(process.argv);
} catch (err) {
	logger.error(err instanceof Error ? err : new Error(String(err)), true);
	process.exitCode = 1;
}
