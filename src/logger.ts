import process from 'node:process';
import { consola, type ConsolaInstance } from 'consola';

import { name } from '../package.json';
import { LOG_LEVEL_ENV_VAR } from './consts.internal.ts';

/**
 * Reads a consola log level (0 silent to 5 trace) from an environment value
 * @returns undefined when the value is unset or not a whole number
 */
export function parseLogLevel(value: string | undefined): number | undefined {
	const trimmed = value?.trim() ?? '';
	return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

/**
 * Application logger instance with package name tag
 */
export const logger: ConsolaInstance = consola.withTag(name);

const envLevel = parseLogLevel(process.env[LOG_LEVEL_ENV_VAR]);
if (envLevel != null) {
	logger.level = envLevel;
}

/**
 * Direct console.log function for command output that must stay unformatted
 */
// eslint-disable-next-line no-console
export const log = console.log;

if (import.meta.vitest != null) {
	describe('parseLogLevel', () => {
		it('reads whole numbers', () => {
			expect(parseLogLevel('4')).toBe(4);
			expect(parseLogLevel(' 0 ')).toBe(0);
		});

		it('ignores unset and malformed values', () => {
			expect(parseLogLevel(undefined)).toBeUndefined();
			expect(parseLogLevel('')).toBeUndefined();
			expect(parseLogLevel('debug')).toBeUndefined();
		});
	});
}
