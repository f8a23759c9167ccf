import type { Args } from 'gunshi';
import * as v from 'valibot';
import { PolicyNames } from './policies.ts';
import { GroupingModes } from './types.internal.ts';

/**
 * Valibot schema for comma-separated group sizes such as `3,2`;
 * an empty string means no grouping
 */
export const groupListSchema = v.pipe(
	v.string(),
	v.regex(/^(?:\d+(?:,\d+)*)?$/, 'Groups must be comma-separated whole numbers, e.g. 3,2'),
	v.transform(value => (value === '' ? [] : value.split(',').map(Number))),
);

export function parseGroupsArg(value: string): number[] {
	const result = v.safeParse(groupListSchema, value);
	if (!result.success) {
		throw new TypeError(result.issues[0].message);
	}
	return result.output;
}

const NEGATIVE_NUMBER_PATTERN = /^-(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$|^-Infinity$/i;

/**
 * Whether a command line token is a negative number rather than a short flag
 */
export function isNegativeNumberArg(token: string): boolean {
	return NEGATIVE_NUMBER_PATTERN.test(token);
}

/**
 * Prepares argv for gunshi: names the default command when the first token
 * is not a known subcommand, and moves negative numbers behind the `--`
 * terminator so they are not read as short flags
 */
export function normalizeArgv(argv: readonly string[], commandNames: readonly string[], defaultCommand: string): string[] {
	const [first] = argv;
	const named = first != null && commandNames.includes(first) ? [...argv] : [defaultCommand, ...argv];

	const terminator = named.indexOf('--');
	const options = terminator === -1 ? named : named.slice(0, terminator);
	const rest = terminator === -1 ? [] : named.slice(terminator + 1);

	const negatives = options.filter(isNegativeNumberArg);
	if (negatives.length === 0) {
		return named;
	}
	return [...options.filter(token => !isNegativeNumberArg(token)), '--', ...negatives, ...rest];
}

/**
 * Policy flags for commands that format values
 */
export const policyArgs = {
	policy: {
		type: 'enum',
		short: 'P',
		description: 'Predefined policy to start from (default: $DIGIT_GROUPS_POLICY or comma)',
		choices: PolicyNames,
	},
	config: {
		type: 'string',
		short: 'c',
		description: 'JSON file with policy fields overriding the predefined policy',
	},
	separator: {
		type: 'string',
		short: 's',
		description: 'Separator inserted between integer digit groups',
	},
	groups: {
		type: 'custom',
		short: 'g',
		description: 'Group sizes from the right, comma-separated (e.g. 3,2)',
		parse: parseGroupsArg,
	},
	mode: {
		type: 'enum',
		short: 'm',
		description: 'When group sizes run out: repeat (reuse the last size) or stop (no more separators)',
		choices: GroupingModes,
	},
	decimal: {
		type: 'string',
		short: 'd',
		description: 'Separator between the integer and fractional parts',
	},
	fractionGroups: {
		type: 'custom',
		description: 'Group sizes for fractional digits, from the left, comma-separated',
		parse: parseGroupsArg,
	},
	fractionSeparator: {
		type: 'string',
		description: 'Separator between fractional digit groups (default: the digit separator)',
	},
	json: {
		type: 'boolean',
		short: 'j',
		description: 'Output in JSON format',
		default: false,
	},
} as const satisfies Args;

if (import.meta.vitest != null) {
	describe('parseGroupsArg', () => {
		it('splits comma-separated sizes', () => {
			expect(parseGroupsArg('3,2')).toEqual([3, 2]);
			expect(parseGroupsArg('4')).toEqual([4]);
		});

		it('treats an empty value as no grouping', () => {
			expect(parseGroupsArg('')).toEqual([]);
		});

		it('rejects anything that is not a list of whole numbers', () => {
			expect(() => parseGroupsArg('3;2')).toThrow(TypeError);
			expect(() => parseGroupsArg('-3')).toThrow('Groups must be comma-separated whole numbers, e.g. 3,2');
		});
	});

	describe('normalizeArgv', () => {
		const names = ['format', 'policies'];

		it('names the default command when the first token is a value', () => {
			expect(normalizeArgv(['1234567'], names, 'format')).toEqual(['format', '1234567']);
			expect(normalizeArgv(['deadbeef', '--policy', 'hex-four'], names, 'format')).toEqual(['format', 'deadbeef', '--policy', 'hex-four']);
			expect(normalizeArgv([], names, 'format')).toEqual(['format']);
		});

		it('keeps an explicit subcommand', () => {
			expect(normalizeArgv(['format', '1234567'], names, 'format')).toEqual(['format', '1234567']);
			expect(normalizeArgv(['policies', '--json'], names, 'format')).toEqual(['policies', '--json']);
		});

		it('moves negative numbers behind the terminator', () => {
			expect(normalizeArgv(['-1234', '--policy', 'dot'], names, 'format')).toEqual(['format', '--policy', 'dot', '--', '-1234']);
			expect(normalizeArgv(['format', '-1.5e3'], names, 'format')).toEqual(['format', '--', '-1.5e3']);
		});

		it('leaves tokens after an existing terminator alone', () => {
			expect(normalizeArgv(['format', '--', '-1234'], names, 'format')).toEqual(['format', '--', '-1234']);
		});

		it('does not mistake flags for negative numbers', () => {
			expect(isNegativeNumberArg('-j')).toBe(false);
			expect(isNegativeNumberArg('--json')).toBe(false);
			expect(isNegativeNumberArg('-0.5')).toBe(true);
			expect(isNegativeNumberArg('-Infinity')).toBe(true);
		});
	});
}
