import type { TupleToUnion } from 'type-fest';
import type { SeparatorPolicy } from './types.internal.ts';
import { ASCII_HEX } from './digits.ts';
import { createSeparatorPolicy } from './policy.ts';

/**
 * Comma every three decimal digits: `1,234,567.89`
 */
export const COMMA_SEPARATOR = createSeparatorPolicy({
	grouping: [3],
	digitSeparator: ',',
});

/**
 * Space every three decimal digits: `1 234 567.89`
 */
export const SPACE_SEPARATOR = createSeparatorPolicy({
	grouping: [3],
	digitSeparator: ' ',
});

/**
 * Period every three decimal digits with a decimal comma: `1.234.567,89`
 */
export const DOT_SEPARATOR = createSeparatorPolicy({
	grouping: [3],
	digitSeparator: '.',
	decimalSeparator: ',',
});

/**
 * Underscore every three decimal digits: `1_234_567.89`
 */
export const UNDERSCORE_SEPARATOR = createSeparatorPolicy({
	grouping: [3],
	digitSeparator: '_',
});

/**
 * Three digits, then pairs: `12,34,567.89`
 */
export const THREE_TWO_SEPARATOR = createSeparatorPolicy({
	grouping: [3, 2],
	digitSeparator: ',',
});

/**
 * Space every four hexadecimal digits, for use with separateText: `dead beef`
 */
export const HEX_FOUR = createSeparatorPolicy({
	grouping: [4],
	digitSeparator: ' ',
	digits: [...ASCII_HEX],
});

/**
 * Names of the predefined policies, as accepted by the CLI
 */
export const PolicyNames = ['comma', 'space', 'dot', 'underscore', 'three-two', 'hex-four'] as const;

/**
 * Union type for predefined policy names
 */
export type PolicyName = TupleToUnion<typeof PolicyNames>;

const policiesByName = {
	'comma': COMMA_SEPARATOR,
	'space': SPACE_SEPARATOR,
	'dot': DOT_SEPARATOR,
	'underscore': UNDERSCORE_SEPARATOR,
	'three-two': THREE_TWO_SEPARATOR,
	'hex-four': HEX_FOUR,
} as const satisfies Record<PolicyName, SeparatorPolicy>;

export function getPolicyByName(name: PolicyName): SeparatorPolicy {
	return policiesByName[name];
}

export function isPolicyName(name: string): name is PolicyName {
	return PolicyNames.some(candidate => candidate === name);
}
