/**
 * @fileoverview Digit-group separators for numbers
 *
 * ```ts
 * import { format, COMMA_SEPARATOR, separateWithCommas } from 'digit-groups';
 *
 * format(1234567, COMMA_SEPARATOR); // '1,234,567'
 * separateWithCommas(-9876.5); // '-9,876.5'
 * ```
 */

export { ASCII_DECIMAL, ASCII_HEX } from './digits.ts';
export { ConfigurationError } from './errors.ts';
export {
	format,
	Separable,
	separable,
	type SeparableValue,
	separateText,
	separateWithCommas,
	separateWithDots,
	separateWithSpaces,
	separateWithUnderscores,
} from './format.ts';
export {
	COMMA_SEPARATOR,
	DOT_SEPARATOR,
	getPolicyByName,
	HEX_FOUR,
	isPolicyName,
	type PolicyName,
	PolicyNames,
	SPACE_SEPARATOR,
	THREE_TWO_SEPARATOR,
	UNDERSCORE_SEPARATOR,
} from './policies.ts';
export { createSeparatorPolicy, ensureSeparatorPolicy } from './policy.ts';
export {
	type GroupingMode,
	GroupingModes,
	type PolicyLike,
	type SeparatorPolicy,
	type SeparatorPolicyInput,
} from './types.internal.ts';
