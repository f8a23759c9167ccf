import type { PolicyLike, SeparatorPolicy } from './types.internal.ts';
import { toDecimalParts } from './_decimal.ts';
import { groupFromLeft, groupFromRight } from './_grouping.ts';
import {
	COMMA_SEPARATOR,
	DOT_SEPARATOR,
	SPACE_SEPARATOR,
	UNDERSCORE_SEPARATOR,
} from './policies.ts';
import { ensureSeparatorPolicy } from './policy.ts';

/**
 * Values the formatter accepts: numbers and bigints are formatted from their
 * decimal expansion, strings have their first digit run separated
 */
export type SeparableValue = number | bigint | string;

function formatFraction(fraction: string, policy: SeparatorPolicy): string {
	const grouping = policy.fractionalGrouping;
	if (grouping == null || grouping.length === 0) {
		return fraction;
	}
	const separator = policy.fractionalSeparator ?? policy.digitSeparator;
	return groupFromLeft(fraction, grouping, separator, policy.groupingMode);
}

/**
 * Formats a number with separators between digit groups
 *
 * NaN and the infinities come back as `String(value)`. Finite values are
 * expanded to plain decimal digits (no exponent notation), the integer part
 * is grouped from the right and the fraction, if any, from the left.
 *
 * @param value - Number or bigint to format
 * @param policy - Separator policy; plain objects are validated on first use
 * @returns Formatted string
 * @throws ConfigurationError when the policy is invalid
 */
export function format(value: number | bigint, policy: PolicyLike): string {
	const resolved = ensureSeparatorPolicy(policy);
	const parts = toDecimalParts(value);
	if (parts == null) {
		return String(value);
	}

	const integer = groupFromRight(parts.integer, resolved.grouping, resolved.digitSeparator, resolved.groupingMode);
	if (parts.fraction === '') {
		return `${parts.sign}${integer}`;
	}
	return `${parts.sign}${integer}${resolved.decimalSeparator}${formatFraction(parts.fraction, resolved)}`;
}

/**
 * Inserts separators into the first run of policy digits found in `text`,
 * leaving whatever comes before and after it untouched
 *
 * @example
 * separateText('-1234.5', COMMA_SEPARATOR) // '-1,234.5'
 * separateText('deadbeef', HEX_FOUR) // 'dead beef'
 */
export function separateText(text: string, policy: PolicyLike): string {
	const resolved = ensureSeparatorPolicy(policy);
	const digits = new Set(resolved.digits);
	const chars = Array.from(text);

	const start = chars.findIndex(char => digits.has(char));
	if (start === -1) {
		return text;
	}
	const length = chars.slice(start).findIndex(char => !digits.has(char));
	const end = length === -1 ? chars.length : start + length;

	const grouped = groupFromRight(
		chars.slice(start, end).join(''),
		resolved.grouping,
		resolved.digitSeparator,
		resolved.groupingMode,
	);
	return chars.slice(0, start).join('') + grouped + chars.slice(end).join('');
}

/**
 * Thin wrapper offering separator methods on a value
 */
export class Separable {
	constructor(readonly value: SeparableValue) {}

	byPolicy(policy: PolicyLike): string {
		return typeof this.value === 'string'
			? separateText(this.value, policy)
			: format(this.value, policy);
	}

	/** Inserts a comma every three digits from the right */
	withCommas(): string {
		return this.byPolicy(COMMA_SEPARATOR);
	}

	/** Inserts a space every three digits from the right */
	withSpaces(): string {
		return this.byPolicy(SPACE_SEPARATOR);
	}

	/** Inserts a period every three digits from the right, with a decimal comma */
	withDots(): string {
		return this.byPolicy(DOT_SEPARATOR);
	}

	/** Inserts an underscore every three digits from the right */
	withUnderscores(): string {
		return this.byPolicy(UNDERSCORE_SEPARATOR);
	}

	toString(): string {
		return this.withCommas();
	}
}

export function separable(value: SeparableValue): Separable {
	return new Separable(value);
}

export function separateWithCommas(value: SeparableValue): string {
	return separable(value).withCommas();
}

export function separateWithSpaces(value: SeparableValue): string {
	return separable(value).withSpaces();
}

export function separateWithDots(value: SeparableValue): string {
	return separable(value).withDots();
}

export function separateWithUnderscores(value: SeparableValue): string {
	return separable(value).withUnderscores();
}
