import type { TupleToUnion } from 'type-fest';
import * as v from 'valibot';
import { ASCII_DECIMAL } from './digits.ts';

/**
 * Behaviour once the configured group sizes run out
 * - repeat: keep using the last group size for the remaining digits
 * - stop: emit the remaining digits as a single ungrouped block
 */
export const GroupingModes = ['repeat', 'stop'] as const;

/**
 * Union type for grouping modes
 */
export type GroupingMode = TupleToUnion<typeof GroupingModes>;

/**
 * Valibot schema for a single group size
 */
export const groupSizeSchema = v.pipe(
	v.number(),
	v.integer('group sizes must be integers'),
	v.minValue(1, 'group sizes must be positive'),
);

/**
 * Valibot schema for a digit character (exactly one code point)
 */
const digitSchema = v.pipe(
	v.string(),
	v.check(value => Array.from(value).length === 1, 'digits must be single characters'),
);

/**
 * Valibot schema for separator policy input, with defaults applied on parse
 */
export const SeparatorPolicySchema = v.object({
	grouping: v.array(groupSizeSchema),
	groupingMode: v.optional(v.picklist(GroupingModes), 'repeat'),
	digitSeparator: v.string(),
	decimalSeparator: v.optional(v.string(), '.'),
	fractionalGrouping: v.optional(v.array(groupSizeSchema)),
	fractionalSeparator: v.optional(v.string()),
	digits: v.optional(
		v.pipe(v.array(digitSchema), v.nonEmpty('at least one digit character is required')),
		() => [...ASCII_DECIMAL],
	),
});

/**
 * Caller-facing policy description accepted by createSeparatorPolicy
 */
export type SeparatorPolicyInput = v.InferInput<typeof SeparatorPolicySchema>;

/**
 * Validated, frozen separator policy shared read-only by every formatting call
 */
export type SeparatorPolicy = Readonly<{
	grouping: readonly number[];
	groupingMode: GroupingMode;
	digitSeparator: string;
	decimalSeparator: string;
	fractionalGrouping?: readonly number[];
	fractionalSeparator?: string;
	digits: readonly string[];
}>;

/**
 * Anything format() accepts as a policy
 */
export type PolicyLike = SeparatorPolicy | SeparatorPolicyInput;
