import type { GroupingMode } from './types.internal.ts';

/**
 * Yields group sizes in order. Once the configured sizes are exhausted,
 * 'repeat' keeps yielding the last one and 'stop' yields a single
 * unbounded group. An empty sequence is one unbounded group.
 */
export function* groupSizes(grouping: readonly number[], mode: GroupingMode): Generator<number, void, undefined> {
	yield* grouping;

	const last = grouping.at(-1);
	if (mode === 'stop' || last == null) {
		yield Number.POSITIVE_INFINITY;
		return;
	}
	while (true) {
		yield last;
	}
}

/**
 * Groups digits starting from the least significant (rightmost) one
 * @param digits - Digit string; split by code point
 * @returns Digits with the separator between groups
 */
export function groupFromRight(
	digits: string,
	grouping: readonly number[],
	separator: string,
	mode: GroupingMode,
): string {
	const chars = Array.from(digits);
	const groups: string[] = [];
	let end = chars.length;

	for (const size of groupSizes(grouping, mode)) {
		if (end <= 0) {
			break;
		}
		const start = Math.max(0, end - size);
		groups.unshift(chars.slice(start, end).join(''));
		end = start;
	}

	return groups.join(separator);
}

/**
 * Groups digits starting from the leftmost one, as used for fractions
 */
export function groupFromLeft(
	digits: string,
	grouping: readonly number[],
	separator: string,
	mode: GroupingMode,
): string {
	const chars = Array.from(digits);
	const groups: string[] = [];
	let start = 0;

	for (const size of groupSizes(grouping, mode)) {
		if (start >= chars.length) {
			break;
		}
		const end = Math.min(chars.length, start + size);
		groups.push(chars.slice(start, end).join(''));
		start = end;
	}

	return groups.join(separator);
}

if (import.meta.vitest != null) {
	describe('groupFromRight', () => {
		it.each([
			['1', '1'],
			['21', '21'],
			['321', '321'],
			['4321', '4,321'],
			['54321', '54,321'],
			['654321', '654,321'],
			['7654321', '7,654,321'],
			['87654321', '87,654,321'],
			['987654321', '987,654,321'],
		])('groups %s by threes', (digits, expected) => {
			expect(groupFromRight(digits, [3], ',', 'repeat')).toBe(expected);
		});

		it('repeats the last size of a mixed grouping', () => {
			expect(groupFromRight('1234567890', [3, 2], ',', 'repeat')).toBe('1,23,45,67,890');
		});

		it('stops grouping once the sizes run out', () => {
			expect(groupFromRight('1234567890', [3, 2], ',', 'stop')).toBe('12345,67,890');
		});

		it('inserts nothing for an empty grouping', () => {
			expect(groupFromRight('1234567', [], ',', 'repeat')).toBe('1234567');
		});

		it('returns an empty string for no digits', () => {
			expect(groupFromRight('', [3], ',', 'repeat')).toBe('');
		});
	});

	describe('groupFromLeft', () => {
		it('groups from the most significant fraction digit', () => {
			expect(groupFromLeft('1234567', [3], ' ', 'repeat')).toBe('123 456 7');
		});

		it('stops grouping once the sizes run out', () => {
			expect(groupFromLeft('1234567', [2], ' ', 'stop')).toBe('12 34567');
		});
	});
}
