import { ConfigurationError } from './errors.ts';
import {
	format,
	separable,
	separateText,
	separateWithCommas,
	separateWithDots,
	separateWithSpaces,
	separateWithUnderscores,
} from './format.ts';
import {
	COMMA_SEPARATOR,
	DOT_SEPARATOR,
	HEX_FOUR,
	THREE_TWO_SEPARATOR,
} from './policies.ts';

describe('format', () => {
	describe('integers with the comma policy', () => {
		it.each([
			[0, '0'],
			[7, '7'],
			[999, '999'],
			[1000, '1,000'],
			[12345, '12,345'],
			[1234567, '1,234,567'],
			[Number.MAX_SAFE_INTEGER, '9,007,199,254,740,991'],
		])('formats %d as %s', (value, expected) => {
			expect(format(value, COMMA_SEPARATOR)).toBe(expected);
		});

		it('formats bigints beyond the safe integer range', () => {
			expect(format(12345678901234567890n, COMMA_SEPARATOR)).toBe('12,345,678,901,234,567,890');
			expect(format(-1000n, COMMA_SEPARATOR)).toBe('-1,000');
		});
	});

	describe('signs', () => {
		it('puts the minus sign directly before the first digit', () => {
			expect(format(-1234, COMMA_SEPARATOR)).toBe('-1,234');
			expect(format(-123456, COMMA_SEPARATOR)).toBe('-123,456');
		});

		it('keeps the sign of negative zero', () => {
			expect(format(-0, COMMA_SEPARATOR)).toBe('-0');
		});

		it('handles negative numbers with a fraction', () => {
			expect(format(-1234.5, COMMA_SEPARATOR)).toBe('-1,234.5');
		});
	});

	describe('fractions', () => {
		it('emits fraction digits verbatim without fractional grouping', () => {
			expect(format(9876.54321, COMMA_SEPARATOR)).toBe('9,876.54321');
			expect(format(0.125, COMMA_SEPARATOR)).toBe('0.125');
		});

		it('uses the decimal separator of the policy', () => {
			expect(format(1234567.89, DOT_SEPARATOR)).toBe('1.234.567,89');
		});

		it('groups fraction digits independently of the integer part', () => {
			const policy = {
				grouping: [3],
				digitSeparator: ',',
				fractionalGrouping: [2],
				fractionalSeparator: ' ',
			};

			expect(format(1234.5678, policy)).toBe('1,234.56 78');
			expect(format(1234.567, policy)).toBe('1,234.56 7');
		});

		it('falls back to the digit separator inside the fraction', () => {
			const policy = { grouping: [3], digitSeparator: '_', fractionalGrouping: [3] };

			expect(format(0.123456, policy)).toBe('0.123_456');
		});
	});

	describe('exponent notation', () => {
		it('expands large numbers into plain digits', () => {
			expect(format(1e21, COMMA_SEPARATOR)).toBe('1,000,000,000,000,000,000,000');
		});

		it('expands small numbers into plain digits', () => {
			expect(format(1.5e-7, COMMA_SEPARATOR)).toBe('0.00000015');
		});
	});

	describe('non-finite values', () => {
		it('passes NaN and the infinities through unchanged', () => {
			expect(format(Number.NaN, COMMA_SEPARATOR)).toBe('NaN');
			expect(format(Number.POSITIVE_INFINITY, COMMA_SEPARATOR)).toBe('Infinity');
			expect(format(Number.NEGATIVE_INFINITY, COMMA_SEPARATOR)).toBe('-Infinity');
		});
	});

	describe('grouping', () => {
		it('repeats the last group size by default', () => {
			expect(format(1234567890, THREE_TWO_SEPARATOR)).toBe('1,23,45,67,890');
		});

		it('stops inserting separators once the sizes run out in stop mode', () => {
			const policy = { grouping: [3, 2], digitSeparator: ',', groupingMode: 'stop' as const };

			expect(format(1234567890, policy)).toBe('12345,67,890');
			expect(format(1234, policy)).toBe('1,234');
		});

		it('inserts no separators for an empty grouping', () => {
			expect(format(1234567, { grouping: [], digitSeparator: ',' })).toBe('1234567');
		});
	});

	describe('separators', () => {
		it('produces the plain decimal form for an empty separator', () => {
			const policy = { grouping: [3], digitSeparator: '' };

			for (const value of [0, 42, 1234567.25, -98765432]) {
				expect(format(value, policy)).toBe(String(value));
			}
		});

		it('keeps multi-character separators intact', () => {
			const policy = { grouping: [3], digitSeparator: ' · ' };

			expect(format(1234567, policy)).toBe('1 · 234 · 567');
		});

		it('returns the canonical digits once separators are removed', () => {
			const policy = {
				grouping: [3],
				digitSeparator: ' · ',
				fractionalGrouping: [2],
				fractionalSeparator: '‿',
			};

			for (const value of [0, 7, 1000, 987654321, -42000000, 3.14159, -2500.125]) {
				const stripped = format(value, policy).replaceAll(' · ', '').replaceAll('‿', '');
				expect(stripped).toBe(String(value));
			}
		});

		it('handles separators outside the basic multilingual plane', () => {
			expect(format(12345, { grouping: [1], digitSeparator: '😃😃' })).toBe('1😃😃2😃😃3😃😃4😃😃5');
		});
	});

	describe('invalid policies', () => {
		it('rejects a zero group size', () => {
			expect(() => format(1234, { grouping: [0], digitSeparator: ',' })).toThrow(ConfigurationError);
			expect(() => format(1234, { grouping: [0], digitSeparator: ',' })).toThrow(
				'Invalid grouping: group sizes must be positive',
			);
		});

		it('reports a plain policy that became invalid after an earlier call', () => {
			const policy = { grouping: [3], digitSeparator: ',' };
			expect(format(1234, policy)).toBe('1,234');

			policy.digitSeparator = ' ';
			expect(format(1234, policy)).toBe('1 234');

			policy.grouping[0] = 0;
			expect(() => format(1234, policy)).toThrow(ConfigurationError);
		});

		it('rejects a negative fractional group size', () => {
			expect(() => format(1.5, { grouping: [3], digitSeparator: ',', fractionalGrouping: [2, -1] })).toThrow(
				'Invalid fractionalGrouping: group sizes must be positive',
			);
		});
	});
});

describe('separateText', () => {
	it('groups only the first run of digits', () => {
		expect(separateText('-1234.5', COMMA_SEPARATOR)).toBe('-1,234.5');
		expect(separateText('1234.5678', COMMA_SEPARATOR)).toBe('1,234.5678');
	});

	it('leaves surrounding text untouched', () => {
		expect(separateText('build 1234567 done', COMMA_SEPARATOR)).toBe('build 1,234,567 done');
	});

	it('returns text without digits unchanged', () => {
		expect(separateText('no digits here', COMMA_SEPARATOR)).toBe('no digits here');
		expect(separateText('', COMMA_SEPARATOR)).toBe('');
	});

	it('separates hexadecimal digits with the hex policy', () => {
		expect(separateText('deadbeef', HEX_FOUR)).toBe('dead beef');
		expect(separateText('cafe0123456789', HEX_FOUR)).toBe('ca fe01 2345 6789');
	});

	it('handles custom digit characters outside the basic multilingual plane', () => {
		const policy = { grouping: [1], digitSeparator: '😃😃', digits: ['🙏'] };

		expect(separateText('  🙏🙏🙏🙏🙏  ', policy)).toBe('  🙏😃😃🙏😃😃🙏😃😃🙏😃😃🙏  ');
	});
});

describe('Separable', () => {
	it('formats numbers with the convenience methods', () => {
		expect(separable(12345).withCommas()).toBe('12,345');
		expect(separable(12345).withSpaces()).toBe('12 345');
		expect(separable(12345).withDots()).toBe('12.345');
		expect(separable(12345).withUnderscores()).toBe('12_345');
	});

	it('separates strings through separateText', () => {
		expect(separable('-12345').withCommas()).toBe('-12,345');
		expect(separable('deadbeef').byPolicy(HEX_FOUR)).toBe('dead beef');
	});

	it('renders with commas in template literals', () => {
		expect(`${separable(9876.5)}`).toBe('9,876.5');
	});
});

describe('separateWith* helpers', () => {
	it('match the corresponding Separable methods', () => {
		expect(separateWithCommas(-12345)).toBe('-12,345');
		expect(separateWithSpaces(1234567n)).toBe('1 234 567');
		expect(separateWithDots(9876.5)).toBe('9.876,5');
		expect(separateWithUnderscores('1000000')).toBe('1_000_000');
	});
});
