/**
 * @fileoverview Decimal expansion of numeric values
 *
 * Splits a finite number or bigint into sign, integer digits and fraction
 * digits, expanding the exponent notation JavaScript uses for very large
 * and very small numbers.
 */

/**
 * Canonical decimal pieces of a finite value
 */
export type DecimalParts = {
	sign: '' | '-';
	integer: string;
	fraction: string;
};

const EXPONENT_PATTERN = /^(\d+)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Expands an unsigned number string (possibly in exponent notation) into
 * integer and fraction digits
 */
export function expandDecimal(text: string): Omit<DecimalParts, 'sign'> {
	const match = EXPONENT_PATTERN.exec(text);
	if (match == null) {
		const [integer = '0', fraction = ''] = text.split('.');
		return { integer, fraction };
	}

	const lead = match[1] ?? '';
	const digits = lead + (match[2] ?? '');
	const point = lead.length + Number(match[3]);

	if (point <= 0) {
		return { integer: '0', fraction: '0'.repeat(-point) + digits };
	}
	if (point >= digits.length) {
		return { integer: digits + '0'.repeat(point - digits.length), fraction: '' };
	}
	return { integer: digits.slice(0, point), fraction: digits.slice(point) };
}

/**
 * Splits a finite value into its decimal parts. Negative zero keeps its sign.
 * @returns undefined for NaN and the infinities
 */
export function toDecimalParts(value: number | bigint): DecimalParts | undefined {
	if (typeof value === 'bigint') {
		const negative = value < 0n;
		return {
			sign: negative ? '-' : '',
			integer: (negative ? -value : value).toString(),
			fraction: '',
		};
	}

	if (!Number.isFinite(value)) {
		return undefined;
	}

	const negative = value < 0 || Object.is(value, -0);
	return {
		sign: negative ? '-' : '',
		...expandDecimal(String(Math.abs(value))),
	};
}

if (import.meta.vitest != null) {
	describe('expandDecimal', () => {
		it('splits plain decimal strings at the point', () => {
			expect(expandDecimal('1234.5678')).toEqual({ integer: '1234', fraction: '5678' });
			expect(expandDecimal('42')).toEqual({ integer: '42', fraction: '' });
		});

		it('expands large exponents into trailing zeros', () => {
			expect(expandDecimal('1e+21')).toEqual({ integer: '1000000000000000000000', fraction: '' });
			expect(expandDecimal('1.5e+22')).toEqual({ integer: '15000000000000000000000', fraction: '' });
		});

		it('expands negative exponents into leading fraction zeros', () => {
			expect(expandDecimal('1.5e-7')).toEqual({ integer: '0', fraction: '00000015' });
			expect(expandDecimal('2e-7')).toEqual({ integer: '0', fraction: '0000002' });
		});
	});

	describe('toDecimalParts', () => {
		it('handles signed numbers', () => {
			expect(toDecimalParts(-1234.5)).toEqual({ sign: '-', integer: '1234', fraction: '5' });
			expect(toDecimalParts(0)).toEqual({ sign: '', integer: '0', fraction: '' });
		});

		it('keeps the sign of negative zero', () => {
			expect(toDecimalParts(-0)).toEqual({ sign: '-', integer: '0', fraction: '' });
		});

		it('handles bigints beyond the safe integer range', () => {
			expect(toDecimalParts(-123456789012345678901234567890n)).toEqual({
				sign: '-',
				integer: '123456789012345678901234567890',
				fraction: '',
			});
		});

		it('returns undefined for non-finite values', () => {
			expect(toDecimalParts(Number.NaN)).toBeUndefined();
			expect(toDecimalParts(Number.POSITIVE_INFINITY)).toBeUndefined();
			expect(toDecimalParts(Number.NEGATIVE_INFINITY)).toBeUndefined();
		});
	});
}
