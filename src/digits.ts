/**
 * The decimal digits, in ASCII
 */
export const ASCII_DECIMAL: readonly string[] = Object.freeze([
	'0',
	'1',
	'2',
	'3',
	'4',
	'5',
	'6',
	'7',
	'8',
	'9',
]);

/**
 * The hexadecimal digits, in ASCII, both cases
 */
export const ASCII_HEX: readonly string[] = Object.freeze([
	...ASCII_DECIMAL,
	'a',
	'b',
	'c',
	'd',
	'e',
	'f',
	'A',
	'B',
	'C',
	'D',
	'E',
	'F',
]);
