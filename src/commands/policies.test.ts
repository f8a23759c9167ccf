import { describePolicies } from './policies.ts';

describe('describePolicies', () => {
	it('renders a sample for every predefined policy', () => {
		expect(describePolicies()).toEqual([
			{ name: 'comma', grouping: '3', digitSeparator: '","', decimalSeparator: '"."', sample: '1,234,567.891' },
			{ name: 'space', grouping: '3', digitSeparator: '" "', decimalSeparator: '"."', sample: '1 234 567.891' },
			{ name: 'dot', grouping: '3', digitSeparator: '"."', decimalSeparator: '","', sample: '1.234.567,891' },
			{ name: 'underscore', grouping: '3', digitSeparator: '"_"', decimalSeparator: '"."', sample: '1_234_567.891' },
			{ name: 'three-two', grouping: '3,2', digitSeparator: '","', decimalSeparator: '"."', sample: '12,34,567.891' },
			{ name: 'hex-four', grouping: '4', digitSeparator: '" "', decimalSeparator: '"."', sample: 'dead beef' },
		]);
	});
});
