import type { PolicyName } from '../policies.ts';
import Table from 'cli-table3';
import { define } from 'gunshi';
import pc from 'picocolors';
import { SAMPLE_NUMBER, SAMPLE_TEXT } from '../consts.internal.ts';
import { ASCII_DECIMAL } from '../digits.ts';
import { format, separateText } from '../format.ts';
import { log, logger } from '../logger.ts';
import { getPolicyByName, PolicyNames } from '../policies.ts';

/**
 * One line of the predefined policy listing
 */
export type PolicyDescription = {
	name: PolicyName;
	grouping: string;
	digitSeparator: string;
	decimalSeparator: string;
	sample: string;
};

function usesDecimalDigits(digits: readonly string[]): boolean {
	return digits.length === ASCII_DECIMAL.length && digits.every(digit => ASCII_DECIMAL.includes(digit));
}

/**
 * Describes every predefined policy with a sample rendering. Decimal
 * policies render a number; others separate a sample string.
 */
export function describePolicies(): PolicyDescription[] {
	return PolicyNames.map((name) => {
		const policy = getPolicyByName(name);
		return {
			name,
			grouping: policy.grouping.join(','),
			digitSeparator: JSON.stringify(policy.digitSeparator),
			decimalSeparator: JSON.stringify(policy.decimalSeparator),
			sample: usesDecimalDigits(policy.digits)
				? format(SAMPLE_NUMBER, policy)
				: separateText(SAMPLE_TEXT, policy),
		};
	});
}

export const policiesCommand = define({
	name: 'policies',
	description: 'List the predefined separator policies',
	args: {
		json: {
			type: 'boolean',
			short: 'j',
			description: 'Output in JSON format',
			default: false,
		},
	},
	toKebab: true,
	run(ctx) {
		const descriptions = describePolicies();

		if (ctx.values.json) {
			log(JSON.stringify(descriptions, null, 2));
			return;
		}

		logger.box('Predefined separator policies');

		const table = new Table({
			head: ['Name', 'Groups', 'Separator', 'Decimal', 'Sample'],
			style: {
				head: ['cyan'],
			},
			colAligns: ['left', 'left', 'center', 'center', 'right'],
		});

		for (const description of descriptions) {
			table.push([
				description.name,
				description.grouping,
				description.digitSeparator,
				description.decimalSeparator,
				pc.bold(description.sample),
			]);
		}

		log(table.toString());
	},
});
