import process from 'node:process';
import { define } from 'gunshi';
import { ConfigurationError } from '../errors.ts';
import { log, logger } from '../logger.ts';
import { formatInput, resolvePolicy } from '../policy-config.ts';
import { policyArgs } from '../shared-args.internal.ts';

export const formatCommand = define({
	name: 'format',
	description: 'Insert separators between the digit groups of a number',
	args: policyArgs,
	toKebab: true,
	async run(ctx) {
		if (ctx.values.json) {
			logger.level = 0;
		}

		// negative numbers arrive after the `--` terminator
		const value = ctx.positionals.slice(ctx.omitted ? 0 : 1)[0] ?? ctx.rest[0];
		if (value == null) {
			logger.error('Missing value to format, e.g. `format 1234567` or `format -- -1234`');
			process.exit(1);
		}

		try {
			const policy = await resolvePolicy({
				policy: ctx.values.policy,
				configFile: ctx.values.config,
				overrides: {
					digitSeparator: ctx.values.separator,
					grouping: ctx.values.groups,
					groupingMode: ctx.values.mode,
					decimalSeparator: ctx.values.decimal,
					fractionalGrouping: ctx.values.fractionGroups,
					fractionalSeparator: ctx.values.fractionSeparator,
				},
			});

			const output = formatInput(value, policy);

			if (ctx.values.json) {
				log(JSON.stringify({ input: value, output, policy }, null, 2));
			}
			else {
				log(output);
			}
		}
		catch (error) {
			if (error instanceof ConfigurationError) {
				logger.error(error.message);
				process.exit(1);
			}
			throw error;
		}
	},
});
