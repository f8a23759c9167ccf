import process from 'node:process';
import { cli } from 'gunshi';
import { description, name, version } from '../../package.json';
import { normalizeArgv } from '../shared-args.internal.ts';
import { formatCommand } from './format.ts';
import { policiesCommand } from './policies.ts';

/**
 * Map of available CLI subcommands
 */
const subCommands = new Map();
subCommands.set('format', formatCommand);
subCommands.set('policies', policiesCommand);

/**
 * Default command when no subcommand is specified
 */
const mainCommand = formatCommand;

export async function run(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
	await cli(normalizeArgv(argv, ['format', 'policies'], 'format'), mainCommand, {
		name,
		version,
		description,
		subCommands,
		renderHeader: null,
	});
}
