import type { SeparableValue } from './format.ts';
import type { PolicyName } from './policies.ts';
import type { SeparatorPolicy } from './types.internal.ts';
import { readFile } from 'node:fs/promises';
import process from 'node:process';
import { omitBy } from 'es-toolkit';
import * as v from 'valibot';
import { DEFAULT_POLICY_NAME, POLICY_ENV_VAR } from './consts.internal.ts';
import { ConfigurationError } from './errors.ts';
import { separable } from './format.ts';
import { logger } from './logger.ts';
import { getPolicyByName, isPolicyName, PolicyNames } from './policies.ts';
import { createSeparatorPolicy, toPolicyInput } from './policy.ts';
import { GroupingModes } from './types.internal.ts';

/**
 * Valibot schema for policy files. Every field is optional and overrides the
 * base policy; group sizes are checked once the policy is assembled.
 */
export const PolicyFileSchema = v.partial(v.strictObject({
	grouping: v.array(v.number()),
	groupingMode: v.picklist(GroupingModes),
	digitSeparator: v.string(),
	decimalSeparator: v.string(),
	fractionalGrouping: v.array(v.number()),
	fractionalSeparator: v.string(),
	digits: v.array(v.string()),
}));

/**
 * Policy fields that may be overridden by a file or by command line flags
 */
export type PolicyOverrides = v.InferOutput<typeof PolicyFileSchema>;

/**
 * Options for assembling the CLI policy
 */
export type ResolvePolicyOptions = {
	policy?: PolicyName;
	configFile?: string;
	overrides?: PolicyOverrides;
};

/**
 * Predefined policy named by DIGIT_GROUPS_POLICY, or the default one
 * @throws ConfigurationError when the variable names an unknown policy
 */
export function getDefaultPolicyName(): PolicyName {
	const fromEnv = process.env[POLICY_ENV_VAR]?.trim() ?? '';
	if (fromEnv === '') {
		return DEFAULT_POLICY_NAME;
	}
	if (!isPolicyName(fromEnv)) {
		throw new ConfigurationError(
			POLICY_ENV_VAR,
			`unknown policy "${fromEnv}", expected one of ${PolicyNames.join(', ')}`,
		);
	}
	return fromEnv;
}

/**
 * Reads policy overrides from a JSON file
 * @throws ConfigurationError when the file is unreadable, not JSON, or has invalid fields
 */
export async function loadPolicyFile(filePath: string): Promise<PolicyOverrides> {
	let content: string;
	try {
		content = await readFile(filePath, 'utf-8');
	}
	catch (error) {
		throw new ConfigurationError('config', `cannot read ${filePath}`, { cause: error });
	}

	let json: unknown;
	try {
		json = JSON.parse(content);
	}
	catch (error) {
		throw new ConfigurationError('config', `${filePath} is not valid JSON`, { cause: error });
	}

	const result = v.safeParse(PolicyFileSchema, json);
	if (!result.success) {
		const issue = result.issues[0];
		const field = v.getDotPath(issue)?.split('.')[0] ?? 'config';
		throw new ConfigurationError(field, issue.message);
	}

	logger.debug(`Loaded policy overrides from ${filePath}`);
	return result.output;
}

/**
 * Assembles the policy for a CLI run: environment or named preset, then the
 * policy file, then individual flag overrides
 * @throws ConfigurationError when any layer, or the merged result, is invalid
 */
export async function resolvePolicy(options: ResolvePolicyOptions = {}): Promise<SeparatorPolicy> {
	const base = getPolicyByName(options.policy ?? getDefaultPolicyName());
	const fromFile = options.configFile == null ? {} : await loadPolicyFile(options.configFile);
	const fromFlags = omitBy<PolicyOverrides>(options.overrides ?? {}, value => value === undefined);

	return createSeparatorPolicy(toPolicyInput({ ...base, ...fromFile, ...fromFlags }));
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const NON_FINITE_LITERALS = new Set(['NaN', 'Infinity', '+Infinity', '-Infinity']);

/**
 * Interprets command line input: whole numbers become bigints, other decimal
 * literals become numbers, anything else stays text
 */
export function parseInput(text: string): SeparableValue {
	const trimmed = text.trim();
	if (INTEGER_PATTERN.test(trimmed)) {
		return BigInt(trimmed);
	}
	if (DECIMAL_PATTERN.test(trimmed) || NON_FINITE_LITERALS.has(trimmed)) {
		return Number(trimmed);
	}
	return text;
}

/**
 * Parses and formats a single command line value
 */
export function formatInput(text: string, policy: SeparatorPolicy): string {
	return separable(parseInput(text)).byPolicy(policy);
}
