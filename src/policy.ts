import type { PolicyLike, SeparatorPolicy, SeparatorPolicyInput } from './types.internal.ts';
import * as v from 'valibot';
import { ConfigurationError } from './errors.ts';
import { SeparatorPolicySchema } from './types.internal.ts';

/**
 * Policies produced by createSeparatorPolicy, which need no further checks
 */
const validatedPolicies = new WeakSet<object>();

/**
 * Validates a policy description and returns a frozen SeparatorPolicy
 * @param input - Policy fields; groupingMode, decimalSeparator and digits are optional
 * @returns Immutable policy, safe to share between any number of calls
 * @throws ConfigurationError naming the first invalid field
 */
export function createSeparatorPolicy(input: SeparatorPolicyInput): SeparatorPolicy {
	const result = v.safeParse(SeparatorPolicySchema, input);
	if (!result.success) {
		const issue = result.issues[0];
		const path = v.getDotPath(issue);
		const field = path?.split('.')[0] ?? 'policy';
		throw new ConfigurationError(field, issue.message);
	}

	const { grouping, fractionalGrouping, digits, ...separators } = result.output;
	const policy: SeparatorPolicy = Object.freeze({
		...separators,
		grouping: Object.freeze([...grouping]),
		digits: Object.freeze([...digits]),
		...(fractionalGrouping == null ? {} : { fractionalGrouping: Object.freeze([...fractionalGrouping]) }),
	});
	validatedPolicies.add(policy);
	return policy;
}

/**
 * Returns a policy that is known to be valid. Policies built by
 * createSeparatorPolicy are frozen and pass through; any other object may
 * change between calls, so it is validated every time.
 * @throws ConfigurationError when the policy is invalid
 */
export function ensureSeparatorPolicy(policy: PolicyLike): SeparatorPolicy {
	if (isValidatedPolicy(policy)) {
		return policy;
	}
	return createSeparatorPolicy(toPolicyInput(policy));
}

function isValidatedPolicy(policy: PolicyLike): policy is SeparatorPolicy {
	return validatedPolicies.has(policy);
}

/**
 * Copies a policy (or policy-shaped object) into a fresh, mutable input
 * suitable for createSeparatorPolicy
 */
export function toPolicyInput(policy: PolicyLike): SeparatorPolicyInput {
	return {
		...policy,
		grouping: [...policy.grouping],
		fractionalGrouping: policy.fractionalGrouping == null ? undefined : [...policy.fractionalGrouping],
		digits: policy.digits == null ? undefined : [...policy.digits],
	};
}
