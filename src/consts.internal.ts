import type { PolicyName } from './policies.ts';

/**
 * Environment variable naming the predefined policy used by the CLI
 * when no --policy flag is given
 */
export const POLICY_ENV_VAR = 'DIGIT_GROUPS_POLICY';

/**
 * Environment variable overriding the consola log level (0 silent to 5 trace)
 */
export const LOG_LEVEL_ENV_VAR = 'DIGIT_GROUPS_LOG_LEVEL';

/**
 * Predefined policy used when neither the flag nor the environment names one
 */
export const DEFAULT_POLICY_NAME = 'comma' as const satisfies PolicyName;

/**
 * Value rendered for each decimal policy in the policies listing
 */
export const SAMPLE_NUMBER = 1234567.891;

/**
 * Text rendered for digit sets beyond the decimal ones (hex policies)
 */
export const SAMPLE_TEXT = 'deadbeef';
