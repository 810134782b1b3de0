/**
 * Configuration module.
 * The chain is fixed in code; `buildPlan` validates it with zod.
 */

export {
  SUBCOMMAND_PREFIX,
  DEFAULT_INVOCATION_NAME,
  HELP_FLAG,
  HELP_TEXT,
  REQUIRED_TOOLS,
  CHAIN,
  EXIT_CODES,
} from './defaults.js';
export { buildPlan } from './plan.js';
