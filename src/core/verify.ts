import type { ProcessRunner, ToolLocator } from '../process/index.js';
import type { VerifyPlan } from '../schema/index.js';
import { chainPassed } from '../schema/index.js';
import { EXIT_CODES } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { showHelpIfRequested } from './help.js';
import { requireTools } from './preflight.js';
import { formatCommandLine, runChain } from './chain.js';

// ── Public types ─────────────────────────────────────────────

export interface VerifyOptions {
  /** Positional arguments after the script path. */
  args: readonly string[];
  invocationName: string;
  plan: VerifyPlan;
  locator: ToolLocator;
  runner: ProcessRunner;
  stdout: (text: string) => void;
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Help → preflight → chain. Resolves with the process exit code; a missing
 * tool rejects with `VerifyError(MISSING_TOOL)`.
 */
export async function runVerify(options: VerifyOptions): Promise<number> {
  if (showHelpIfRequested(options.args, options.stdout)) {
    return EXIT_CODES.SUCCESS;
  }

  await requireTools(options.plan.requiredTools, options.locator, options.invocationName);

  const outcome = await runChain(options.plan.steps, options.runner, {
    onStepStart: (step, index, total) => {
      log.step(index, total, step.name, formatCommandLine(step));
    },
    onStepEnd: (result, index, total) => {
      log.stepResult(index, total, result.name, result.exitCode);
    },
  });

  if (chainPassed(outcome, options.plan.steps.length)) {
    log.success('all checks passed');
  }

  return outcome.exitCode;
}
