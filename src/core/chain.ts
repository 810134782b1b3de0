import type { ProcessRunner } from '../process/index.js';
import type { ChainOutcome, ChainStep, StepOutcome } from '../schema/index.js';

// ── Public types ─────────────────────────────────────────────

export interface ChainHooks {
  onStepStart?: ((step: ChainStep, index: number, total: number) => void) | undefined;
  onStepEnd?: ((outcome: StepOutcome, index: number, total: number) => void) | undefined;
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Run the steps one at a time. A step runs only if the previous one exited 0;
 * the chain's exit code is that of the last step attempted.
 */
export async function runChain(
  steps: readonly ChainStep[],
  runner: ProcessRunner,
  hooks: ChainHooks = {},
): Promise<ChainOutcome> {
  const outcomes: StepOutcome[] = [];
  let exitCode = 0;

  for (const [index, step] of steps.entries()) {
    hooks.onStepStart?.(step, index, steps.length);

    const startedAt = Date.now();
    exitCode = await runner.run(step.program, step.args);
    const outcome: StepOutcome = {
      name: step.name,
      exitCode,
      durationMs: Date.now() - startedAt,
    };
    outcomes.push(outcome);

    hooks.onStepEnd?.(outcome, index, steps.length);

    if (exitCode !== 0) break;
  }

  return { exitCode, steps: outcomes };
}

/** Render a step the way a shell user would type it. */
export function formatCommandLine(step: ChainStep): string {
  return [step.program, ...step.args].join(' ');
}
