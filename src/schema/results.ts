// ── StepOutcome ─────────────────────────────────────────────

export interface StepOutcome {
  name: string;
  exitCode: number;
  durationMs: number;
}

// ── ChainOutcome ────────────────────────────────────────────

export interface ChainOutcome {
  /** Exit code of the last step attempted; 0 for an empty chain. */
  exitCode: number;
  steps: StepOutcome[];
}

/**
 * A chain passed when it ran to the end with every step exiting 0.
 */
export function chainPassed(outcome: ChainOutcome, total: number): boolean {
  return outcome.exitCode === 0 && outcome.steps.length === total;
}
