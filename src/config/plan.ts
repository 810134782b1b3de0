import { verifyPlanSchema } from '../schema/index.js';
import type { VerifyPlan } from '../schema/index.js';
import { VerifyError, VerifyErrorCode } from '../utils/errors.js';
import { CHAIN, REQUIRED_TOOLS } from './defaults.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Validate a plan and return it. Without input, the fixed fmt → clippy → test
 * chain is used.
 * Throws `VerifyError(INVALID_PLAN)` with the zod issues as context and the
 * `ZodError` as cause.
 */
export function buildPlan(input?: unknown): VerifyPlan {
  const raw: unknown = input ?? { requiredTools: REQUIRED_TOOLS, steps: CHAIN };

  const parsed = verifyPlanSchema.safeParse(raw);
  if (!parsed.success) {
    throw new VerifyError(VerifyErrorCode.INVALID_PLAN, 'invalid verify plan', {
      context: {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      },
      cause: parsed.error,
    });
  }
  return parsed.data;
}
