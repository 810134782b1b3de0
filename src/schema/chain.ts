import { z } from 'zod';

// ── ChainStep ───────────────────────────────────────────────

export const chainStepSchema = z.object({
  name: z.string().min(1),
  program: z.string().min(1),
  args: z.array(z.string()).readonly(),
});

export type ChainStep = z.infer<typeof chainStepSchema>;

// ── VerifyPlan ──────────────────────────────────────────────

export const verifyPlanSchema = z.object({
  requiredTools: z.array(z.string().min(1)).readonly(),
  steps: z.array(chainStepSchema).readonly(),
});

export type VerifyPlan = z.infer<typeof verifyPlanSchema>;
