import type { ToolLocator } from './locator.js';
import type { ProcessRunner } from './runner.js';

// ── Locator ──────────────────────────────────────────────────

/**
 * Fake locator for tests. Every listed name resolves to `/mock/bin/<name>`.
 */
export function createMockLocator(available: readonly string[]): ToolLocator & {
  readonly lookups: string[];
} {
  const lookups: string[] = [];
  const known = new Set(available);

  return {
    lookups,
    async resolve(name: string): Promise<string | undefined> {
      lookups.push(name);
      return known.has(name) ? `/mock/bin/${name}` : undefined;
    },
  };
}

// ── Runner ───────────────────────────────────────────────────

export interface RecordedCall {
  program: string;
  args: readonly string[];
}

/**
 * Fake runner for tests.
 * Replays the scripted exit codes in order, falling back to 0 once they run out.
 */
export function createMockRunner(exitCodes: readonly number[] = []): ProcessRunner & {
  readonly calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];

  return {
    calls,
    async run(program: string, args: readonly string[]): Promise<number> {
      const exitCode = exitCodes[calls.length] ?? 0;
      calls.push({ program, args: [...args] });
      return exitCode;
    },
  };
}
