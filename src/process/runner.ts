import { constants } from 'node:os';

import { execa } from 'execa';

import { EXIT_CODES } from '../config/defaults.js';

// ── ProcessRunner interface ──────────────────────────────────

export interface ProcessRunner {
  /** Run a program to completion with inherited stdio and return its exit code. */
  run(program: string, args: readonly string[]): Promise<number>;
}

// ── Exit code mapping ────────────────────────────────────────

export interface ChildTermination {
  exitCode?: number | undefined;
  signal?: keyof typeof constants.signals | undefined;
}

/**
 * Shell conventions: the child's own code when it exited, `128 + n` when
 * killed by signal n, 127 when it never started.
 */
export function toExitCode(termination: ChildTermination): number {
  if (termination.exitCode !== undefined) {
    return termination.exitCode;
  }
  if (termination.signal !== undefined) {
    return EXIT_CODES.SIGNAL_BASE + constants.signals[termination.signal];
  }
  return EXIT_CODES.COMMAND_NOT_FOUND;
}

// ── execa-backed runner ──────────────────────────────────────

/**
 * Children inherit stdin/stdout/stderr, so each tool prints its own
 * diagnostics.
 */
export function createExecaProcessRunner(): ProcessRunner {
  return {
    async run(program: string, args: readonly string[]): Promise<number> {
      const result = await execa(program, args, {
        stdio: 'inherit',
        reject: false,
      });
      return toExitCode({ exitCode: result.exitCode, signal: result.signal });
    },
  };
}
