import { Command } from 'commander';

import { buildPlan, EXIT_CODES, HELP_TEXT } from '../config/index.js';
import { resolveInvocationName, runVerify } from '../core/index.js';
import { createExecaProcessRunner, createPathToolLocator } from '../process/index.js';
import type { ProcessRunner, ToolLocator } from '../process/index.js';
import type { VerifyPlan } from '../schema/index.js';
import { VerifyError } from '../utils/errors.js';
import * as log from '../utils/logger.js';

// ── Dependencies ─────────────────────────────────────────────

export interface CliDeps {
  locator?: ToolLocator | undefined;
  runner?: ProcessRunner | undefined;
  plan?: VerifyPlan | undefined;
  stdout?: ((text: string) => void) | undefined;
}

// ── Error reporting ──────────────────────────────────────────

function reportError(err: unknown): number {
  const missing = err instanceof VerifyError ? err.missingTool() : undefined;
  if (missing !== undefined) {
    log.missingTool(missing.tool, missing.invocationName);
    return EXIT_CODES.MISSING_TOOL;
  }

  const message = err instanceof Error ? err.message : String(err);
  log.error(message);
  return EXIT_CODES.ERROR;
}

// ── Program ──────────────────────────────────────────────────

/**
 * Build the commander program. commander's own help option is disabled:
 * `--help` only counts in the second positional slot, which `runVerify`
 * checks itself.
 *
 * commander drops a standalone `--` from its parsed operands, so the chain is
 * handed the untouched positional vector (`argv` after the script path).
 */
export function createProgram(
  invocationName: string,
  positionals: readonly string[],
  deps: CliDeps,
  onExit: (code: number) => void,
): Command {
  const program = new Command();

  program
    .name(`cargo-${invocationName}`)
    .description(HELP_TEXT)
    .helpOption(false)
    .allowUnknownOption()
    .allowExcessArguments()
    .exitOverride()
    .argument('[args...]', 'sub-command name as passed by cargo, then an optional --help')
    .action(async () => {
      try {
        const exitCode = await runVerify({
          args: positionals,
          invocationName,
          plan: deps.plan ?? buildPlan(),
          locator: deps.locator ?? createPathToolLocator(),
          runner: deps.runner ?? createExecaProcessRunner(),
          stdout: deps.stdout ?? ((text: string) => process.stdout.write(text)),
        });
        onExit(exitCode);
      } catch (err) {
        onExit(reportError(err));
      }
    });

  return program;
}

/**
 * Parse a full `process.argv`-style vector and run the chain.
 * Resolves with the exit code; it never sets `process.exitCode` itself.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const invocationName = resolveInvocationName(argv[1]);
  let exitCode: number = EXIT_CODES.SUCCESS;

  const program = createProgram(invocationName, argv.slice(2), deps, (code) => {
    exitCode = code;
  });
  await program.parseAsync([...argv], { from: 'node' });

  return exitCode;
}
