/**
 * Live progress logger for cargo-verify.
 *
 * All output goes to stderr so stdout only ever carries the help line.
 */

import pc from 'picocolors';

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

function counter(index: number, total: number): string {
  return `[${String(index + 1)}/${String(total)}]`;
}

// ── Public API ──────────────────────────────────────────────

export function step(index: number, total: number, name: string, commandLine: string): void {
  write(pc.cyan(`▶ ${counter(index, total)} ${name}: ${commandLine}`));
}

export function stepResult(
  index: number,
  total: number,
  name: string,
  exitCode: number,
): void {
  if (exitCode === 0) {
    write(pc.green(`✔ ${counter(index, total)} ${name}`));
  } else {
    write(pc.red(`✖ ${counter(index, total)} ${name} (exit ${String(exitCode)})`));
  }
}

export function success(message: string): void {
  write(pc.green(`✔ ${message}`));
}

export function error(message: string): void {
  write(`${pc.bold(pc.red('error:'))} ${message}`);
}

export function missingTool(tool: string, invocationName: string): void {
  error(`'${pc.bold(tool)}' is required for ${pc.bold(invocationName)} to run`);
}
