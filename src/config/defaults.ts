/**
 * Fixed values for the verify chain.
 * Nothing here is read from the environment or a config file.
 */

export const SUBCOMMAND_PREFIX = 'cargo-';

export const DEFAULT_INVOCATION_NAME = 'verify';

export const HELP_FLAG = '--help';

export const HELP_TEXT = 'run fmt, clippy and test';

export const REQUIRED_TOOLS = ['cargo-fmt', 'cargo-clippy'] as const;

export const CHAIN = [
  { name: 'fmt', program: 'cargo', args: ['fmt', '--all', '--', '--check'] },
  { name: 'clippy', program: 'cargo', args: ['clippy', '--workspace', '--all-targets'] },
  { name: 'test', program: 'cargo', args: ['test', '--workspace'] },
] as const;

export const EXIT_CODES = {
  SUCCESS: 0,
  MISSING_TOOL: 1,
  ERROR: 1,
  COMMAND_NOT_FOUND: 127,
  SIGNAL_BASE: 128,
} as const;
