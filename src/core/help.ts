import { HELP_FLAG, HELP_TEXT } from '../config/defaults.js';

/**
 * Print the one-line usage and report `true` when the second positional
 * argument is `--help`. cargo passes the sub-command name first, so
 * `cargo verify --help` arrives as `['verify', '--help']`.
 *
 * Only that position is checked; `--help` anywhere else is ignored.
 */
export function showHelpIfRequested(
  args: readonly string[],
  write: (text: string) => void,
): boolean {
  if (args[1] !== HELP_FLAG) return false;
  write(HELP_TEXT + '\n');
  return true;
}
