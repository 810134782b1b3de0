import { DEFAULT_INVOCATION_NAME, SUBCOMMAND_PREFIX } from '../config/defaults.js';

const SCRIPT_EXTENSIONS = ['.js', '.mjs', '.cjs', '.ts', '.cmd', '.exe'] as const;

/**
 * Derive the name used in error messages from the invoked script path:
 * `/home/me/.cargo/bin/cargo-verify` → `verify`.
 *
 * Never throws. When stripping would leave nothing, the basename is returned
 * as-is.
 */
export function resolveInvocationName(
  scriptPath: string | undefined,
  prefix: string = SUBCOMMAND_PREFIX,
): string {
  const segments = (scriptPath ?? '').split(/[\\/]/).filter((s) => s.length > 0);
  const basename = segments.at(-1);
  if (basename === undefined) return DEFAULT_INVOCATION_NAME;

  let name = basename;
  const ext = SCRIPT_EXTENSIONS.find((e) => name.toLowerCase().endsWith(e));
  if (ext !== undefined && name.length > ext.length) {
    name = name.slice(0, -ext.length);
  }

  if (prefix.length > 0 && name.startsWith(prefix) && name.length > prefix.length) {
    name = name.slice(prefix.length);
  }

  return name;
}
