import type { ToolLocator } from '../process/index.js';
import { VerifyError, VerifyErrorCode } from '../utils/errors.js';

/**
 * Check the tools in declaration order and stop at the first one the locator
 * cannot resolve. Only that tool is reported.
 */
export async function requireTools(
  names: readonly string[],
  locator: ToolLocator,
  invocationName: string,
): Promise<void> {
  for (const tool of names) {
    const resolved = await locator.resolve(tool);
    if (resolved === undefined) {
      throw new VerifyError(
        VerifyErrorCode.MISSING_TOOL,
        `'${tool}' is required for ${invocationName} to run`,
        { context: { tool, invocationName } },
      );
    }
  }
}
