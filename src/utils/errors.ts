export enum VerifyErrorCode {
  MISSING_TOOL = 'MISSING_TOOL',
  INVALID_PLAN = 'INVALID_PLAN',
}

export interface VerifyErrorOptions {
  /** Structured details for the CLI, e.g. `{ tool, invocationName }`. */
  context?: Record<string, unknown> | undefined;
  /** Underlying failure, such as the zod error behind `INVALID_PLAN`. */
  cause?: unknown;
}

export class VerifyError extends Error {
  readonly code: VerifyErrorCode;
  readonly context?: Record<string, unknown> | undefined;

  constructor(code: VerifyErrorCode, message: string, options: VerifyErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'VerifyError';
    this.code = code;
    this.context = options.context;
  }

  /** Missing-tool details, when this error carries them. */
  missingTool(): { tool: string; invocationName: string } | undefined {
    if (this.code !== VerifyErrorCode.MISSING_TOOL) return undefined;
    const tool = this.context?.['tool'];
    const invocationName = this.context?.['invocationName'];
    if (typeof tool !== 'string' || typeof invocationName !== 'string') return undefined;
    return { tool, invocationName };
  }
}
