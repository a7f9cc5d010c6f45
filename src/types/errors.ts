/**
 * Failure taxonomy. Only `CredentialLoadError` is allowed to end a run;
 * everything else is recovered at candidate or conversation granularity.
 */

export type ErrorContext = Record<string, string | number | boolean | null | undefined>;

export class AutomationError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }
}

/** Selector not found, click missed, navigation didn't happen. Retried. */
export class TransientUiFailure extends AutomationError {}

/** Conversation content never became visible. Treated as zero candidates. */
export class CaptureTimeout extends AutomationError {}

/** Cookie file missing or unreadable. No session is possible without it. */
export class CredentialLoadError extends AutomationError {}

/** Ctrl+C during an interval wait. */
export class OperatorInterrupt extends AutomationError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render an error with its context, for log lines.
 */
export function describeError(error: unknown): string {
  if (error instanceof AutomationError) {
    const details = Object.entries(error.context)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${value}`)
      .join(" ");
    return details ? `${error.name}: ${error.message} (${details})` : `${error.name}: ${error.message}`;
  }
  return errorMessage(error);
}
