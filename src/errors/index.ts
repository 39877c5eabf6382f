/**
 * Error taxonomy
 *
 * Only InvalidInputFormatError ever escapes the public entry point. Every
 * other error is caught by its owning stage and turned into state content.
 */

export type ErrorCode =
  | 'INVALID_INPUT_FORMAT'
  | 'COLLABORATOR_UNAVAILABLE'
  | 'GUARDRAIL_TIMEOUT'
  | 'CONFIG';

export abstract class OutreachError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raw lead input matched neither accepted shape
 */
export class InvalidInputFormatError extends OutreachError {
  readonly code = 'INVALID_INPUT_FORMAT';
}

export type CollaboratorName =
  | 'profile_store'
  | 'search_provider'
  | 'text_generator'
  | 'guardrail_backend'
  | 'email_drafts'
  | 'social_queue'
  | 'storage';

/**
 * An external collaborator failed or is not configured
 */
export class CollaboratorUnavailableError extends OutreachError {
  readonly code = 'COLLABORATOR_UNAVAILABLE';

  constructor(
    readonly collaborator: CollaboratorName,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${collaborator}: ${message}`, options);
  }
}

export class GuardrailTimeoutError extends OutreachError {
  readonly code = 'GUARDRAIL_TIMEOUT';

  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export class ConfigError extends OutreachError {
  readonly code = 'CONFIG';

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

/**
 * Normalize any caught value to a message string
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
