export interface ValidationIssue {
  field: string;
  reason: string;
}

export class ValidationError extends Error {
  constructor(readonly issues: ValidationIssue[], context?: string) {
    const listing = issues.map(i => `${i.field}: ${i.reason}`).join('; ');
    super(context ? `${context}: ${listing}` : listing);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Mail backend credentials are missing, expired or rejected. */
export class MailAuthError extends Error {
  constructor(message: string, readonly statusCode?: number) {
    super(message);
    this.name = 'MailAuthError';
  }
}

/** Any other failure reported by the mail provider or the transport to it. */
export class MailApiError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number,
    readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'MailApiError';
  }
}

export class MessageNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MessageNotFoundError';
  }
}

export class BackendTimeoutError extends Error {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`Mail backend call '${operation}' timed out after ${timeoutMs}ms.`);
    this.name = 'BackendTimeoutError';
  }
}

export class RuleNotFoundError extends Error {
  constructor(readonly identifier: string) {
    super(`Rule '${identifier}' not found.`);
    this.name = 'RuleNotFoundError';
  }
}

export class RuleStorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuleStorageError';
  }
}
