/**
 * Error types raised by the retry policy and the HTTP client built on it.
 *
 * The policy itself never throws for an attempt outcome; only the invariant
 * violations below are fatal.
 */

/** Base error class for all errors raised by this package. */
export class RetryPolicyError extends Error {
  readonly code: string;
  readonly retryable: boolean;
  readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    options?: {
      retryable?: boolean | undefined;
      details?: Record<string, unknown> | undefined;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'RetryPolicyError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
    this.details = options?.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

/**
 * An internal invariant was broken: a negative wait was computed, or a clone
 * could not be assembled from an already-valid request. Indicates a bug, not
 * a condition to recover from.
 */
export class InvariantViolationError extends RetryPolicyError {
  constructor(
    message: string,
    options?: { details?: Record<string, unknown> | undefined; cause?: unknown },
  ) {
    super(message, 'invariant_violation', {
      retryable: false,
      details: options?.details,
      cause: options?.cause,
    });
    this.name = 'InvariantViolationError';
  }
}

/** A request was built with a body that can only be read once. */
export class UnclonableBodyError extends RetryPolicyError {
  constructor(bodyType: string) {
    super(
      `Request body of type '${bodyType}' cannot be duplicated for a retry; buffer it first.`,
      'unclonable_body',
      { retryable: false, details: { body_type: bodyType } },
    );
    this.name = 'UnclonableBodyError';
  }
}

/** A network or connection error outlived every retry the policy allowed. */
export class ConnectionError extends RetryPolicyError {
  constructor(message: string, cause?: unknown) {
    super(message, 'connection_error', { retryable: true, cause });
    this.name = 'ConnectionError';
  }
}

/** A single attempt exceeded its timeout. */
export class RequestTimeoutError extends RetryPolicyError {
  constructor(url: string, timeoutMs: number) {
    super(
      `Request to '${url}' exceeded ${timeoutMs}ms timeout.`,
      'timeout',
      { retryable: true, details: { url, timeout_ms: timeoutMs } },
    );
    this.name = 'RequestTimeoutError';
  }
}

/** A single problem found while validating configuration. */
export interface ValidationIssue {
  field: string;
  message: string;
  expected?: string;
  received?: string;
}

/** Configuration was rejected. */
export class ConfigError extends RetryPolicyError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((i) => `${i.field}: ${i.message}`).join('; ');
    super(`Invalid retry configuration: ${summary}`, 'invalid_config', {
      retryable: false,
      details: { issues },
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
