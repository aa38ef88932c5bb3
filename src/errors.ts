// Error taxonomy shared by the clients and the orchestration layer

export type PlatformErrorKind = 'transient' | 'conflict' | 'fatal' | 'not-found';

export interface PlatformErrorOptions {
  statusCode?: number;
  reason?: string;
  resource?: string;
  cause?: unknown;
}

/**
 * Error raised by the orchestration platform or secrets engine clients.
 * The kind drives the retry controller's decision.
 */
export class PlatformError extends Error {
  readonly kind: PlatformErrorKind;
  readonly statusCode?: number;
  readonly reason?: string;
  readonly resource?: string;

  constructor(kind: PlatformErrorKind, message: string, options: PlatformErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PlatformError';
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.reason = options.reason;
    this.resource = options.resource;
  }
}

export interface ConfigurationIssue {
  /** Phase name, or a dotted config field when no phase applies */
  location: string;
  message: string;
}

export class ConfigurationError extends Error {
  readonly issues: ConfigurationIssue[];

  constructor(issues: ConfigurationIssue[], summary = 'Invalid configuration') {
    super(`${summary}:\n${issues.map(issue => `  ${issue.location}: ${issue.message}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class CycleDetectedError extends ConfigurationError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    const path = cycle.join(' -> ');
    super([{ location: cycle[0] ?? 'phases', message: `dependency cycle ${path}` }], 'CycleDetected');
    this.name = 'CycleDetectedError';
    this.cycle = cycle;
  }
}

export class PreflightError extends ConfigurationError {
  constructor(issues: ConfigurationIssue[]) {
    super(issues, 'Pre-flight check failed');
    this.name = 'PreflightError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const TRANSIENT_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

/**
 * Map an HTTP status from the platform or secrets engine API onto an error kind
 */
export function classifyHttpStatus(statusCode: number, reason?: string, message = ''): PlatformErrorKind {
  if (statusCode === 404) {
    return 'not-found';
  }
  if (TRANSIENT_STATUS_CODES.has(statusCode)) {
    return 'transient';
  }
  if (statusCode === 409) {
    // A resourceVersion clash clears on re-read; an existing object with
    // another spec does not.
    return reason === 'AlreadyExists' ? 'conflict' : 'transient';
  }
  if (statusCode === 422 && /immutable/i.test(message)) {
    return 'conflict';
  }
  return 'fatal';
}
