import type { ErrorSeverity, FailureKind, FailureLike, Result } from '../../shared/types/failure.types';
import { createLogger, isDebugEnabled } from './logger';

const DEFAULT_SEVERITY: Record<FailureKind, ErrorSeverity> = {
  storage: 'medium',
  timeout: 'medium',
  tts: 'low',
  preferences: 'low',
  validation: 'low',
};

const log = createLogger('Failure');

export interface FailureOptions {
  details?: string;
  severity?: ErrorSeverity;
  cause?: unknown;
}

/**
 * Typed failure surfaced to the presentation layer.
 * Not-found is never a Failure; lookups return null instead.
 */
export class Failure extends Error implements FailureLike {
  readonly kind: FailureKind;
  readonly details?: string;
  readonly severity: ErrorSeverity;

  constructor(kind: FailureKind, message: string, options: FailureOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'Failure';
    this.kind = kind;
    this.details = options.details;
    this.severity = options.severity ?? DEFAULT_SEVERITY[kind];
  }

  get isRecoverable(): boolean {
    return this.severity !== 'high';
  }

  get shouldShowDetails(): boolean {
    return shouldShowDetails(this);
  }

  log(): void {
    log.error(`${this.kind} (${this.severity}): ${this.message}`);
    if (this.details) log.error('Details:', this.details);
    if (isDebugEnabled() && this.cause !== undefined) log.debug('Cause:', this.cause);
  }

  toString(): string {
    return `Failure[${this.kind}]: ${this.message}${this.details ? `\nDetails: ${this.details}` : ''}`;
  }
}

/**
 * Details of high-severity failures are shown only with debug logging on.
 */
export function shouldShowDetails(failure: Pick<FailureLike, 'severity'>): boolean {
  return isDebugEnabled() || failure.severity !== 'high';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function fail<T>(error: Failure): Result<T> {
  return { success: false, error };
}
