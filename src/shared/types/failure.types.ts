export type FailureKind = 'storage' | 'timeout' | 'tts' | 'preferences' | 'validation';

export type ErrorSeverity = 'low' | 'medium' | 'high';

// Outcome of every service call crossing into the presentation layer
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: FailureLike };

// Structural view of a failure, usable without the class
export interface FailureLike {
  kind: FailureKind;
  message: string;
  details?: string;
  severity: ErrorSeverity;
}
