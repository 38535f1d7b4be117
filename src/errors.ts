export type PhishScopeErrorCode =
  | 'INVALID_INPUT'
  | 'CLASSIFIER_UNAVAILABLE'
  | 'REASONING_UNAVAILABLE'
  | 'STORE_FAILURE';

/** Base class for errors raised by PhishScope itself. */
export class PhishScopeError extends Error {
  constructor(
    readonly code: PhishScopeErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PhishScopeError';
  }
}

export class InvalidInputError extends PhishScopeError {
  constructor(message: string, readonly details: string[] = []) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

export class ClassifierUnavailableError extends PhishScopeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CLASSIFIER_UNAVAILABLE', message, options);
    this.name = 'ClassifierUnavailableError';
  }
}

export class ReasoningUnavailableError extends PhishScopeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('REASONING_UNAVAILABLE', message, options);
    this.name = 'ReasoningUnavailableError';
  }
}

export class StoreFailureError extends PhishScopeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_FAILURE', message, options);
    this.name = 'StoreFailureError';
  }
}
