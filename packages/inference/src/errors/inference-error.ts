/**
 * InferenceError
 *
 * Base error class for failures talking to the model backend.
 */
export class InferenceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InferenceError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * NetworkError
 *
 * Transport failure: connection refused or reset, timeout, gateway error.
 * Retried with backoff; surfaces only once retries are exhausted.
 */
export class NetworkError extends InferenceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/**
 * ResourceExhaustedError
 *
 * The backend rejected the request as overloaded. Retried like a network
 * error with a longer backoff.
 */
export class ResourceExhaustedError extends NetworkError {
  constructor(
    public readonly statusCode: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ResourceExhaustedError';
  }
}

/**
 * BackendUnavailableError
 *
 * The health probe did not succeed within its ceiling.
 */
export class BackendUnavailableError extends InferenceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BackendUnavailableError';
  }
}

/**
 * InferenceRequestError
 *
 * The backend answered but refused or failed the request. Not retried at
 * the transport level.
 */
export class InferenceRequestError extends InferenceError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'InferenceRequestError';
  }
}

/**
 * RequestCancelledError
 *
 * The caller's abort signal fired before the request finished.
 */
export class RequestCancelledError extends InferenceError {
  constructor(message = 'Inference request cancelled', options?: ErrorOptions) {
    super(message, options);
    this.name = 'RequestCancelledError';
  }
}

/**
 * ModelMismatchError
 *
 * The endpoint is not serving the expected model. Fatal at startup.
 */
export class ModelMismatchError extends InferenceError {
  constructor(
    public readonly expected: string,
    public readonly available: readonly string[],
  ) {
    super(
      `Expected model "${expected}" but endpoint serves: ${
        available.length > 0 ? available.join(', ') : '(none)'
      }`,
    );
    this.name = 'ModelMismatchError';
  }
}

/**
 * InferenceServerError
 *
 * The self-managed backend process failed in a way restarts cannot fix.
 */
export class InferenceServerError extends InferenceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InferenceServerError';
  }
}
