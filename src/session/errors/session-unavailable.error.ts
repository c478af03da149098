/**
 * Raised when a session cannot be initialised because the turn store or the
 * chain factory failed on the request path. Nothing is cached when it is thrown.
 */
export class SessionUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SessionUnavailableError';
  }
}
