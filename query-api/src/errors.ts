/** Rejected file upload; carries the status the error handler replies with. */
export class UploadError extends Error {
  override readonly name = 'UploadError';
  readonly statusCode = 400;

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
