export class QuerySyntaxError extends SyntaxError {
  override readonly name = 'QuerySyntaxError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
