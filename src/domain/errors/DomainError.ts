/**
 * Base class for errors raised by inventory rules and argument checks.
 * Store failures use InfrastructureError instead.
 */
export class DomainError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
