// backend/services/flock/src/errors.ts
/**
 * Purpose:
 * - Error taxonomy for the ingestion surface.
 * - The error funnel maps every FlockError to the wire envelope by `status`.
 *
 * Invariants:
 * - AuthError never carries detail to the client (401, empty body).
 * - ValidationError messages are client-facing and stable.
 */

export abstract class FlockError extends Error {
  public abstract readonly status: number;
  public abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class AuthError extends FlockError {
  public readonly status = 401;
  public readonly code = "auth_failed";

  constructor() {
    super("Authentication required");
  }
}

export class ValidationError extends FlockError {
  public readonly status = 400;
  public readonly code = "validation_failed";

  constructor(
    message: string,
    /** Offending element index within the batch, when element-scoped. */
    public readonly index?: number,
    /** Offending field name ("body" when the whole payload is bad). */
    public readonly field?: string
  ) {
    super(message);
  }
}

export class DuplicateRegistrationError extends FlockError {
  public readonly status = 400;
  public readonly code = "duplicate_registration";

  constructor(public readonly username: string) {
    super(`Your computer (${username}) is already registered with this server`);
  }
}

/** Store or channel unreachable during a phase the client must hear about. */
export class UpstreamUnavailableError extends FlockError {
  public readonly status = 400;
  public readonly code = "upstream_unavailable";

  constructor(message = "Submission failed", public readonly reason?: unknown) {
    super(message);
  }
}
