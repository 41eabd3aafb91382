export type DomainErrorCode =
  | "collaborator_error"
  | "not_found"
  | "invalid_argument";

export type DomainErrorStatus = 400 | 404 | 502;

export class DomainError extends Error {
  constructor(
    public readonly code: DomainErrorCode,
    message: string,
    public readonly statusCode: DomainErrorStatus,
    public readonly detail?: string
  ) {
    super(message);
    this.name = "DomainError";
  }
}

/**
 * An external platform call failed (network, auth, quota).
 */
export class CollaboratorError extends DomainError {
  constructor(
    public readonly source: string,
    message: string,
    detail?: string
  ) {
    super("collaborator_error", message, 502, detail);
    this.name = "CollaboratorError";
  }

  static wrap(source: string, error: unknown): CollaboratorError {
    if (error instanceof CollaboratorError) return error;
    const detail = error instanceof Error ? error.message : String(error);
    return new CollaboratorError(source, `${source} request failed`, detail);
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string, detail?: string) {
    super("not_found", message, 404, detail);
    this.name = "NotFoundError";
  }
}

export class InvalidArgumentError extends DomainError {
  constructor(message: string, detail?: string) {
    super("invalid_argument", message, 400, detail);
    this.name = "InvalidArgumentError";
  }
}
