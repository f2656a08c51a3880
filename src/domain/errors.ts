/**
 * Errors thrown while handling a submission. Each carries the HTTP status
 * the API responds with.
 */
export class ServiceError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ServiceError";
    this.status = status;
  }
}

export class ValidationError extends ServiceError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 400);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class AuthenticationError extends ServiceError {
  constructor(message: string = "email/secret mismatch") {
    super(message, 401);
    this.name = "AuthenticationError";
  }
}

export class PublishError extends ServiceError {
  readonly upstreamStatus: number | null;

  constructor(message: string, upstreamStatus: number | null = null) {
    super(message, 502);
    this.name = "PublishError";
    this.upstreamStatus = upstreamStatus;
  }
}

export function statusForError(error: unknown): number {
  return error instanceof ServiceError ? error.status : 500;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
