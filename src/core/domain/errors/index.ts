/**
 * Domain Errors
 */

export type UserField = "id" | "name" | "email";

export class DomainError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DomainError";
  }
}

export class ValidationError extends DomainError {
  readonly fields: readonly UserField[];

  constructor(fields: readonly UserField[], reason?: string) {
    super(`Invalid user record: ${reason ?? `${fields.join(", ")} must not be empty`}`);
    this.name = "ValidationError";
    this.fields = fields;
  }
}

export class StorageError extends DomainError {
  readonly userId: number;

  constructor(userId: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to save user ${userId}: ${detail}`, { cause });
    this.name = "StorageError";
    this.userId = userId;
  }
}
