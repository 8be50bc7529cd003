import type { ZodError } from "zod";

export type ErrorCode = "VALIDATION" | "PERSISTENCE" | "STATE" | "NOT_FOUND";

export interface FieldIssue {
  path: string;
  message: string;
}

export class FocusClockError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends FocusClockError {
  constructor(message: string, readonly issues: FieldIssue[] = []) {
    super("VALIDATION", message);
  }

  static fromZod(subject: string, error: ZodError) {
    const issues = error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
    return new ValidationError(`Invalid ${subject} payload`, issues);
  }
}

export class PersistenceError extends FocusClockError {
  constructor(message: string, readonly filePath: string, cause?: unknown) {
    super("PERSISTENCE", message, { cause });
  }
}

export class StateError extends FocusClockError {
  constructor(message: string) {
    super("STATE", message);
  }
}

export class NotFoundError extends FocusClockError {
  constructor(subject: string, id: string) {
    super("NOT_FOUND", `${subject} ${id} not found`);
  }
}

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
