// src/reflect/errors.ts
// Failure taxonomy of the reflection engine

export type ReflectionErrorCode =
  | "NOT_FOUND"
  | "TYPE_MISMATCH"
  | "ARITY_MISMATCH"
  | "DUPLICATE_REGISTRATION"
  | "SEALED"
  | "REENTRANT_REGISTRATION";

export class ReflectionError extends Error {
  constructor(message: string, public readonly code: ReflectionErrorCode) {
    super(message);
    this.name = "ReflectionError";
  }
}

export class NotFound extends ReflectionError {
  constructor(
    public readonly kind: "member" | "method" | "type",
    public readonly lookupName: string,
    public readonly className?: string
  ) {
    super(
      `NotFound: ${kind} '${lookupName}'${className ? ` on ${className}` : ""}`,
      "NOT_FOUND"
    );
    this.name = "NotFound";
  }
}

export class TypeMismatch extends ReflectionError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
    public readonly context?: string
  ) {
    super(
      `TypeMismatch: expected ${expected}, got ${actual}${context ? ` (${context})` : ""}`,
      "TYPE_MISMATCH"
    );
    this.name = "TypeMismatch";
  }
}

export class ArityMismatch extends ReflectionError {
  constructor(
    public readonly methodName: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `ArityMismatch: method '${methodName}' expects ${expected} argument(s), got ${actual}`,
      "ARITY_MISMATCH"
    );
    this.name = "ArityMismatch";
  }
}

export class DuplicateRegistration extends ReflectionError {
  constructor(
    public readonly kind: "member" | "method" | "type" | "binding",
    public readonly registeredName: string,
    public readonly className?: string
  ) {
    super(
      `DuplicateRegistration: ${kind} '${registeredName}' already registered${className ? ` on ${className}` : ""}`,
      "DUPLICATE_REGISTRATION"
    );
    this.name = "DuplicateRegistration";
  }
}

export function isReflectionError(e: unknown): e is ReflectionError {
  return e instanceof ReflectionError;
}
