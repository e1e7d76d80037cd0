/** Location path of a validation failure, outermost segment first. */
export type ErrorLoc = string[];

/** Serializable validation failure, suitable for API error responses. */
export type ErrorEntry = {
  loc: ErrorLoc;
  message: string;
};

/**
 * A single failure tagged with the location it happened at.
 * Wrapping another ErrorWrapper flattens it: the locations are joined and the
 * innermost error is kept.
 */
export class ErrorWrapper extends Error {
  readonly loc: ErrorLoc;
  readonly error: Error;

  constructor(loc: string | ErrorLoc, error: Error) {
    const head = typeof loc === "string" ? [loc] : [...loc];
    const [fullLoc, inner] = unwrap(head, error);
    super(inner.message);
    this.name = "ErrorWrapper";
    this.loc = fullLoc;
    this.error = inner;
  }

  /** Plain `{ loc, message }` entry. */
  dump(): ErrorEntry {
    return { loc: [...this.loc], message: this.error.message };
  }
}

function unwrap(loc: ErrorLoc, error: Error): [ErrorLoc, Error] {
  if (!(error instanceof ErrorWrapper)) {
    return [loc, error];
  }
  return unwrap([...loc, ...error.loc], error.error);
}

/**
 * Raised when one or more values fail validation.
 * Next: call `.dump()` to get `{ loc, message }` entries.
 */
export class ValidationError extends Error {
  readonly errors: ErrorWrapper[];

  constructor(errors: ErrorWrapper[], message?: string) {
    super(message ?? `Invalid data in ${errors.length} location(s)`);
    this.name = "ValidationError";
    this.errors = errors;
  }

  /** Prefix every sub-error location with `loc`. */
  prefixed(loc: string): ValidationError {
    return new ValidationError(
      this.errors.map((err) => new ErrorWrapper(loc, err)),
    );
  }

  dump(): ErrorEntry[] {
    return this.errors.map((err) => err.dump());
  }
}

/**
 * Validation failure raised while building a document instance.
 * Collects the errors of every invalid field, never only the first one.
 */
export class DocumentValidationError extends ValidationError {
  readonly documentName: string;

  constructor(errors: ValidationError[], documentName: string) {
    const flat = errors.flatMap((err) => err.errors);
    let message = `Invalid data at document ${documentName}:`;
    for (const err of flat) {
      message += `\n  - ${err.loc.join(".")}: ${err.error.message}`;
    }
    super(flat, message);
    this.name = "DocumentValidationError";
    this.documentName = documentName;
  }
}

/** Definition-time error in a document or field declaration. */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

/** A document or mapper name that is not (yet) registered. */
export class TypeResolutionError extends Error {
  readonly typeName: string;

  constructor(typeName: string, detail?: string) {
    super(detail ?? `Type \`${typeName}\` not found or not declared yet`);
    this.name = "TypeResolutionError";
    this.typeName = typeName;
  }
}

/** Save/delete called with an instance of the wrong document type. */
export class DocumentTypeError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = "DocumentTypeError";
  }
}

/** One or more branches of a cascading save/delete failed. */
export class CascadeError extends Error {
  readonly errors: unknown[];

  constructor(operation: "save" | "delete", errors: unknown[]) {
    const first = errors[0];
    const detail = first instanceof Error ? first.message : String(first);
    super(
      `Cascade ${operation} failed in ${errors.length} branch(es): ${detail}`,
    );
    this.name = "CascadeError";
    this.errors = errors;
  }
}

/** Document store or engine misconfiguration. */
export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EngineError";
  }
}

/** A single value rejected by a mapper. Wrapped with its location by the caller. */
export class MapperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MapperError";
  }
}

/** Invalid environment configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Rebuild any thrown value as a ValidationError located at `loc`.
 * Nested ValidationErrors keep their inner locations; definition-time errors are rethrown.
 */
export function locateError(loc: string, error: unknown): ValidationError {
  if (error instanceof SchemaError || error instanceof TypeResolutionError) {
    throw error;
  }
  if (error instanceof ValidationError) {
    return error.prefixed(loc);
  }
  return new ValidationError([new ErrorWrapper(loc, toError(error))]);
}

/** Thrown values as Errors, for Result failures. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
