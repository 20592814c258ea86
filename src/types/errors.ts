/**
 * Structured errors for schema materialization.
 *
 * Every failure carries a machine-readable code and, where one exists, the
 * qualified path of the offending schema element (`Type`, `Type.field`,
 * `Enum.VALUE`) so the source schema can be corrected directly.
 */

export type MaterializeErrorCode =
  | "UNSUPPORTED_SHAPE"      // type signature outside the six wrapper patterns
  | "INVALID_IDENTIFIER"     // name cannot be represented as an IRI segment
  | "DUPLICATE_DEFINITION"   // two elements resolve to one qualified path
  | "EMPTY_SCHEMA"           // nothing left after exclusions (warning)
  | "ROOT_TYPE_REFERENCE"    // field typed as a root operation type, when rejected
  | "INVALID_CONFIG"         // namespace / prefix / language rejected
  | "SCHEMA_LOAD_ERROR"      // SDL source could not be read or built
  | "ARTIFACT_WRITE_ERROR"   // output files could not be written
  | "INTERNAL_ERROR";        // anything not raised by this library

export interface MaterializeError {
  code: MaterializeErrorCode;
  message: string;
  /** Qualified path of the offending element */
  path?: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

export class MaterializeException extends Error {
  public readonly error: MaterializeError;

  constructor(error: MaterializeError, options?: { cause?: unknown }) {
    super(error.message, options);
    this.name = "MaterializeException";
    this.error = error;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MaterializeException);
    }
  }

  get code(): MaterializeErrorCode {
    return this.error.code;
  }

  toJSON(): MaterializeError {
    return this.error;
  }
}

export function isMaterializeException(value: unknown): value is MaterializeException {
  return value instanceof MaterializeException;
}

export function createUnsupportedShapeError(
  signature: string,
  path?: string,
): MaterializeException {
  return new MaterializeException({
    code: "UNSUPPORTED_SHAPE",
    message: path
      ? `Unsupported type signature '${signature}' on ${path}`
      : `Unsupported type signature '${signature}'`,
    path,
    suggestion: "Only Type, Type!, [Type], [Type!], [Type]! and [Type!]! are supported; nested lists are not",
    details: { signature },
  });
}

export function createInvalidIdentifierError(
  path: string,
  reason: string,
): MaterializeException {
  return new MaterializeException({
    code: "INVALID_IDENTIFIER",
    message: `Cannot build a concept IRI for '${path}': ${reason}`,
    path,
    details: { reason },
  });
}

export function createDuplicateDefinitionError(path: string): MaterializeException {
  return new MaterializeException({
    code: "DUPLICATE_DEFINITION",
    message: `'${path}' is defined more than once`,
    path,
    suggestion: "Rename or remove one of the definitions",
  });
}

export function createRootTypeReferenceError(
  path: string,
  rootTypeName: string,
): MaterializeException {
  return new MaterializeException({
    code: "ROOT_TYPE_REFERENCE",
    message: `Field '${path}' has root operation type '${rootTypeName}' as its output type`,
    path,
    details: { rootTypeName },
  });
}

export function createInvalidConfigError(
  option: string,
  message: string,
  received?: unknown,
): MaterializeException {
  return new MaterializeException({
    code: "INVALID_CONFIG",
    message: `Invalid ${option}: ${message}`,
    details: received === undefined ? { option } : { option, received },
  });
}

export function createSchemaLoadError(
  source: string,
  message: string,
  cause?: unknown,
): MaterializeException {
  return new MaterializeException(
    {
      code: "SCHEMA_LOAD_ERROR",
      message: `Failed to load schema from ${source}: ${message}`,
      details: { source },
    },
    { cause },
  );
}

export function createArtifactWriteError(
  target: string,
  cause: unknown,
): MaterializeException {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new MaterializeException(
    {
      code: "ARTIFACT_WRITE_ERROR",
      message: `Failed to write RDF artifact ${target}: ${reason}`,
      details: { target },
    },
    { cause },
  );
}

/**
 * One-line rendering used by the CLI: `[CODE] message (path)`.
 */
export function formatMaterializeError(error: MaterializeError): string {
  const where = error.path ? ` (${error.path})` : "";
  const hint = error.suggestion ? `\n  hint: ${error.suggestion}` : "";
  return `[${error.code}] ${error.message}${where}${hint}`;
}

/**
 * Plain object form for logs and machine consumers.
 */
export function serializeMaterializeError(error: unknown): MaterializeError {
  if (error instanceof MaterializeException) {
    return error.error;
  }
  return {
    code: "INTERNAL_ERROR",
    message: error instanceof Error ? error.message : String(error),
  };
}
