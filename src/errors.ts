/**
 * Error types shared by the registry, state cache and draw list.
 */

export const ERROR_CODES = {
  STALE_HANDLE: "StaleHandle",
  NOT_FOUND: "NotFound",
  COMPILE_ERROR: "CompileError",
  LINK_ERROR: "LinkError",
  BUFFER_OVERFLOW: "BufferOverflow",
  INVALID_DIMENSIONS: "InvalidDimensions",
  MISSING_UNIFORM: "MissingUniform",
  UNKNOWN_UNIFORM: "UnknownUniform",
  UNIFORM_TYPE_MISMATCH: "UniformTypeMismatch",
  RESOURCE_CREATION: "ResourceCreation",
  INCOMPLETE_FRAMEBUFFER: "IncompleteFramebuffer",
  CONTEXT_DESTROYED: "ContextDestroyed",
} as const;

export type GraphicsErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class GraphicsError extends Error {
  readonly code: GraphicsErrorCode;

  constructor(code: GraphicsErrorCode, message: string) {
    super(message);
    this.name = "GraphicsError";
    this.code = code;
  }
}

/** Check whether a thrown value is a GraphicsError, optionally of a code */
export function isGraphicsError(
  error: unknown,
  code?: GraphicsErrorCode
): error is GraphicsError {
  if (!(error instanceof GraphicsError)) return false;
  return code === undefined || error.code === code;
}

/** Throw InvalidDimensions unless `value` is finite and greater than zero */
export function assertPositive(value: number, what: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new GraphicsError(
      ERROR_CODES.INVALID_DIMENSIONS,
      `${what} must be a positive number, got ${value}`
    );
  }
}

/** Throw InvalidDimensions unless `value` is a positive integer */
export function assertPositiveInteger(value: number, what: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new GraphicsError(
      ERROR_CODES.INVALID_DIMENSIONS,
      `${what} must be a positive integer, got ${value}`
    );
  }
}
