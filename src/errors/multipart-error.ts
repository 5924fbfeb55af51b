/**
 * Error codes for encoder and serializer failures.
 */
export const MultipartErrorCode = {
  // Part tree building
  ROOT_NOT_KEYED: 'multipart::encode::root_not_keyed',
  CIRCULAR_STRUCTURE: 'multipart::encode::circular_structure',
  TRAVERSAL_FAILURE: 'multipart::encode::traversal_failure',

  // Serialization
  INVALID_PART_NAME: 'multipart::serialize::invalid_part_name',
  INVALID_PART_HEADER: 'multipart::serialize::invalid_part_header',
  INVALID_BOUNDARY: 'multipart::serialize::invalid_boundary',
  BOUNDARY_COLLISION: 'multipart::serialize::boundary_collision',
  BODY_NOT_TEXT: 'multipart::serialize::body_not_text',
} as const;

export type MultipartErrorCode = (typeof MultipartErrorCode)[keyof typeof MultipartErrorCode];

/**
 * Base error for multipart encoding.
 *
 * Every error raised by the encoder or the serializer extends this class,
 * so a single `instanceof` check separates them from anything else.
 *
 * @example
 * ```ts
 * try {
 *   encoder.encode(value, boundary);
 * } catch (error) {
 *   if (error instanceof BoundaryCollisionError) {
 *     // pick another boundary and retry
 *   } else if (error instanceof MultipartError) {
 *     console.error(error.code, error.message);
 *   }
 * }
 * ```
 */
export class MultipartError extends Error {
  constructor(
    message: string,
    public readonly code: MultipartErrorCode
  ) {
    super(message);
    this.name = 'MultipartError';
    Object.setPrototypeOf(this, MultipartError.prototype);
  }
}

/**
 * Thrown when the top-level value is not record-like.
 *
 * A multipart body has no anonymous root part, so the value handed to the
 * encoder must expose named fields.
 */
export class RootNotKeyedError extends MultipartError {
  constructor(public readonly rootKind: string) {
    super(
      `Top-level value must be record-like, got ${rootKind}`,
      MultipartErrorCode.ROOT_NOT_KEYED
    );
    this.name = 'RootNotKeyedError';
    Object.setPrototypeOf(this, RootNotKeyedError.prototype);
  }
}

/**
 * Thrown when a value contains itself.
 */
export class CircularStructureError extends MultipartError {
  constructor(public readonly path: string) {
    super(
      `Circular structure detected at '${path}'`,
      MultipartErrorCode.CIRCULAR_STRUCTURE
    );
    this.name = 'CircularStructureError';
    Object.setPrototypeOf(this, CircularStructureError.prototype);
  }
}

/**
 * Thrown when reflecting a user value fails.
 *
 * The original error is kept as `cause`; `path` names the part that was
 * being visited when it was raised.
 */
export class TraversalFailureError extends MultipartError {
  constructor(
    public readonly path: string,
    public readonly codingPath: readonly (string | number)[],
    public readonly cause: unknown
  ) {
    super(
      `Failed to read value at '${path}': ${describeCause(cause)}`,
      MultipartErrorCode.TRAVERSAL_FAILURE
    );
    this.name = 'TraversalFailureError';
    Object.setPrototypeOf(this, TraversalFailureError.prototype);
  }
}

/**
 * Thrown when a part name or filename cannot be written into a header line.
 */
export class InvalidPartNameError extends MultipartError {
  constructor(
    public readonly partName: string,
    public readonly reason: string
  ) {
    super(
      `Invalid part name ${JSON.stringify(partName)}: ${reason}`,
      MultipartErrorCode.INVALID_PART_NAME
    );
    this.name = 'InvalidPartNameError';
    Object.setPrototypeOf(this, InvalidPartNameError.prototype);
  }
}

/**
 * Thrown when a part's header value would break header framing.
 */
export class InvalidPartHeaderError extends MultipartError {
  constructor(
    public readonly partName: string,
    public readonly header: string,
    public readonly reason: string
  ) {
    super(
      `Invalid ${header} for part '${partName}': ${reason}`,
      MultipartErrorCode.INVALID_PART_HEADER
    );
    this.name = 'InvalidPartHeaderError';
    Object.setPrototypeOf(this, InvalidPartHeaderError.prototype);
  }
}

/**
 * Thrown when a boundary violates RFC 2046.
 */
export class InvalidBoundaryError extends MultipartError {
  constructor(
    public readonly boundary: string,
    public readonly reason: string
  ) {
    super(
      `Invalid boundary ${JSON.stringify(boundary)}: ${reason}`,
      MultipartErrorCode.INVALID_BOUNDARY
    );
    this.name = 'InvalidBoundaryError';
    Object.setPrototypeOf(this, InvalidBoundaryError.prototype);
  }
}

/**
 * Thrown when a part body contains the boundary delimiter.
 *
 * A reader would take the match for a real delimiter, so the body cannot be
 * framed with this boundary. Pick a boundary that no payload contains.
 */
export class BoundaryCollisionError extends MultipartError {
  constructor(
    public readonly boundary: string,
    public readonly partName: string,
    public readonly offset: number
  ) {
    super(
      `Body of part '${partName}' contains the delimiter "--${boundary}" at byte ${offset}`,
      MultipartErrorCode.BOUNDARY_COLLISION
    );
    this.name = 'BoundaryCollisionError';
    Object.setPrototypeOf(this, BoundaryCollisionError.prototype);
  }
}

/**
 * Thrown when text output is requested but a body is not valid UTF-8.
 */
export class BodyNotTextError extends MultipartError {
  constructor() {
    super(
      'Encoded body is not valid UTF-8; use the byte output instead',
      MultipartErrorCode.BODY_NOT_TEXT
    );
    this.name = 'BodyNotTextError';
    Object.setPrototypeOf(this, BodyNotTextError.prototype);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
