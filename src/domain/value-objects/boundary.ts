import { InvalidBoundaryError } from '../../errors';

const MAX_BOUNDARY_LENGTH = 70;
const BOUNDARY_PATTERN = /^[0-9A-Za-z'()+_,\-./:=? ]+$/;

const textEncoder = new TextEncoder();

/**
 * Value object for a multipart boundary token.
 *
 * Validated against RFC 2046: 1 to 70 characters from the `bchars` set,
 * not ending in a space. The token is never generated here; callers pick it.
 *
 * @example
 * ```ts
 * const boundary = Boundary.from('----form-7d1f');
 * boundary.delimiter; // bytes of '------form-7d1f'
 * ```
 */
export class Boundary {
  /** Bytes of `"--" + boundary`, as they appear on the wire */
  readonly delimiter: Uint8Array;

  private constructor(private readonly value: string) {
    this.delimiter = textEncoder.encode(`--${value}`);
  }

  /**
   * Create a Boundary from a string value.
   * @throws {InvalidBoundaryError} if the value is not a valid boundary
   */
  static from(value: string): Boundary {
    if (!value) {
      throw new InvalidBoundaryError(value, 'boundary cannot be empty');
    }
    if (value.length > MAX_BOUNDARY_LENGTH) {
      throw new InvalidBoundaryError(
        value,
        `boundary cannot exceed ${MAX_BOUNDARY_LENGTH} characters`
      );
    }
    if (!BOUNDARY_PATTERN.test(value)) {
      throw new InvalidBoundaryError(
        value,
        "boundary can only contain letters, digits, spaces and '()+_,-./:=?"
      );
    }
    if (value.endsWith(' ')) {
      throw new InvalidBoundaryError(value, 'boundary cannot end with a space');
    }
    return new Boundary(value);
  }

  toString(): string {
    return this.value;
  }

  equals(other: Boundary): boolean {
    return this.value === other.value;
  }
}
