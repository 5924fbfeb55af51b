/**
 * multipart/form-data serialization (RFC 2388).
 *
 * Wire format:
 * ```
 * for each part:
 *   --<boundary> CRLF
 *   Content-Disposition: form-data; name="<name>"[; filename="<filename>"] CRLF
 *   [Content-Type: <type> CRLF]
 *   CRLF
 *   <body>
 *   CRLF
 * --<boundary>-- CRLF
 * ```
 *
 * Every part is validated and framed before the first byte is written, so
 * a failed call produces no output.
 */

import type { NamedPart } from '../../domain/named-part';
import { Boundary } from '../../domain/value-objects/boundary';
import type { ByteSink } from '../../ports/output';
import {
  BodyNotTextError,
  BoundaryCollisionError,
  InvalidPartHeaderError,
  InvalidPartNameError,
} from '../../errors';
import { indexOfBytes } from './byte-search';

const CRLF = '\r\n';
const LINE_BREAK_PATTERN = /[\r\n]/;
const TSPECIALS_PATTERN = /[()<>@,;:\\"/[\]?= ]/;

const textEncoder = new TextEncoder();
const strictTextDecoder = new TextDecoder('utf-8', { fatal: true });

const CRLF_BYTES = textEncoder.encode(CRLF);

/**
 * A part with its header block already encoded.
 */
interface FramedPart {
  header: Uint8Array;
  body: Uint8Array;
}

/**
 * Escape a value for a quoted header parameter: `\` becomes `\\`, `"` becomes `\"`.
 */
export function escapeQuoted(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Content-Type header value for a body framed with `boundary`.
 *
 * The boundary is quoted when it contains characters that RFC 2045 does
 * not allow in a bare parameter value.
 *
 * @example
 * ```ts
 * multipartContentType('123');     // 'multipart/form-data; boundary=123'
 * multipartContentType('a=b');     // 'multipart/form-data; boundary="a=b"'
 * ```
 */
export function multipartContentType(boundary: string | Boundary): string {
  const token = toBoundary(boundary).toString();
  const parameter = TSPECIALS_PATTERN.test(token) ? `"${token}"` : token;
  return `multipart/form-data; boundary=${parameter}`;
}

/**
 * Serializer from named parts to multipart/form-data bytes.
 *
 * Stateless; one instance can serve any number of calls.
 *
 * @example
 * ```ts
 * const serializer = new MultipartSerializer();
 * const body = serializer.serialize([namedPart('a', 'x')], '123');
 * // '--123\r\nContent-Disposition: form-data; name="a"\r\n\r\nx\r\n--123--\r\n'
 * ```
 */
export class MultipartSerializer {
  /**
   * Serialize to text. Only valid when every body is UTF-8 text.
   *
   * @throws {BodyNotTextError} if the output is not valid UTF-8
   */
  serialize(parts: readonly NamedPart[], boundary: string | Boundary): string {
    const bytes = this.serializeToBytes(parts, boundary);
    try {
      return strictTextDecoder.decode(bytes);
    } catch (error) {
      if (error instanceof TypeError) {
        throw new BodyNotTextError();
      }
      throw error;
    }
  }

  /**
   * Serialize to a single byte array of exactly the output size.
   */
  serializeToBytes(parts: readonly NamedPart[], boundary: string | Boundary): Uint8Array {
    const delimiter = toBoundary(boundary);
    const framed = frameParts(parts, delimiter);
    const closing = closingLine(delimiter);

    let totalSize = closing.length;
    for (const part of framed) {
      totalSize += part.header.length + part.body.length + CRLF_BYTES.length;
    }

    const output = new Uint8Array(totalSize);
    let offset = 0;
    for (const part of framed) {
      output.set(part.header, offset);
      offset += part.header.length;
      output.set(part.body, offset);
      offset += part.body.length;
      output.set(CRLF_BYTES, offset);
      offset += CRLF_BYTES.length;
    }
    output.set(closing, offset);

    return output;
  }

  /**
   * Serialize incrementally into a sink.
   *
   * Writes the same bytes as {@link serializeToBytes}, one header block,
   * body or line break at a time. Nothing is written if validation fails.
   */
  serializeInto(parts: readonly NamedPart[], boundary: string | Boundary, sink: ByteSink): void {
    const delimiter = toBoundary(boundary);
    const framed = frameParts(parts, delimiter);

    for (const part of framed) {
      sink.write(part.header);
      sink.write(part.body);
      sink.write(CRLF_BYTES);
    }
    sink.write(closingLine(delimiter));
  }
}

function toBoundary(boundary: string | Boundary): Boundary {
  return typeof boundary === 'string' ? Boundary.from(boundary) : boundary;
}

function closingLine(boundary: Boundary): Uint8Array {
  return textEncoder.encode(`--${boundary}--${CRLF}`);
}

function frameParts(parts: readonly NamedPart[], boundary: Boundary): FramedPart[] {
  return parts.map((part) => framePart(part, boundary));
}

function framePart(part: NamedPart, boundary: Boundary): FramedPart {
  if (part.name.length === 0) {
    throw new InvalidPartNameError(part.name, 'name cannot be empty');
  }
  if (LINE_BREAK_PATTERN.test(part.name)) {
    throw new InvalidPartNameError(part.name, 'name cannot contain line breaks');
  }
  if (part.filename !== undefined && LINE_BREAK_PATTERN.test(part.filename)) {
    throw new InvalidPartNameError(part.filename, 'filename cannot contain line breaks');
  }
  if (part.contentType !== undefined && LINE_BREAK_PATTERN.test(part.contentType)) {
    throw new InvalidPartHeaderError(part.name, 'Content-Type', 'value cannot contain line breaks');
  }

  const collision = indexOfBytes(part.body, boundary.delimiter);
  if (collision !== -1) {
    throw new BoundaryCollisionError(boundary.toString(), part.name, collision);
  }

  let header = `--${boundary}${CRLF}`;
  header += `Content-Disposition: form-data; name="${escapeQuoted(part.name)}"`;
  if (part.filename !== undefined) {
    header += `; filename="${escapeQuoted(part.filename)}"`;
  }
  header += CRLF;
  if (part.contentType) {
    header += `Content-Type: ${part.contentType}${CRLF}`;
  }
  header += CRLF;

  return { header: textEncoder.encode(header), body: part.body };
}
