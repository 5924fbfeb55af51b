const textEncoder = new TextEncoder();

/**
 * A single multipart body part.
 *
 * Repeated names are allowed; they are how multi-valued fields are sent.
 */
export interface NamedPart {
  /** Form field name, written into `Content-Disposition` */
  name: string;
  /** Present only for file-like parts */
  filename?: string;
  /** MIME type; no `Content-Type` line is written when absent */
  contentType?: string;
  /** Exact payload, written as is */
  body: Uint8Array;
}

/**
 * Options for {@link namedPart}.
 */
export interface NamedPartOptions {
  filename?: string;
  contentType?: string;
}

/**
 * Build a part from a text or byte body. Text is encoded as UTF-8.
 *
 * @example
 * ```ts
 * const parts = [
 *   namedPart('title', 'Hello'),
 *   namedPart('avatar', pngBytes, { filename: 'me.png', contentType: 'image/png' }),
 * ];
 * ```
 */
export function namedPart(
  name: string,
  body: string | Uint8Array,
  options: NamedPartOptions = {}
): NamedPart {
  const part: NamedPart = {
    name,
    body: typeof body === 'string' ? textEncoder.encode(body) : body,
  };
  if (options.filename !== undefined) {
    part.filename = options.filename;
  }
  if (options.contentType !== undefined) {
    part.contentType = options.contentType;
  }
  return part;
}
