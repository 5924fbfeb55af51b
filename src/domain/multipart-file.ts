const textEncoder = new TextEncoder();

/**
 * Options for a {@link MultipartFile}.
 */
export interface MultipartFileOptions {
  /** Filename sent in `Content-Disposition`. Default: the reflector's placeholder */
  filename?: string;
  /** MIME type of the content. Default: the reflector's default file type */
  contentType?: string;
}

/**
 * An explicitly file-typed value.
 *
 * Plain byte arrays are encoded as bare bodies. Wrap them in a MultipartFile
 * to send them as a file upload, with a filename and a content type.
 *
 * @example
 * ```ts
 * encoder.encode({
 *   title: 'Report',
 *   attachment: new MultipartFile(pdfBytes, {
 *     filename: 'report.pdf',
 *     contentType: 'application/pdf',
 *   }),
 * }, boundary);
 * ```
 */
export class MultipartFile {
  readonly data: Uint8Array;
  readonly filename: string | undefined;
  readonly contentType: string | undefined;

  constructor(data: Uint8Array | string, options: MultipartFileOptions = {}) {
    this.data = typeof data === 'string' ? textEncoder.encode(data) : data;
    this.filename = options.filename;
    this.contentType = options.contentType;
  }
}

/**
 * Shorthand for `new MultipartFile(data, options)`.
 */
export function multipartFile(
  data: Uint8Array | string,
  options?: MultipartFileOptions
): MultipartFile {
  return new MultipartFile(data, options);
}
