import { MultipartFile } from '../../domain/multipart-file';
import type { MultipartLeaf } from '../../domain/multipart-leaf';
import { formatPartName } from '../../domain/part-path';
import {
  isMultipartConvertible,
  type EncodingContext,
  type Shape,
  type ValueReflector,
} from '../../ports/traversal';

/** Filename sent for a MultipartFile that declares none */
export const DEFAULT_FILENAME = 'file';

/** Content type sent for a MultipartFile that declares none */
export const DEFAULT_FILE_CONTENT_TYPE = 'application/octet-stream';

const ABSENT: Shape = { kind: 'absent' };

const textEncoder = new TextEncoder();

function textLeaf(text: string): Shape {
  return { kind: 'leaf', leaf: { body: textEncoder.encode(text) } };
}

function bytesLeaf(body: Uint8Array): Shape {
  return { kind: 'leaf', leaf: { body } };
}

/**
 * Configuration options for ObjectReflector.
 */
export interface ObjectReflectorOptions {
  /**
   * Filename for files that declare none.
   * Default: 'file'
   */
  defaultFilename?: string;

  /**
   * Content type for files that declare none.
   * Default: 'application/octet-stream'
   */
  defaultFileContentType?: string;
}

/**
 * Reflector for plain JavaScript values.
 *
 * - `null` and `undefined` are absent
 * - strings, numbers, bigints, booleans, dates and URLs are text leaves
 * - byte arrays, `ArrayBuffer`s and other array buffer views are raw byte leaves
 * - `MultipartFile` and `MultipartConvertible` values are leaves with their own headers
 * - arrays and sets are sequences
 * - maps and every other object are records, in insertion order; map keys
 *   that stringify to the same name are rejected
 *
 * Functions and symbols cannot be encoded; they are omitted with a warning.
 * `Blob` values are rejected, since their bytes are only readable asynchronously.
 */
export class ObjectReflector implements ValueReflector {
  private readonly defaultFilename: string;
  private readonly defaultFileContentType: string;

  constructor(options: ObjectReflectorOptions = {}) {
    this.defaultFilename = options.defaultFilename ?? DEFAULT_FILENAME;
    this.defaultFileContentType = options.defaultFileContentType ?? DEFAULT_FILE_CONTENT_TYPE;
  }

  describe(value: unknown, context: EncodingContext): Shape {
    if (value === undefined || value === null) {
      return ABSENT;
    }
    if (typeof value === 'string') {
      return textLeaf(value);
    }
    if (typeof value === 'number' || typeof value === 'bigint') {
      return textLeaf(String(value));
    }
    if (typeof value === 'boolean') {
      return textLeaf(value ? 'true' : 'false');
    }
    if (typeof value !== 'object') {
      console.warn(
        `[multipart] Omitting ${typeof value} value at '${formatPartName(context.codingPath)}'`
      );
      return ABSENT;
    }

    if (value instanceof MultipartFile) {
      return { kind: 'leaf', leaf: this.fileLeaf(value) };
    }
    if (isMultipartConvertible(value)) {
      const leaf = value.toMultipartLeaf(context);
      return leaf === undefined ? ABSENT : { kind: 'leaf', leaf };
    }
    if (value instanceof Uint8Array) {
      return bytesLeaf(value);
    }
    if (value instanceof ArrayBuffer) {
      return bytesLeaf(new Uint8Array(value));
    }
    if (ArrayBuffer.isView(value)) {
      return bytesLeaf(new Uint8Array(value.buffer, value.byteOffset, value.byteLength));
    }
    if (value instanceof Date) {
      // toISOString throws a RangeError for invalid dates
      return textLeaf(value.toISOString());
    }
    if (value instanceof URL) {
      return textLeaf(value.href);
    }
    if (value instanceof Blob) {
      throw new TypeError(
        'Blob contents cannot be read synchronously; wrap the bytes in a MultipartFile'
      );
    }

    if (Array.isArray(value)) {
      const elements: readonly unknown[] = value;
      return {
        kind: 'sequence',
        length: elements.length,
        at: (index) => elements[index],
      };
    }
    if (value instanceof Set) {
      const elements: unknown[] = Array.from(value);
      return {
        kind: 'sequence',
        length: elements.length,
        at: (index) => elements[index],
      };
    }
    if (value instanceof Map) {
      const entries = new Map<string, unknown>();
      for (const [key, entry] of value) {
        const name = String(key);
        if (entries.has(name)) {
          throw new TypeError(`Map has more than one key named '${name}'`);
        }
        entries.set(name, entry);
      }
      return {
        kind: 'record',
        keys: Array.from(entries.keys()),
        read: (key) => entries.get(key),
      };
    }

    const record = value;
    return {
      kind: 'record',
      keys: Object.keys(record),
      read: (key) => Reflect.get(record, key),
    };
  }

  private fileLeaf(file: MultipartFile): MultipartLeaf {
    return {
      body: file.data,
      contentType: file.contentType ?? this.defaultFileContentType,
      filename: file.filename ?? this.defaultFilename,
    };
  }
}
