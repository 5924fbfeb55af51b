// Reflection
export {
  ObjectReflector,
  DEFAULT_FILENAME,
  DEFAULT_FILE_CONTENT_TYPE,
  type ObjectReflectorOptions,
} from './reflection';

// Output
export { ByteBuffer } from './output';
