export {
  ObjectReflector,
  DEFAULT_FILENAME,
  DEFAULT_FILE_CONTENT_TYPE,
  type ObjectReflectorOptions,
} from './object-reflector';
