export {
  MultipartSerializer,
  multipartContentType,
  escapeQuoted,
} from './multipart-serializer';

export { indexOfBytes } from './byte-search';
