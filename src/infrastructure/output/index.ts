export { ByteBuffer } from './byte-buffer';
