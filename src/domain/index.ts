// Parts
export { namedPart, type NamedPart, type NamedPartOptions } from './named-part';
export type { MultipartLeaf } from './multipart-leaf';
export { MultipartFile, multipartFile, type MultipartFileOptions } from './multipart-file';

// Paths
export { formatPartName, type PathSegment } from './part-path';

// Value objects
export { Boundary } from './value-objects';
