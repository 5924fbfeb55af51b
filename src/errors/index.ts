export {
  MultipartErrorCode,
  MultipartError,
  RootNotKeyedError,
  CircularStructureError,
  TraversalFailureError,
  InvalidPartNameError,
  InvalidPartHeaderError,
  InvalidBoundaryError,
  BoundaryCollisionError,
  BodyNotTextError,
} from './multipart-error';
