export {
  isMultipartConvertible,
  type EncodingContext,
  type AbsentShape,
  type LeafShape,
  type RecordShape,
  type SequenceShape,
  type Shape,
  type ValueReflector,
  type MultipartConvertible,
} from './value-reflector';
