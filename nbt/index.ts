export { createScanner, scanTags, DEFAULT_STACK_SLOTS } from './scanner/scanner.js';
export type { Scanner, ScannerOptions, ScannerDebugState, ScanOptions, TagIndex } from './scanner/scanner.js';
export { ScanError, ScanErrorCode, isScanError } from './scanner/scan-error.js';
export {
  TagType,
  MAX_TAG_TYPE,
  elementWidth,
  isArrayTag,
  isNumericTag,
  isPackedListSubtype,
  isValidTagType,
  tagTypeToString
} from './scanner/tag-types.js';
export { DEFAULT_BYTE_ORDER, hostByteOrder, isNativeByteOrder, parseByteOrder } from './scanner/byte-order.js';
export type { ByteOrder } from './scanner/byte-order.js';
export { createContinuationStack, minimumStackSlots, ContinuationKind } from './scanner/continuation-stack.js';
export type { Continuation, ContinuationStack } from './scanner/continuation-stack.js';
export { createTagVector, DEFAULT_TAG_CAPACITY } from './scanner/tag-vector.js';
export type { TagDescriptor, TagVector, TagVectorOptions, TagVectorDebugState } from './scanner/tag-vector.js';

// Consumers of the flat index
export * from './tag-values.js';
export * from './tag-factory.js';
export * from './tag-reader.js';
export * from './tag-traversal.js';
export * from './nbt-writer.js';
export * from './snbt-serializer.js';
export * from './nbt-file.js';
