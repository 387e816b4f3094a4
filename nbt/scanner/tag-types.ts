/**
 * Tag type codes of the binary NBT format.
 *
 * The numeric values are the on-disk type bytes and must not be reordered.
 */
export const enum TagType {
  End = 0,
  Byte = 1,
  Short = 2,
  Int = 3,
  Long = 4,
  Float = 5,
  Double = 6,
  ByteArray = 7,
  String = 8,
  List = 9,
  Compound = 10,
  IntArray = 11,
  LongArray = 12,
}

/** Highest valid tag type byte. */
export const MAX_TAG_TYPE = TagType.LongArray;

// Payload width of fixed-size tags and of array/list elements, indexed by type.
// End is 0 wide so that an end-typed list takes the numeric fast path.
const elementWidths = new Uint8Array([
  0, // End
  1, // Byte
  2, // Short
  4, // Int
  8, // Long
  4, // Float
  8, // Double
  1, // ByteArray
  0, // String
  0, // List
  0, // Compound
  4, // IntArray
  8, // LongArray
]);

/** Byte width of a scalar payload, or of one element of an array tag. */
export function elementWidth(type: TagType): number {
  return elementWidths[type];
}

/** Scalar numeric types, Byte through Double. */
export function isNumericTag(type: number): boolean {
  return type >= TagType.Byte && type <= TagType.Double;
}

/**
 * List subtypes whose elements are reconstructed from the list header alone,
 * without per-element records.
 */
export function isPackedListSubtype(subtype: number): subtype is TagType {
  return subtype >= TagType.End && subtype <= TagType.Double;
}

export function isArrayTag(type: number): boolean {
  return type === TagType.ByteArray || type === TagType.IntArray || type === TagType.LongArray;
}

export function isValidTagType(type: number): type is TagType {
  return type >= TagType.End && type <= MAX_TAG_TYPE;
}

const tagTypeNames = [
  'End',
  'Byte',
  'Short',
  'Int',
  'Long',
  'Float',
  'Double',
  'ByteArray',
  'String',
  'List',
  'Compound',
  'IntArray',
  'LongArray',
] as const;

export function tagTypeToString(type: number): string {
  return isValidTagType(type) ? tagTypeNames[type] : 'Unknown(' + type + ')';
}
