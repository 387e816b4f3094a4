/** Byte order of multi-byte integer fields in the input. */
export type ByteOrder = 'big' | 'little';

/** Java edition files are big-endian, Bedrock edition files little-endian. */
export const DEFAULT_BYTE_ORDER: ByteOrder = 'big';

const hostLittleEndian = new Uint8Array(new Uint16Array([0x0102]).buffer)[0] === 0x02;

export function hostByteOrder(): ByteOrder {
  return hostLittleEndian ? 'little' : 'big';
}

/**
 * True when the declared byte order matches the host, so that raw payload
 * bytes can be viewed in place without swapping.
 */
export function isNativeByteOrder(byteOrder: ByteOrder): boolean {
  return (byteOrder === 'little') === hostLittleEndian;
}

export function parseByteOrder(value: string): ByteOrder {
  switch (value) {
    case 'big':
    case 'be':
    case '>':
      return 'big';
    case 'little':
    case 'le':
    case '<':
      return 'little';
  }
  throw new Error('Unknown byte order: ' + JSON.stringify(value));
}
