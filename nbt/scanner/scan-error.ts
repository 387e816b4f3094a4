/**
 * Terminal scan failures. A scan reports exactly one of these and never
 * returns a partial index.
 */
export enum ScanErrorCode {
  None,

  /** A field read or a skip would consume more bytes than remain. */
  EndOfBuffer,

  /** A tag type outside 1..12 was reached (corrupt input or wrong byte order). */
  InvalidTagType,

  /** The continuation stack memory is exhausted. */
  DepthExceeded,

  /** The tag vector could not grow. */
  OutOfMemory,
}

const defaultMessages: Record<ScanErrorCode, string> = {
  [ScanErrorCode.None]: 'no error',
  [ScanErrorCode.EndOfBuffer]: 'unexpected end of buffer',
  [ScanErrorCode.InvalidTagType]: 'invalid tag type',
  [ScanErrorCode.DepthExceeded]: 'maximum nesting depth exceeded',
  [ScanErrorCode.OutOfMemory]: 'tag vector allocation failed',
};

export class ScanError extends Error {
  readonly code: ScanErrorCode;

  /**
   * Cursor position in the input buffer when the scan stopped, or -1 when
   * raised by a component that does not know it.
   */
  readonly offset: number;

  /** Message text without the offset suffix. */
  readonly reason: string;

  constructor(code: ScanErrorCode, offset: number, reason?: string) {
    const text = reason || defaultMessages[code];
    super(offset >= 0 ? text + ' at offset ' + offset : text);
    this.code = code;
    this.offset = offset;
    this.reason = text;
    this.name = 'ScanError';
  }
}

export function isScanError(error: unknown, code?: ScanErrorCode): error is ScanError {
  return error instanceof ScanError && (code === undefined || error.code === code);
}
