/**
 * Raised by codecs and grammars for text they cannot decode or delimit.
 * Handlers convert it to an INVALID_HASH PasshashError; it never reaches callers.
 */
export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CodecError';
  }
}
