import { TruncatedInputError } from "./errors";

/**
 * Little-endian word reader over a borrowed byte window. Never reads past
 * the end of the window and never writes to it.
 */
export class WordCursor {
  private pos = 0;

  constructor(private readonly bytes: ArrayLike<number>) {}

  peekWord(offset = 0): number {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`Invalid word offset: ${offset}`);
    }
    const at = this.pos + offset;
    if (at + 2 > this.bytes.length) {
      throw new TruncatedInputError(at + 2, this.bytes.length);
    }
    return (this.bytes[at] & 0xff) | ((this.bytes[at + 1] & 0xff) << 8);
  }

  takeWord(): number {
    const word = this.peekWord();
    this.pos += 2;
    return word;
  }

  consumed(): number {
    return this.pos;
  }
}
