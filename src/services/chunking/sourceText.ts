import type { ByteRange, TextSource } from './chunk.types';

/**
 * Immutable UTF-8 view of a whole document.
 */
export class SourceText implements TextSource {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  static fromString(text: string): SourceText {
    return new SourceText(new TextEncoder().encode(text));
  }

  static fromBytes(bytes: Uint8Array): SourceText {
    return new SourceText(Uint8Array.from(bytes));
  }

  get totalLength(): number {
    return this.bytes.length;
  }

  async getText(range: ByteRange): Promise<Uint8Array> {
    const start = Math.max(0, range.start);
    const end = Math.min(this.bytes.length, range.end);
    return this.bytes.slice(start, Math.max(start, end));
  }
}
