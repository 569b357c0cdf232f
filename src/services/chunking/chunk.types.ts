export interface ByteRange {
  /** Inclusive, 0-based */
  start: number;
  /** Exclusive */
  end: number;
}

export interface Chunk extends ByteRange {
  /** 1-based position within the session */
  index: number;
  /** Raw slice of the source, exactly `end - start` bytes */
  bytes: Uint8Array;
  /** Sanitized text sent to the provider */
  text: string;
}

/**
 * Text source collaborator. The engine only ever asks for contiguous byte
 * ranges and the total length; how the host extracts text is its own concern.
 */
export interface TextSource {
  readonly totalLength: number;
  getText(range: ByteRange): Promise<Uint8Array>;
}
