export {
  alignBackward,
  alignForward,
  completePrefixLength,
  isContinuationByte,
  sanitizeChunkText,
  splitIntoChunks,
} from './chunk.splitter';
export type { ByteRange, Chunk, TextSource } from './chunk.types';
export { SourceText } from './sourceText';
