export { split, FixedSizeChunker, DEFAULT_CHUNK_SIZE } from "./fixed-size-chunker.js";
