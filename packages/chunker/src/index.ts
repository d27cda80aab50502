export type { IChunker } from "./chunker.interface.js";
export { BoundaryChunker } from "./boundary-chunker.js";
export { FixedChunker } from "./fixed-chunker.js";
export { createChunker } from "./factory.js";
export { CHARS_PER_TOKEN, estimateTokens, toChars } from "./size.js";
