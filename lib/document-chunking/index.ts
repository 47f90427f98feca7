export type { Chunk, ChunkStats } from "./types"
export { planChunks, computeChunkStats, estimateTokens } from "./chunk-planner"
