export {
  mergeChunkResults,
  dedupeDefinitions,
  mergeStrategies,
  INCONCLUSIVE_SUMMARY,
  type ChunkFailure,
  type ChunkResult,
} from "./merge"
export {
  buildQuickReference,
  clauseLabel,
  computeRiskDistribution,
  highestRiskLevel,
  MAX_BUCKET_ITEMS,
  MAX_RECOMMENDED_ITEMS,
} from "./quick-reference"
