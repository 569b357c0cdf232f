export {
  canonicalName,
  cleanText,
  generateEntityId,
  isPlaceholderRole,
} from './canonical';
export {
  createSnapshot,
  isSnapshotEmpty,
  mergeCharacters,
  mergeDescriptions,
  mergeHistoricalFigures,
  mergeLocations,
  mergeOccupations,
  mergeSnapshots,
  mergeThemes,
  type MergeOptions,
} from './merger';
export { emptyExtraction, normalizeExtraction } from './normalize';
